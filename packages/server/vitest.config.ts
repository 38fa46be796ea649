import { defineConfig } from 'vitest/config';

/**
 * ユニットテスト + ローカルファイルシステム統合テスト用のvitest設定
 *
 * 実行: npx vitest run
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
