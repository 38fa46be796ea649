export interface ArchiveConfig {
  /** JPEGアーカイブ（tarセグメント）のルート */
  archivePath: string;

  /** セグメントのローテーション間隔（ms） */
  rotationWindowMs: number;

  /** Archive Writer へのハンドオフ容量（60秒 × 5fps = 300） */
  handoffCapacity: number;
}

/**
 * 正の整数の環境変数を読み取る
 */
export function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

/**
 * 環境変数からアーカイブ設定を取得
 */
export function getArchiveConfig(): ArchiveConfig {
  return {
    archivePath: process.env.ARCHIVE_PATH || './streams-data/jpeg',
    rotationWindowMs: readPositiveInt('ARCHIVE_ROTATION_WINDOW_MS', 60000),
    handoffCapacity: readPositiveInt('ARCHIVE_HANDOFF_CAPACITY', 300),
  };
}
