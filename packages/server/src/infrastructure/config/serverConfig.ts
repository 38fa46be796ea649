import { readPositiveInt } from './archiveConfig.js';

export interface ServerConfig {
  port: number;
  logLevel: string;
  corsOrigin: string;
}

/**
 * 環境変数からHTTPサーバー設定を取得
 */
export function getServerConfig(): ServerConfig {
  return {
    port: readPositiveInt('PORT', 3000),
    logLevel: process.env.LOG_LEVEL || 'info',
    corsOrigin: process.env.CORS_ORIGIN || '*',
  };
}
