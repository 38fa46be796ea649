import { readPositiveInt } from './archiveConfig.js';

export interface TranscoderConfig {
  /** HLSプレイリストとセグメントの出力先ルート */
  hlsPath: string;
  ffmpegPath: string;

  /** false の場合 -loglevel error を付与 */
  verbose: boolean;

  /** 入力MJPEGのフレームレート */
  framerate: number;
}

/**
 * 環境変数からトランスコーダー設定を取得
 */
export function getTranscoderConfig(): TranscoderConfig {
  return {
    hlsPath: process.env.HLS_PATH || './streams-data/hls',
    ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
    verbose: process.env.FFMPEG_VERBOSE === 'true',
    framerate: readPositiveInt('FFMPEG_FRAMERATE', 5),
  };
}
