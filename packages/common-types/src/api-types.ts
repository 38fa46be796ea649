import type { StreamName } from './stream.js';

/**
 * Dispatch Pipeline の停止理由
 * - end-of-input: アップロードが正常終了
 * - cancelled: クライアント切断などでキャンセル
 * - transcoder-failed: トランスコーダーへの書き込み失敗
 * - source-failed: アップロードの読み取り失敗
 */
export type DispatchStopReason = 'end-of-input' | 'cancelled' | 'transcoder-failed' | 'source-failed';

/**
 * Dispatch Pipeline の集計
 */
export interface DispatchStats {
  received: number;
  rejected: number;
  archived: number;
  dropped: number;
  forwarded: number;
  stopReason: DispatchStopReason;
}

/**
 * Archive Writer の集計
 */
export interface ArchiveWriterStats {
  segmentsCreated: number;
  entriesWritten: number;
  entriesSkipped: number;

  /** セグメント作成失敗でアーカイブを停止した場合 true */
  halted: boolean;
}

/**
 * POST /api/streams/:streamName のレスポンス
 */
export interface IngestStreamResponse {
  streamName: StreamName;
  dispatch: DispatchStats;
  archive: ArchiveWriterStats;
}
