/**
 * IIngestEventPublisher - 取り込み・アーカイブ関連の診断イベント発行インターフェース
 *
 * Domain層からInfrastructure層へのイベント通知を抽象化
 */

import type { FrameTimestamp, StreamName } from '@framevault/common-types';

export type FrameDropReason = 'handoff-full' | 'handoff-closed';

export interface IIngestEventPublisher {
  /**
   * タイムスタンプを解釈できないフレームを破棄した
   */
  publishFrameRejected(streamName: StreamName, rawTimestamp: string | undefined): void;

  /**
   * アーカイブ用にフレームを破棄した（ライブ側には送られる）
   */
  publishFrameDropped(streamName: StreamName, timestamp: FrameTimestamp, reason: FrameDropReason): void;

  publishSegmentOpened(streamName: StreamName, segmentStart: FrameTimestamp): void;

  publishSegmentFinalized(streamName: StreamName, segmentStart: FrameTimestamp, entryCount: number): void;

  /**
   * セグメント作成失敗（このストリームのアーカイブは停止する）
   */
  publishSegmentCreationFailed(streamName: StreamName, segmentStart: FrameTimestamp, error: unknown): void;

  /**
   * エントリの書き込みに失敗しスキップした
   */
  publishEntrySkipped(streamName: StreamName, entryName: string, error: unknown): void;

  /**
   * 走査中に名前を解釈できないエントリを読み飛ばした
   */
  publishUnreadableEntry(streamName: StreamName, segmentStart: FrameTimestamp, entryName: string): void;
}
