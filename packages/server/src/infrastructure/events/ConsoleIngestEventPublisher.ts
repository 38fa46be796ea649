/**
 * ConsoleIngestEventPublisher - 取り込みの診断イベントをコンソールに出力
 *
 * IIngestEventPublisherの実装
 */

import type { FrameTimestamp, StreamName } from '@framevault/common-types';
import type { FrameDropReason, IIngestEventPublisher } from '../../domain/events/IIngestEventPublisher.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConsoleIngestEventPublisher implements IIngestEventPublisher {
  publishFrameRejected(streamName: StreamName, rawTimestamp: string | undefined): void {
    if (rawTimestamp === undefined) {
      console.warn(`⚠️ [Ingest] Multipart part missing X-Client-Timestamp header (stream: ${streamName})`);
      return;
    }
    console.warn(`⚠️ [Ingest] Malformed X-Client-Timestamp "${rawTimestamp}" (stream: ${streamName})`);
  }

  publishFrameDropped(streamName: StreamName, timestamp: FrameTimestamp, reason: FrameDropReason): void {
    if (reason === 'handoff-full') {
      console.warn(`⚠️ [Ingest] Archive channel is full. Dropping frame ${timestamp} of ${streamName} for archival to prioritize live stream.`);
      return;
    }
    console.warn(`⚠️ [Ingest] Archive writer for ${streamName} has stopped. Dropping frame ${timestamp} for archival.`);
  }

  publishSegmentOpened(streamName: StreamName, segmentStart: FrameTimestamp): void {
    console.log(`📂 [Archive] Opened segment ${segmentStart} for stream ${streamName}`);
  }

  publishSegmentFinalized(streamName: StreamName, segmentStart: FrameTimestamp, entryCount: number): void {
    console.log(`✅ [Archive] Finalized segment ${segmentStart} for stream ${streamName} (${entryCount} frames)`);
  }

  publishSegmentCreationFailed(streamName: StreamName, segmentStart: FrameTimestamp, error: unknown): void {
    console.error(`❌ [Archive] Failed to create segment ${segmentStart} for stream ${streamName}: ${describeError(error)}`);
  }

  publishEntrySkipped(streamName: StreamName, entryName: string, error: unknown): void {
    console.error(`❌ [Archive] Failed to write ${entryName} for stream ${streamName}: ${describeError(error)}`);
  }

  publishUnreadableEntry(streamName: StreamName, segmentStart: FrameTimestamp, entryName: string): void {
    console.warn(`⚠️ [Retrieval] Could not parse timestamp from frame name ${entryName} in segment ${segmentStart} of ${streamName}`);
  }
}
