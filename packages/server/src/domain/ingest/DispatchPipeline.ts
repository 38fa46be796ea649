import type {
  DispatchStats,
  DispatchStopReason,
  Frame,
  RawFramePart,
  StreamName,
} from '@framevault/common-types';
import { parseFrameTimestamp } from '@framevault/common-types';
import type { FrameHandoff } from './FrameHandoff.js';
import type { ITranscoderSink } from '../services/ITranscoderService.js';
import type { IIngestEventPublisher } from '../events/IIngestEventPublisher.js';

/**
 * 1フレームの受け入れ結果
 * - rejected: タイムスタンプ不正で両方のコンシューマーに送らなかった
 * - archived: アーカイブ・ライブの両方に送った
 * - dropped: ライブにのみ送った（ハンドオフが満杯またはクローズ済み）
 */
export type AdmissionResult = 'rejected' | 'archived' | 'dropped';

export interface DispatchPipelineOptions {
  streamName: StreamName;
}

/**
 * Dispatch Pipeline
 *
 * 受信したフレームを Archive Writer とライブトランスコーダーに振り分ける
 * - アーカイブ側: 固定容量ハンドオフへのノンブロッキング投入（満杯なら破棄）
 * - ライブ側: ブロッキング書き込み（失敗したらループを終了）
 * ライブ側のレイテンシをアーカイブの完全性より優先する
 */
export class DispatchPipeline {
  private readonly streamName: StreamName;
  private received = 0;
  private rejected = 0;
  private archived = 0;
  private dropped = 0;
  private forwarded = 0;

  constructor(
    private readonly handoff: FrameHandoff<Frame>,
    private readonly transcoder: ITranscoderSink,
    private readonly eventPublisher: IIngestEventPublisher,
    options: DispatchPipelineOptions
  ) {
    this.streamName = options.streamName;
  }

  /**
   * 1フレームを受け入れる
   *
   * トランスコーダーへの書き込みに失敗した場合は reject
   */
  async admit(part: RawFramePart, signal?: AbortSignal): Promise<AdmissionResult> {
    this.received++;

    const timestamp = parseFrameTimestamp(part.timestampHeader);
    if (timestamp === null) {
      this.rejected++;
      this.eventPublisher.publishFrameRejected(this.streamName, part.timestampHeader);
      return 'rejected';
    }

    const frame: Frame = { timestamp, data: part.data };

    const offer = this.handoff.tryOffer(frame);
    let result: AdmissionResult;
    if (offer === 'accepted') {
      this.archived++;
      result = 'archived';
    } else {
      this.dropped++;
      this.eventPublisher.publishFrameDropped(
        this.streamName,
        timestamp,
        offer === 'full' ? 'handoff-full' : 'handoff-closed'
      );
      result = 'dropped';
    }

    await this.transcoder.write(frame.data, signal);
    this.forwarded++;

    return result;
  }

  /**
   * 入力が尽きる・キャンセル・トランスコーダー書き込み失敗のいずれかまでフレームを処理する
   *
   * 終了時には必ずハンドオフをクローズする（reject しない）
   */
  async run(source: AsyncIterable<RawFramePart>, signal?: AbortSignal): Promise<DispatchStats> {
    let stopReason: DispatchStopReason = 'end-of-input';

    try {
      for await (const part of source) {
        if (signal?.aborted) {
          stopReason = 'cancelled';
          break;
        }

        try {
          await this.admit(part, signal);
        } catch (error) {
          if (signal?.aborted) {
            stopReason = 'cancelled';
          } else {
            console.error(`❌ [DispatchPipeline] Error writing frame to transcoder for stream ${this.streamName}:`, error);
            stopReason = 'transcoder-failed';
          }
          break;
        }
      }
    } catch (error) {
      if (signal?.aborted) {
        stopReason = 'cancelled';
      } else {
        console.error(`❌ [DispatchPipeline] Error reading frames for stream ${this.streamName}:`, error);
        stopReason = 'source-failed';
      }
    } finally {
      // Archive Writer に入力終了を通知
      this.handoff.close();
    }

    if (stopReason === 'end-of-input' && signal?.aborted) {
      stopReason = 'cancelled';
    }

    return this.getStats(stopReason);
  }

  getStats(stopReason: DispatchStopReason): DispatchStats {
    return {
      received: this.received,
      rejected: this.rejected,
      archived: this.archived,
      dropped: this.dropped,
      forwarded: this.forwarded,
      stopReason,
    };
  }
}
