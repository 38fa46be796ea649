import type { ArchiveWriterStats, Frame, FrameTimestamp, StreamName } from '@framevault/common-types';
import type { ISegmentRepository, ISegmentWriter } from '../repositories/ISegmentRepository.js';
import type { IIngestEventPublisher } from '../events/IIngestEventPublisher.js';
import type { FrameHandoff } from '../ingest/FrameHandoff.js';
import { formatEntryName } from './segmentNaming.js';

export const DEFAULT_ROTATION_WINDOW_MS = 60000;

export interface ArchiveWriterOptions {
  streamName: StreamName;

  /** セグメントのローテーション間隔（ms） */
  windowMs?: number;
}

/**
 * Archive Writer
 *
 * 1ストリームのセグメントを書き込む唯一のタスク
 * 開いているセグメントはこのクラスだけが保持し、フレームは必ずハンドオフ経由で受け取る
 *
 * 状態遷移:
 * NoSegment → (最初のフレーム) → SegmentOpen → (ローテーション) → SegmentOpen(新) → … → Closed
 *
 * ローテーション規則:
 * セグメントが無い、または t - segmentStart >= windowMs のとき、現在のセグメントを確定して
 * segmentStart = t の新しいセグメントを作成する
 */
export class ArchiveWriter {
  private readonly streamName: StreamName;
  private readonly windowMs: number;
  private current: ISegmentWriter | null = null;
  private currentEntryCount = 0;
  private running: Promise<ArchiveWriterStats> | null = null;
  private readonly stats: ArchiveWriterStats = {
    segmentsCreated: 0,
    entriesWritten: 0,
    entriesSkipped: 0,
    halted: false,
  };

  constructor(
    private readonly segmentRepository: ISegmentRepository,
    private readonly handoff: FrameHandoff<Frame>,
    private readonly eventPublisher: IIngestEventPublisher,
    options: ArchiveWriterOptions
  ) {
    this.streamName = options.streamName;
    this.windowMs = options.windowMs ?? DEFAULT_ROTATION_WINDOW_MS;

    if (!Number.isInteger(this.windowMs) || this.windowMs < 1) {
      throw new RangeError(`Rotation window must be a positive integer: ${this.windowMs}`);
    }
  }

  /**
   * ハンドオフがクローズされるか signal が中断されるまでフレームを書き込む
   *
   * reject せず、終了時の集計を返す（2回目以降は同じ Promise を返す）
   */
  run(signal?: AbortSignal): Promise<ArchiveWriterStats> {
    if (!this.running) {
      this.running = this.loop(signal);
    }
    return this.running;
  }

  private async loop(signal?: AbortSignal): Promise<ArchiveWriterStats> {
    console.log(`📼 [ArchiveWriter] Starting archive writer for stream ${this.streamName}`);

    try {
      while (true) {
        const next = await this.handoff.receive(signal);
        if (next.done) {
          break;
        }

        const frame = next.value;
        if (this.needsRotation(frame.timestamp)) {
          const opened = await this.rotate(frame.timestamp);
          if (!opened) {
            console.error(`❌ [ArchiveWriter] Halting archive for stream ${this.streamName} due to file creation failure`);
            this.stats.halted = true;
            // 以降のフレームは Dispatch Pipeline 側で破棄される
            this.handoff.close();
            break;
          }
        }

        await this.append(frame);
      }
    } finally {
      await this.finalizeCurrent();
      console.log(`🛑 [ArchiveWriter] Archive writer for stream ${this.streamName} stopped`);
    }

    return { ...this.stats };
  }

  private needsRotation(timestamp: FrameTimestamp): boolean {
    return this.current === null || timestamp - this.current.segmentStart >= this.windowMs;
  }

  /**
   * 現在のセグメントを確定し、新しいセグメントを開く
   * @returns 作成に成功した場合 true
   */
  private async rotate(segmentStart: FrameTimestamp): Promise<boolean> {
    await this.finalizeCurrent();

    try {
      this.current = await this.segmentRepository.createSegment(this.streamName, segmentStart);
    } catch (error) {
      this.eventPublisher.publishSegmentCreationFailed(this.streamName, segmentStart, error);
      return false;
    }

    this.currentEntryCount = 0;
    this.stats.segmentsCreated++;
    this.eventPublisher.publishSegmentOpened(this.streamName, segmentStart);
    return true;
  }

  private async append(frame: Frame): Promise<void> {
    if (!this.current) {
      return;
    }

    const entryName = formatEntryName(frame.timestamp);
    try {
      await this.current.appendEntry(entryName, frame.data);
      this.currentEntryCount++;
      this.stats.entriesWritten++;
    } catch (error) {
      this.stats.entriesSkipped++;
      this.eventPublisher.publishEntrySkipped(this.streamName, entryName, error);
    }
  }

  /**
   * 開いているセグメントをフラッシュしてクローズ（開いていなければ何もしない）
   */
  private async finalizeCurrent(): Promise<void> {
    const segment = this.current;
    if (!segment) {
      return;
    }
    this.current = null;

    try {
      await segment.close();
      this.eventPublisher.publishSegmentFinalized(this.streamName, segment.segmentStart, this.currentEntryCount);
    } catch (error) {
      console.error(`❌ [ArchiveWriter] Failed to finalize segment ${segment.segmentStart} for stream ${this.streamName}:`, error);
    }
  }
}
