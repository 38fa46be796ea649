import type { FrameTimestamp, StreamName } from '@framevault/common-types';
import type {
  ISegmentRepository,
  SegmentDescriptor,
  SegmentEntryVisitor,
} from '../repositories/ISegmentRepository.js';
import type { IIngestEventPublisher } from '../events/IIngestEventPublisher.js';
import { parseEntryTimestamp } from './segmentNaming.js';

export interface RetrievedFrame {
  found: true;
  timestamp: FrameTimestamp;
  segmentStart: FrameTimestamp;
  data: Buffer;
}

/**
 * 見つからなかった理由
 * - no-segment: target 以前に始まるセグメントが無い
 * - no-frame: セグメント内に target 以前のフレームが無い
 */
export interface FrameNotFound {
  found: false;
  reason: 'no-segment' | 'no-frame';
}

export type RetrievalResult = RetrievedFrame | FrameNotFound;

interface Candidate {
  timestamp: FrameTimestamp;
  data: Buffer;
}

/**
 * target 以前に始まるセグメントのうち最も新しいものを選ぶ
 */
export function selectSegment(
  segments: SegmentDescriptor[],
  target: FrameTimestamp
): SegmentDescriptor | null {
  let best: SegmentDescriptor | null = null;
  for (const segment of segments) {
    if (segment.segmentStart <= target && (!best || segment.segmentStart > best.segmentStart)) {
      best = segment;
    }
  }
  return best;
}

/**
 * 1セグメント分の走査で target 以下の最後のフレームを覚えておく
 */
class LatestFrameScan {
  private best: Candidate | null = null;

  constructor(
    private readonly streamName: StreamName,
    private readonly segment: SegmentDescriptor,
    private readonly target: FrameTimestamp,
    private readonly eventPublisher: IIngestEventPublisher
  ) {}

  readonly visit: SegmentEntryVisitor = async (entry) => {
    const timestamp = parseEntryTimestamp(entry.name);
    if (timestamp === null) {
      this.eventPublisher.publishUnreadableEntry(this.streamName, this.segment.segmentStart, entry.name);
      return 'continue';
    }

    if (timestamp > this.target) {
      return 'stop';
    }

    this.best = { timestamp, data: await entry.read() };
    return 'continue';
  };

  result(): Candidate | null {
    return this.best;
  }
}

/**
 * Retrieval Engine
 *
 * 指定時刻以前で最も新しいフレームを返す
 *
 * 1. セグメント一覧（ファイル名から解釈）から開始時刻 <= target の最大のものを選ぶ
 * 2. そのセグメントを格納順に走査し、target 以下のフレームを候補として記録
 * 3. target を超えるフレームが現れた時点で走査を打ち切る
 *    （セグメント内のフレームは非減少順に追記されている前提）
 */
export class RetrievalEngine {
  constructor(
    private readonly segmentRepository: ISegmentRepository,
    private readonly eventPublisher: IIngestEventPublisher
  ) {}

  async findFrame(streamName: StreamName, target: FrameTimestamp): Promise<RetrievalResult> {
    const segments = await this.segmentRepository.listSegments(streamName);
    const segment = selectSegment(segments, target);
    if (!segment) {
      return { found: false, reason: 'no-segment' };
    }

    const scan = new LatestFrameScan(streamName, segment, target, this.eventPublisher);
    await this.segmentRepository.scanSegment(streamName, segment, scan.visit);

    const best = scan.result();
    if (!best) {
      return { found: false, reason: 'no-frame' };
    }

    return {
      found: true,
      timestamp: best.timestamp,
      segmentStart: segment.segmentStart,
      data: best.data,
    };
  }
}
