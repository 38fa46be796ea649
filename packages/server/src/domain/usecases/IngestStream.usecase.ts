import type { Frame, IngestStreamResponse, RawFramePart } from '@framevault/common-types';
import { InvalidStreamNameError, isValidStreamName } from '@framevault/common-types';
import type { ISegmentRepository } from '../repositories/ISegmentRepository.js';
import type { ITranscoderService, ITranscoderSink } from '../services/ITranscoderService.js';
import type { IIngestEventPublisher } from '../events/IIngestEventPublisher.js';
import { FrameHandoff } from '../ingest/FrameHandoff.js';
import { DispatchPipeline } from '../ingest/DispatchPipeline.js';
import { ArchiveWriter } from '../archive/ArchiveWriter.js';

/**
 * ストリーム取り込みリクエスト
 */
export interface IngestStreamRequest {
  streamName: string;
  source: AsyncIterable<RawFramePart>;

  /** クライアント切断時に中断されるシグナル */
  signal?: AbortSignal;
}

export interface IngestStreamOptions {
  /** セグメントのローテーション間隔（ms） */
  rotationWindowMs: number;

  /** ハンドオフの容量（フレーム数） */
  handoffCapacity: number;
}

/**
 * ストリーム取り込み Use Case
 *
 * ビジネスフロー:
 * 1. ストリーム名の検証
 * 2. 既存のセグメントディレクトリを破棄
 * 3. Archive Writer を起動
 * 4. トランスコーダーを起動
 * 5. Dispatch Pipeline でアップロードが終わるまでフレームを振り分け
 * 6. トランスコーダーと Archive Writer の終了を待つ
 *
 * 同じストリーム名の同時取り込みは非対応（呼び出し側で直列化すること）
 */
export class IngestStreamUseCase {
  constructor(
    private readonly segmentRepository: ISegmentRepository,
    private readonly transcoderService: ITranscoderService,
    private readonly eventPublisher: IIngestEventPublisher,
    private readonly options: IngestStreamOptions
  ) {}

  async execute(request: IngestStreamRequest): Promise<IngestStreamResponse> {
    const { streamName, source, signal } = request;

    // 1. ストリーム名の検証
    if (!isValidStreamName(streamName)) {
      throw new InvalidStreamNameError(`Invalid stream name: ${streamName}`);
    }

    // 2. 既存のセグメントを破棄
    await this.segmentRepository.resetStream(streamName);

    // 3. Archive Writer を起動
    const handoff = new FrameHandoff<Frame>(this.options.handoffCapacity);
    const archiveWriter = new ArchiveWriter(this.segmentRepository, handoff, this.eventPublisher, {
      streamName,
      windowMs: this.options.rotationWindowMs,
    });
    const archiveDone = archiveWriter.run(signal);

    // 4. トランスコーダーを起動
    let transcoder: ITranscoderSink;
    try {
      transcoder = await this.transcoderService.start(streamName, signal);
    } catch (error) {
      handoff.close();
      await archiveDone;
      throw error;
    }

    // 5. フレームの振り分け
    console.log(`📡 [IngestStream] Receiving frames for stream ${streamName}`);
    const pipeline = new DispatchPipeline(handoff, transcoder, this.eventPublisher, { streamName });
    const dispatch = await pipeline.run(source, signal);

    // 6. 終了待ち
    const [archive] = await Promise.all([archiveDone, transcoder.end()]);

    console.log(
      `🏁 [IngestStream] Finished processing stream for ${streamName} ` +
        `(received: ${dispatch.received}, archived: ${archive.entriesWritten}, dropped: ${dispatch.dropped}, reason: ${dispatch.stopReason})`
    );

    return { streamName, dispatch, archive };
  }
}
