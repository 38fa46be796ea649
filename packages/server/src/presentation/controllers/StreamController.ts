import type { Request, Response } from 'express';
import type { IngestStreamUseCase } from '../../domain/usecases/IngestStream.usecase.js';
import type { GetFrameAtTimeUseCase } from '../../domain/usecases/GetFrameAtTime.usecase.js';
import { openMultipartFrameSource } from '../../infrastructure/http/MultipartFrameSource.js';

/**
 * Stream Controller
 *
 * HTTPリクエストを受け取り、Use Caseを実行し、レスポンスを返す
 * エラーハンドリングはミドルウェアに委譲
 */
export class StreamController {
  private ingestStreamUseCase: IngestStreamUseCase;
  private getFrameAtTimeUseCase: GetFrameAtTimeUseCase;
  private activeSessions = new Set<Promise<unknown>>();

  constructor(
    ingestStreamUseCase: IngestStreamUseCase,
    getFrameAtTimeUseCase: GetFrameAtTimeUseCase
  ) {
    this.ingestStreamUseCase = ingestStreamUseCase;
    this.getFrameAtTimeUseCase = getFrameAtTimeUseCase;
  }

  /**
   * multipartでプッシュされるフレームを取り込む
   * アップロードが終わるまでレスポンスを返さない
   */
  async ingestStream(req: Request, res: Response): Promise<void> {
    const { streamName } = req.params;
    const source = await openMultipartFrameSource(req);

    // クライアントが切断したら取り込みセッション全体をキャンセル
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    const session = this.ingestStreamUseCase.execute({
      streamName,
      source,
      signal: controller.signal,
    });
    this.activeSessions.add(session);

    try {
      const result = await session;

      if (!controller.signal.aborted) {
        res.status(200).json(result);
      }
    } finally {
      this.activeSessions.delete(session);
      res.off('close', onClose);
    }
  }

  /**
   * 実行中の取り込みセッションがすべて終了する（セグメントが確定する）まで待つ
   */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.activeSessions]);
  }

  /**
   * 指定時刻以前で最も新しいフレームをJPEGで返す
   */
  async getImage(req: Request, res: Response): Promise<void> {
    const { streamName, timestamp } = req.params;

    const frame = await this.getFrameAtTimeUseCase.execute({ streamName, timestamp });

    res.setHeader('Content-Type', 'image/jpeg');
    res.setHeader('X-Frame-Timestamp', String(frame.timestamp));
    res.status(200).send(frame.data);
  }
}
