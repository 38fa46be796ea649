import express from 'express';
import type { StreamController } from '../controllers/StreamController.js';
import { asyncHandler } from '../middleware/errorHandler.js';

/**
 * Streams Router
 *
 * NOTE: アップロードはmultipartのままストリームで読むため、ボディパーサーは使わない
 */
export function createStreamsRouter(streamController: StreamController): express.Router {
  const router = express.Router();

  /**
   * POST /api/streams/:streamName
   * フレームを取り込む（multipart/*、各パートに X-Client-Timestamp ヘッダー）
   */
  router.post('/streams/:streamName', asyncHandler(async (req, res) => {
    await streamController.ingestStream(req, res);
  }));

  /**
   * GET /api/streams/:streamName/images/:timestamp
   * 指定時刻以前で最も新しいフレームを取得
   */
  router.get('/streams/:streamName/images/:timestamp', asyncHandler(async (req, res) => {
    await streamController.getImage(req, res);
  }));

  return router;
}
