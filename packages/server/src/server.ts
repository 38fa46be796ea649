import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import dotenv from 'dotenv';
import { createServer } from 'http';
import { setupContainer } from './infrastructure/di/setupContainer.js';
import { getServerConfig } from './infrastructure/config/serverConfig.js';
import { createStreamsRouter } from './presentation/routes/streams.js';
import { errorHandler } from './presentation/middleware/errorHandler.js';
import type { StreamController } from './presentation/controllers/StreamController.js';

// Load environment variables
dotenv.config();

const app = express();
const { port: PORT, logLevel: LOG_LEVEL, corsOrigin: CORS_ORIGIN } = getServerConfig();

// Initialize DI Container
const container = setupContainer();
const streamController = container.resolve<StreamController>('StreamController');

// Middleware
app.use(cors({
  origin: CORS_ORIGIN,
}));
app.use(morgan(LOG_LEVEL === 'debug' ? 'dev' : 'combined'));

// API routes
// NOTE: アップロードはストリームで読むため、グローバルなボディパーサーは使わない
app.use('/api', createStreamsRouter(streamController));

// Health check endpoint
app.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime()
  });
});

// 404 handler
app.use((_req, res) => {
  res.status(404).json({ error: 'Not Found' });
});

// Error handler (must be last)
app.use(errorHandler);

// Create HTTP server
const httpServer = createServer(app);

// Start server
httpServer.listen(PORT, () => {
  console.log(`🚀 Frame archive server running on port ${PORT}`);
  console.log(`📊 Log level: ${LOG_LEVEL}`);
  console.log(`🏥 Health check: http://localhost:${PORT}/health`);
});

// 取り込みは長時間のアップロードになるためリクエストタイムアウトを無効化
httpServer.requestTimeout = 0;
httpServer.timeout = 0;
httpServer.keepAliveTimeout = 65000; // 65秒
httpServer.headersTimeout = 66000; // keepAliveTimeoutより長く

console.log(`🔄 Keep-Alive timeout: ${httpServer.keepAliveTimeout}ms`);

// Graceful shutdown
const shutdown = async (signal: string) => {
  console.log(`\n🛑 [Server] Received ${signal}, shutting down gracefully...`);
  // 取り込み中の接続を切断し、各セッションのキャンセルを発火させる
  httpServer.close((err) => {
    if (err) {
      console.error('❌ [Server] Error closing HTTP server:', err);
    }
  });
  httpServer.closeAllConnections();

  try {
    await streamController.drain();
    console.log('✅ [Server] All ingest sessions finalized');
  } catch (err) {
    console.error('❌ [Server] Error during shutdown:', err);
  }
  process.exit(0);
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
