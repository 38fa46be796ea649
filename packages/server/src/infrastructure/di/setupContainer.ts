import { DIContainer } from './DIContainer.js';
import { LocalFileSystemSegmentRepository } from '../repositories/LocalFileSystemSegmentRepository.js';
import { FfmpegHlsTranscoderService } from '../services/FfmpegHlsTranscoderService.js';
import { ConsoleIngestEventPublisher } from '../events/ConsoleIngestEventPublisher.js';
import { getArchiveConfig } from '../config/archiveConfig.js';
import { getTranscoderConfig } from '../config/transcoderConfig.js';

// Domain
import { RetrievalEngine } from '../../domain/archive/RetrievalEngine.js';

// Use Cases
import { IngestStreamUseCase } from '../../domain/usecases/IngestStream.usecase.js';
import { GetFrameAtTimeUseCase } from '../../domain/usecases/GetFrameAtTime.usecase.js';

// Controllers
import { StreamController } from '../../presentation/controllers/StreamController.js';

import type { ISegmentRepository } from '../../domain/repositories/ISegmentRepository.js';
import type { ITranscoderService } from '../../domain/services/ITranscoderService.js';
import type { IIngestEventPublisher } from '../../domain/events/IIngestEventPublisher.js';

/**
 * DIコンテナのセットアップ (Server-side)
 *
 * セグメントは ARCHIVE_PATH 配下のローカルファイルシステムに保存
 * ライブ配信は ffmpeg で HLS_PATH 配下に出力
 */
export function setupContainer(): DIContainer {
  const container = DIContainer.getInstance();

  // すでにセットアップ済みの場合はスキップ
  if (container.has('SegmentRepository')) {
    return container;
  }

  const archiveConfig = getArchiveConfig();
  const transcoderConfig = getTranscoderConfig();

  // Repositories / Services
  const segmentRepository = new LocalFileSystemSegmentRepository(archiveConfig.archivePath);
  console.log(`📦 Archive storage: Local filesystem (${archiveConfig.archivePath})`);
  console.log(`🔁 Rotation window: ${archiveConfig.rotationWindowMs}ms, handoff capacity: ${archiveConfig.handoffCapacity} frames`);

  const transcoderService = new FfmpegHlsTranscoderService(transcoderConfig);
  console.log(`🎬 HLS output: ${transcoderConfig.hlsPath} (ffmpeg: ${transcoderConfig.ffmpegPath})`);

  const ingestEventPublisher = new ConsoleIngestEventPublisher();

  container.register<ISegmentRepository>('SegmentRepository', segmentRepository);
  container.register<ITranscoderService>('TranscoderService', transcoderService);
  container.register<IIngestEventPublisher>('IngestEventPublisher', ingestEventPublisher);

  // Domain
  const retrievalEngine = new RetrievalEngine(segmentRepository, ingestEventPublisher);
  container.register('RetrievalEngine', retrievalEngine);

  // Use Cases
  const ingestStreamUseCase = new IngestStreamUseCase(
    segmentRepository,
    transcoderService,
    ingestEventPublisher,
    {
      rotationWindowMs: archiveConfig.rotationWindowMs,
      handoffCapacity: archiveConfig.handoffCapacity,
    }
  );
  container.register('IngestStreamUseCase', ingestStreamUseCase);

  const getFrameAtTimeUseCase = new GetFrameAtTimeUseCase(retrievalEngine);
  container.register('GetFrameAtTimeUseCase', getFrameAtTimeUseCase);

  // Controllers
  const streamController = new StreamController(ingestStreamUseCase, getFrameAtTimeUseCase);
  container.register('StreamController', streamController);

  console.log('✅ Server DIContainer setup complete');

  return container;
}
