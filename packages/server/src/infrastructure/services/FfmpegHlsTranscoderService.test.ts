import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TranscoderError } from '@framevault/common-types';
import { FfmpegHlsTranscoderService, buildFfmpegArgs } from './FfmpegHlsTranscoderService.js';
import type { TranscoderConfig } from '../config/transcoderConfig.js';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

describe('buildFfmpegArgs', () => {
  const config: TranscoderConfig = {
    hlsPath: '/data/hls',
    ffmpegPath: 'ffmpeg',
    verbose: false,
    framerate: 5,
  };

  it('should read MJPEG from stdin and write an HLS playlist', () => {
    const args = buildFfmpegArgs(config, '/data/hls/cam-1');

    expect(args.slice(0, 8)).toEqual(['-loglevel', 'error', '-f', 'mjpeg', '-framerate', '5', '-i', '-']);
    expect(args).toContain('/data/hls/cam-1/segment%03d.ts');
    expect(args[args.length - 1]).toBe('/data/hls/cam-1/playlist.m3u8');
  });

  it('should keep ffmpeg output when verbose', () => {
    const args = buildFfmpegArgs({ ...config, verbose: true, framerate: 10 }, '/data/hls/cam-1');

    expect(args.slice(0, 4)).toEqual(['-f', 'mjpeg', '-framerate', '10']);
    expect(args).not.toContain('-loglevel');
  });
});

describe('FfmpegHlsTranscoderService', () => {
  let hlsPath: string;

  beforeEach(async () => {
    hlsPath = await fs.mkdtemp(path.join(os.tmpdir(), 'framevault-hls-'));
  });

  afterEach(async () => {
    await fs.rm(hlsPath, { recursive: true, force: true });
  });

  it('should fail with TranscoderError when ffmpeg cannot be launched', async () => {
    const service = new FfmpegHlsTranscoderService({
      hlsPath,
      ffmpegPath: path.join(hlsPath, 'no-such-ffmpeg'),
      verbose: false,
      framerate: 5,
    });

    await expect(service.start('cam-1')).rejects.toThrow(TranscoderError);

    // 前回の出力を破棄した上で出力先は作成済み
    const stats = await fs.stat(path.join(hlsPath, 'cam-1'));
    expect(stats.isDirectory()).toBe(true);
  });
});
