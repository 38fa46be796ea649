import type { StreamName } from '@framevault/common-types';
import { StorageAccessError, TranscoderError } from '@framevault/common-types';
import type { ITranscoderService, ITranscoderSink } from '../../domain/services/ITranscoderService.js';
import type { TranscoderConfig } from '../config/transcoderConfig.js';
import { spawn } from 'child_process';
import type { ChildProcessByStdio } from 'child_process';
import { once } from 'events';
import fs from 'fs/promises';
import path from 'path';
import type { Writable } from 'stream';

type FfmpegProcess = ChildProcessByStdio<Writable, null, null>;

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * MJPEG（標準入力）→ HLS のffmpeg引数を生成
 */
export function buildFfmpegArgs(config: TranscoderConfig, hlsStreamPath: string): string[] {
  const args = [
    '-f', 'mjpeg',
    '-framerate', String(config.framerate),
    '-i', '-',
    '-c:v', 'libx264',
    '-preset', 'veryfast',
    '-tune', 'zerolatency',
    '-crf', '23',
    '-g', '10',
    '-hls_time', '2',
    '-hls_list_size', '5',
    '-hls_flags', 'delete_segments',
    '-flush_packets', '1',
    '-hls_segment_filename', path.join(hlsStreamPath, 'segment%03d.ts'),
    path.join(hlsStreamPath, 'playlist.m3u8'),
  ];

  if (!config.verbose) {
    return ['-loglevel', 'error', ...args];
  }
  return args;
}

/**
 * ffmpegプロセスの標準入力
 */
class FfmpegProcessSink implements ITranscoderSink {
  private readonly exited: Promise<ProcessExit>;
  private ending: Promise<void> | null = null;
  private stdinError: Error | null = null;

  constructor(
    private readonly child: FfmpegProcess,
    private readonly streamName: StreamName,
    private readonly signal?: AbortSignal
  ) {
    this.exited = new Promise((resolve) => {
      child.once('close', (code, exitSignal) => resolve({ code, signal: exitSignal }));
    });

    // ffmpeg終了後の書き込みは EPIPE になる
    child.stdin.on('error', (error) => {
      this.stdinError = error;
    });

    child.on('error', (error) => {
      if (!this.signal?.aborted) {
        console.error(`❌ [Transcoder] ffmpeg process error for stream ${this.streamName}:`, error.message);
      }
    });
  }

  write(data: Buffer, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new TranscoderError(`Write to ffmpeg cancelled for stream ${this.streamName}`));
    }
    if (this.stdinError) {
      return Promise.reject(new TranscoderError(`ffmpeg input closed for stream ${this.streamName}: ${this.stdinError.message}`));
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        reject(new TranscoderError(`Write to ffmpeg cancelled for stream ${this.streamName}`));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      // コールバックはデータがパイプに渡った後に呼ばれる（ffmpegが詰まっている間は待機）
      this.child.stdin.write(data, (error) => {
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          reject(new TranscoderError(`Error writing frame to ffmpeg for stream ${this.streamName}: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  end(): Promise<void> {
    if (!this.ending) {
      this.ending = this.finish();
    }
    return this.ending;
  }

  private async finish(): Promise<void> {
    // ffmpegは標準入力がクローズされると終了する
    if (!this.child.stdin.writableEnded) {
      this.child.stdin.end();
    }

    const { code, signal } = await this.exited;
    if (code !== 0 && !this.signal?.aborted) {
      console.error(`❌ [Transcoder] ffmpeg for stream ${this.streamName} finished with error (code: ${code}, signal: ${signal})`);
      return;
    }
    console.log(`🎞️ [Transcoder] ffmpeg for stream ${this.streamName} exited`);
  }
}

/**
 * ffmpegを使ったHLSトランスコーダー
 *
 * Output Structure:
 * - /{hlsPath}/{streamName}/playlist.m3u8
 * - /{hlsPath}/{streamName}/segment000.ts, segment001.ts, ...
 */
export class FfmpegHlsTranscoderService implements ITranscoderService {
  private config: TranscoderConfig;

  constructor(config: TranscoderConfig) {
    this.config = config;
  }

  async start(streamName: StreamName, signal?: AbortSignal): Promise<ITranscoderSink> {
    const hlsStreamPath = path.join(this.config.hlsPath, streamName);

    // 前回のHLS出力を破棄
    try {
      await fs.rm(hlsStreamPath, { recursive: true, force: true });
      await fs.mkdir(hlsStreamPath, { recursive: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StorageAccessError(`Could not prepare HLS stream directory ${hlsStreamPath}: ${message}`);
    }

    const child = spawn(this.config.ffmpegPath, buildFfmpegArgs(this.config, hlsStreamPath), {
      stdio: ['pipe', 'inherit', 'inherit'],
      signal,
    });

    try {
      await once(child, 'spawn');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TranscoderError(`Failed to start ffmpeg for stream ${streamName}: ${message}`);
    }

    console.log(`🎬 [Transcoder] ffmpeg started for stream ${streamName} (pid: ${child.pid})`);
    return new FfmpegProcessSink(child, streamName, signal);
  }
}
