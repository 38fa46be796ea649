import type { FrameTimestamp, StreamName } from '@framevault/common-types';
import { DomainError, SegmentCreationError, StorageAccessError } from '@framevault/common-types';
import type {
  ISegmentRepository,
  ISegmentWriter,
  SegmentDescriptor,
  SegmentEntryVisitor,
} from '../../domain/repositories/ISegmentRepository.js';
import { formatSegmentFileName, parseSegmentStart } from '../../domain/archive/segmentNaming.js';
import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { createReadStream } from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import tar from 'tar-stream';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * エントリのペイロードを読み切る
 */
function readEntry(stream: Readable): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('end', () => resolve(Buffer.concat(chunks)));
    stream.on('error', reject);
  });
}

/**
 * 1セグメント = 1つのtarファイル
 */
class TarSegmentWriter implements ISegmentWriter {
  private readonly pack = tar.pack();
  private readonly written: Promise<void>;
  private failure: unknown = null;
  private closing: Promise<void> | null = null;

  constructor(
    readonly segmentStart: FrameTimestamp,
    private readonly filePath: string,
    handle: FileHandle
  ) {
    const output = handle.createWriteStream();
    this.written = new Promise<void>((resolve, reject) => {
      output.on('close', () => resolve());
      output.on('error', (error) => {
        // 待機中のエントリも含めて pack ごと破棄する
        this.pack.destroy(error);
        reject(error);
      });
      this.pack.on('error', (error: unknown) => {
        output.destroy();
        reject(error);
      });
    });
    this.pack.pipe(output);
    // 書き込み失敗は appendEntry / close で呼び出し元に伝える
    this.written.catch((error: unknown) => {
      this.failure = error;
    });
  }

  appendEntry(name: string, data: Buffer): Promise<void> {
    if (this.failure !== null || this.pack.destroyed) {
      return Promise.reject(
        new StorageAccessError(`Segment ${this.filePath} is no longer writable: ${describeError(this.failure ?? 'stream destroyed')}`)
      );
    }
    if (this.closing) {
      return Promise.reject(new StorageAccessError(`Segment ${this.filePath} is already closed`));
    }

    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (error: unknown) => {
        if (settled) return;
        settled = true;
        if (error) {
          reject(new StorageAccessError(`Failed to write ${name} to ${this.filePath}: ${describeError(error)}`));
        } else {
          resolve();
        }
      };

      try {
        const sink = this.pack.entry(
          { name, size: data.length, mode: 0o644, mtime: new Date(), type: 'file' },
          data,
          settle
        );
        // 出力先の書き込みに失敗するとエントリのストリームも 'error' で破棄される
        sink.on('error', settle);
      } catch (error) {
        // 破棄済みの pack への追記は同期的に throw する
        settle(error);
      }
    });
  }

  close(): Promise<void> {
    if (!this.closing) {
      if (!this.pack.destroyed) {
        this.pack.finalize();
      }
      this.closing = this.written.catch((error: unknown) => {
        throw new StorageAccessError(`Failed to finalize archive file ${this.filePath}: ${describeError(error)}`);
      });
    }
    return this.closing;
  }
}

/**
 * ローカルファイルシステム Segment Repository の実装
 *
 * Storage Structure:
 * - /{basePath}/{streamName}/{streamName}_{segmentStart}.tar
 * - tar内の各エントリは "{timestamp}.jpg"、ペイロードはJPEGそのもの
 */
export class LocalFileSystemSegmentRepository implements ISegmentRepository {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  private getStreamPath(streamName: StreamName): string {
    return path.join(this.basePath, streamName);
  }

  async resetStream(streamName: StreamName): Promise<void> {
    const streamPath = this.getStreamPath(streamName);

    try {
      await fs.rm(streamPath, { recursive: true, force: true });
      await fs.mkdir(streamPath, { recursive: true });
    } catch (error) {
      throw new StorageAccessError(`Could not reset segment directory ${streamPath}: ${describeError(error)}`);
    }
  }

  async createSegment(streamName: StreamName, segmentStart: FrameTimestamp): Promise<ISegmentWriter> {
    const filePath = path.join(this.getStreamPath(streamName), formatSegmentFileName(streamName, segmentStart));

    let handle: FileHandle;
    try {
      handle = await fs.open(filePath, 'w', 0o644);
    } catch (error) {
      throw new SegmentCreationError(`Failed to create new tar file ${filePath}: ${describeError(error)}`);
    }

    console.log(`🗂️ [SegmentRepository] Created new archive file: ${filePath}`);
    return new TarSegmentWriter(segmentStart, filePath, handle);
  }

  async listSegments(streamName: StreamName): Promise<SegmentDescriptor[]> {
    const streamPath = this.getStreamPath(streamName);

    try {
      const files = await fs.readdir(streamPath, { withFileTypes: true });

      const segments: SegmentDescriptor[] = [];
      for (const file of files) {
        if (!file.isFile()) continue;

        const segmentStart = parseSegmentStart(file.name);
        if (segmentStart === null) continue;

        segments.push({ segmentStart, fileName: file.name });
      }

      return segments.sort((a, b) => a.segmentStart - b.segmentStart);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw new StorageAccessError(`Could not read stream directory ${streamPath}: ${describeError(error)}`);
    }
  }

  scanSegment(
    streamName: StreamName,
    segment: SegmentDescriptor,
    visitor: SegmentEntryVisitor
  ): Promise<void> {
    const filePath = path.join(this.getStreamPath(streamName), segment.fileName);

    return new Promise<void>((resolve, reject) => {
      const input = createReadStream(filePath);
      const extract = tar.extract();
      let settled = false;

      const stop = () => {
        settled = true;
        input.destroy();
        extract.destroy();
      };

      const fail = (error: unknown) => {
        if (settled) return;
        stop();
        reject(
          error instanceof DomainError
            ? error
            : new StorageAccessError(`Failed to read archive file ${filePath}: ${describeError(error)}`)
        );
      };

      extract.on('entry', (header, stream, next) => {
        // 通常ファイル以外は読み捨てる
        if (header.type !== 'file') {
          stream.on('end', next);
          stream.resume();
          return;
        }

        let consumed = false;
        const entry = {
          name: header.name,
          read: () => {
            consumed = true;
            return readEntry(stream);
          },
        };

        visitor(entry)
          .then(async (decision) => {
            if (settled) return;
            if (decision === 'stop') {
              stop();
              resolve();
              return;
            }

            if (!consumed) {
              await new Promise<void>((drained, failed) => {
                stream.on('end', () => drained());
                stream.on('error', failed);
                stream.resume();
              });
            }
            next();
          })
          .catch(fail);
      });

      extract.on('finish', () => {
        if (settled) return;
        settled = true;
        resolve();
      });
      extract.on('error', fail);
      input.on('error', fail);

      input.pipe(extract);
    });
  }
}
