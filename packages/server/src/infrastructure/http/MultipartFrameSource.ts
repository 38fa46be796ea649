import type { RawFramePart } from '@framevault/common-types';
import { FRAME_TIMESTAMP_HEADER, InvalidContentTypeError } from '@framevault/common-types';
import { IncomingMessage } from 'http';
import { Socket } from 'net';
import { meros } from 'meros/node';

interface MultipartPart {
  json: boolean;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * パートヘッダーを大文字小文字を区別せずに取得
 */
export function findPartHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * multipart のパートを Frame Source Adapter の出力に変換
 */
export async function* toRawFrameParts(parts: AsyncIterable<MultipartPart>): AsyncGenerator<RawFramePart> {
  for await (const part of parts) {
    const timestampHeader = findPartHeader(part.headers, FRAME_TIMESTAMP_HEADER);

    if (!Buffer.isBuffer(part.body)) {
      console.warn(`⚠️ [MultipartFrameSource] Skipping non-binary part (X-Client-Timestamp: ${timestampHeader ?? 'missing'})`);
      continue;
    }

    yield { timestampHeader, data: part.body };
  }
}

/**
 * リクエストボディをそのまま流す中継ストリーム
 */
class RelayedBody extends IncomingMessage {
  constructor(private readonly source: IncomingMessage) {
    super(new Socket());
    this.headers = source.headers;
  }

  _read(): void {
    this.source.resume();
  }
}

/**
 * 読み取りを途中でやめても破棄されるのは中継側だけで、元のリクエストは残りを読み捨てる
 * (取り込みを打ち切った後もレスポンスを返せる)
 */
function relayBody(req: IncomingMessage): IncomingMessage {
  const body = new RelayedBody(req);

  const onData = (chunk: Buffer) => {
    if (!body.push(chunk)) {
      req.pause();
    }
  };
  const onEnd = () => {
    body.push(null);
  };
  const onError = (error: Error) => {
    body.destroy(error);
  };
  const onClose = () => {
    if (!req.readableEnded) {
      body.destroy(new Error('request closed before the upload completed'));
    }
  };

  req.on('data', onData);
  req.on('end', onEnd);
  req.on('error', onError);
  req.on('close', onClose);

  body.once('close', () => {
    req.off('data', onData);
    req.off('end', onEnd);
    req.off('error', onError);
    req.off('close', onClose);
    if (!req.readableEnded) {
      req.resume();
    }
  });

  return body;
}

/**
 * アップロードのリクエストボディを (X-Client-Timestamp, JPEG) の遅延シーケンスとして開く
 *
 * Content-Type が multipart/* でなければ InvalidContentTypeError
 */
export async function openMultipartFrameSource(req: IncomingMessage): Promise<AsyncIterable<RawFramePart>> {
  const contentType = req.headers['content-type'];
  if (!contentType || !contentType.toLowerCase().startsWith('multipart/')) {
    throw new InvalidContentTypeError('invalid Content-Type, must be multipart/*');
  }

  const body = relayBody(req);
  const parts = await meros(body);
  if (parts instanceof IncomingMessage) {
    body.destroy();
    throw new InvalidContentTypeError('invalid Content-Type, must be multipart/*');
  }

  return toRawFrameParts(parts);
}
