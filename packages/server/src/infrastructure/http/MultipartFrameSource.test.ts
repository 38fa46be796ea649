import { describe, it, expect } from 'vitest';
import { InvalidContentTypeError } from '@framevault/common-types';
import type { RawFramePart } from '@framevault/common-types';
import { findPartHeader, openMultipartFrameSource, toRawFrameParts } from './MultipartFrameSource.js';
import { once } from 'events';
import { IncomingMessage } from 'http';
import { Socket } from 'net';

const BOUNDARY = 'frameboundary';

interface FakePart {
  json: boolean;
  headers: Record<string, string>;
  body: unknown;
}

async function* fromParts(parts: FakePart[]): AsyncGenerator<FakePart> {
  for (const part of parts) {
    yield part;
  }
}

async function collect(source: AsyncIterable<RawFramePart>): Promise<RawFramePart[]> {
  const parts: RawFramePart[] = [];
  for await (const part of source) {
    parts.push(part);
  }
  return parts;
}

function requestWithContentType(contentType: string | undefined): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  if (contentType !== undefined) {
    req.headers['content-type'] = contentType;
  }
  return req;
}

function buildMultipartBody(parts: Array<[string, Buffer]>): Buffer {
  const chunks: Buffer[] = [];
  parts.forEach(([timestamp, jpeg], index) => {
    const delimiter = index === 0 ? `--${BOUNDARY}\r\n` : `\r\n--${BOUNDARY}\r\n`;
    chunks.push(Buffer.from(`${delimiter}Content-Type: image/jpeg\r\nX-Client-Timestamp: ${timestamp}\r\n\r\n`));
    chunks.push(jpeg);
  });
  chunks.push(Buffer.from(`\r\n--${BOUNDARY}--\r\n`));
  return Buffer.concat(chunks);
}

function multipartRequest(body: Buffer, chunkSize: number): IncomingMessage {
  const req = requestWithContentType(`multipart/form-data; boundary=${BOUNDARY}`);
  for (let offset = 0; offset < body.length; offset += chunkSize) {
    req.push(body.subarray(offset, offset + chunkSize));
  }
  req.push(null);
  return req;
}

describe('findPartHeader', () => {
  it('should match header names regardless of case', () => {
    const headers = { 'X-Client-Timestamp': '1000', 'content-type': 'image/jpeg' };

    expect(findPartHeader(headers, 'x-client-timestamp')).toBe('1000');
    expect(findPartHeader(headers, 'Content-Type')).toBe('image/jpeg');
    expect(findPartHeader(headers, 'x-missing')).toBeUndefined();
  });
});

describe('toRawFrameParts', () => {
  it('should pair each binary part with its timestamp header', async () => {
    const parts = await collect(
      toRawFrameParts(
        fromParts([
          { json: false, headers: { 'x-client-timestamp': '1000' }, body: Buffer.from('a') },
          { json: false, headers: {}, body: Buffer.from('b') },
        ])
      )
    );

    expect(parts).toEqual([
      { timestampHeader: '1000', data: Buffer.from('a') },
      { timestampHeader: undefined, data: Buffer.from('b') },
    ]);
  });

  it('should skip parts that are not binary', async () => {
    const parts = await collect(
      toRawFrameParts(
        fromParts([
          { json: true, headers: { 'x-client-timestamp': '1000' }, body: { hello: 'world' } },
          { json: false, headers: { 'x-client-timestamp': '2000' }, body: Buffer.from('jpeg') },
        ])
      )
    );

    expect(parts.map((part) => part.timestampHeader)).toEqual(['2000']);
  });
});

describe('openMultipartFrameSource', () => {
  it('should reject a request that is not multipart', async () => {
    await expect(openMultipartFrameSource(requestWithContentType('image/jpeg'))).rejects.toThrow(
      InvalidContentTypeError
    );
  });

  it('should split a chunked body into frames even when the JPEG contains a blank line', async () => {
    const first = Buffer.from([0xff, 0xd8, 0x0d, 0x0a, 0x0d, 0x0a, 0x41, 0xff, 0xd9]);
    const second = Buffer.from([0xff, 0xd8, 0x42, 0xff, 0xd9]);
    const req = multipartRequest(
      buildMultipartBody([
        ['1000', first],
        ['2000', second],
      ]),
      7
    );

    const parts = await collect(await openMultipartFrameSource(req));

    expect(parts.map((part) => [part.timestampHeader, part.data.toString('hex')])).toEqual([
      ['1000', 'ffd80d0a0d0a41ffd9'],
      ['2000', 'ffd842ffd9'],
    ]);
  });

  it('途中で読むのをやめてもリクエストは破棄せず残りを読み捨てる', async () => {
    const req = multipartRequest(
      buildMultipartBody([
        ['1000', Buffer.alloc(64 * 1024, 0x01)],
        ['2000', Buffer.alloc(64 * 1024, 0x02)],
        ['3000', Buffer.alloc(64 * 1024, 0x03)],
      ]),
      16 * 1024
    );

    const timestamps: Array<string | undefined> = [];
    for await (const part of await openMultipartFrameSource(req)) {
      timestamps.push(part.timestampHeader);
      break;
    }

    expect(timestamps).toEqual(['1000']);
    expect(req.destroyed).toBe(false);
    if (!req.readableEnded) {
      await once(req, 'end');
    }
    expect(req.readableEnded).toBe(true);
    expect(req.destroyed).toBe(false);
  });

  it('should reject a request without a content type', async () => {
    await expect(openMultipartFrameSource(requestWithContentType(undefined))).rejects.toThrow(
      'invalid Content-Type, must be multipart/*'
    );
  });
});
