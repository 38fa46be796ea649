import type { FrameTimestamp } from '@framevault/common-types';
import {
  FrameNotFoundError,
  InvalidStreamNameError,
  InvalidTimestampError,
  isValidStreamName,
  parseFrameTimestamp,
} from '@framevault/common-types';
import type { RetrievalEngine } from '../archive/RetrievalEngine.js';

/**
 * 時刻指定フレーム取得リクエスト
 */
export interface GetFrameAtTimeRequest {
  streamName: string;

  /** 10進数のUnix timestamp ms（URLパラメータそのまま） */
  timestamp: string;
}

export interface GetFrameAtTimeResponse {
  /** 実際に返すフレームの時刻 */
  timestamp: FrameTimestamp;
  segmentStart: FrameTimestamp;
  data: Buffer;
}

/**
 * 時刻指定フレーム取得 Use Case
 *
 * ビジネスフロー:
 * 1. ストリーム名・タイムスタンプの検証
 * 2. 指定時刻以前で最も新しいフレームを検索
 * 3. 見つからなければ FrameNotFoundError
 */
export class GetFrameAtTimeUseCase {
  private retrievalEngine: RetrievalEngine;

  constructor(retrievalEngine: RetrievalEngine) {
    this.retrievalEngine = retrievalEngine;
  }

  async execute(request: GetFrameAtTimeRequest): Promise<GetFrameAtTimeResponse> {
    if (!isValidStreamName(request.streamName)) {
      throw new InvalidStreamNameError(`Invalid stream name: ${request.streamName}`);
    }

    const target = parseFrameTimestamp(request.timestamp);
    if (target === null) {
      throw new InvalidTimestampError('Invalid timestamp format');
    }

    const result = await this.retrievalEngine.findFrame(request.streamName, target);
    if (!result.found) {
      throw new FrameNotFoundError(
        result.reason === 'no-segment'
          ? 'No archive file found covering the given timestamp'
          : 'No image found in archive matching or preceding the timestamp'
      );
    }

    return {
      timestamp: result.timestamp,
      segmentStart: result.segmentStart,
      data: result.data,
    };
  }
}
