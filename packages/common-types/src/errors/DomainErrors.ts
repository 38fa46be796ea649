/**
 * ドメインエラーの基底クラス
 */
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    // prototypeチェーンの復元（TypeScriptのextends Errorの問題対応）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * リクエスト関連エラー
 */
export class InvalidStreamNameError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_STREAM_NAME');
  }
}

export class InvalidTimestampError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_TIMESTAMP');
  }
}

export class InvalidContentTypeError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_CONTENT_TYPE');
  }
}

/**
 * Retrieval関連エラー
 */
export class FrameNotFoundError extends DomainError {
  constructor(message: string) {
    super(message, 'FRAME_NOT_FOUND');
  }
}

/**
 * ストレージ関連エラー
 */
export class StorageAccessError extends DomainError {
  constructor(message: string) {
    super(message, 'STORAGE_ACCESS_ERROR');
  }
}

export class SegmentCreationError extends DomainError {
  constructor(message: string) {
    super(message, 'SEGMENT_CREATION_ERROR');
  }
}

/**
 * トランスコーダー関連エラー
 */
export class TranscoderError extends DomainError {
  constructor(message: string) {
    super(message, 'TRANSCODER_ERROR');
  }
}
