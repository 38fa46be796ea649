/**
 * キャプチャ時刻（Unix timestamp ms）
 */
export type FrameTimestamp = number;

/**
 * 1枚のJPEGフレーム
 */
export interface Frame {
  /** プロデューサー側で付与されたキャプチャ時刻 */
  readonly timestamp: FrameTimestamp;

  /** JPEGのバイナリデータ */
  readonly data: Buffer;
}

/**
 * Frame Source Adapterが返す未検証のパート
 */
export interface RawFramePart {
  /** X-Client-Timestamp ヘッダーの生の値（欠落時は undefined） */
  timestampHeader: string | undefined;

  data: Buffer;
}

/**
 * パートヘッダー名
 */
export const FRAME_TIMESTAMP_HEADER = 'x-client-timestamp';

const DECIMAL_TIMESTAMP = /^\d+$/;

/**
 * 10進数のタイムスタンプ文字列をパースする
 *
 * 非負の安全な整数でない場合は null
 */
export function parseFrameTimestamp(value: string | undefined): FrameTimestamp | null {
  if (value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  if (!DECIMAL_TIMESTAMP.test(trimmed)) {
    return null;
  }

  const timestamp = Number(trimmed);
  return Number.isSafeInteger(timestamp) ? timestamp : null;
}
