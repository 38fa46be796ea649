import type { FrameTimestamp, StreamName } from '@framevault/common-types';

export const SEGMENT_FILE_EXTENSION = '.tar';
export const ENTRY_FILE_EXTENSION = '.jpg';

/**
 * セグメント開始時刻の桁数
 * Unix timestamp ms は2286年まで13桁なので、ゼロ埋めすればファイル名順 = 開始時刻順になる
 */
const SEGMENT_START_DIGITS = 13;

const DECIMAL = /^\d+$/;

function parseDecimal(value: string): FrameTimestamp | null {
  if (!DECIMAL.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * セグメントのファイル名を生成
 * 例: cam-1_1718000000000.tar, cam-1_0000000060000.tar
 */
export function formatSegmentFileName(streamName: StreamName, segmentStart: FrameTimestamp): string {
  const start = String(segmentStart).padStart(SEGMENT_START_DIGITS, '0');
  return `${streamName}_${start}${SEGMENT_FILE_EXTENSION}`;
}

/**
 * セグメントのファイル名から開始時刻を取り出す
 *
 * 最後の "_" 以降を開始時刻として扱う（ゼロ埋めなしの名前も受け付ける）
 */
export function parseSegmentStart(fileName: string): FrameTimestamp | null {
  if (!fileName.endsWith(SEGMENT_FILE_EXTENSION)) {
    return null;
  }

  const base = fileName.slice(0, -SEGMENT_FILE_EXTENSION.length);
  const separator = base.lastIndexOf('_');
  if (separator < 0) {
    return null;
  }

  return parseDecimal(base.slice(separator + 1));
}

export function formatEntryName(timestamp: FrameTimestamp): string {
  return `${timestamp}${ENTRY_FILE_EXTENSION}`;
}

export function parseEntryTimestamp(entryName: string): FrameTimestamp | null {
  const base = entryName.endsWith(ENTRY_FILE_EXTENSION)
    ? entryName.slice(0, -ENTRY_FILE_EXTENSION.length)
    : entryName;
  return parseDecimal(base);
}
