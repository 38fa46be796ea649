/**
 * ストリーム名（カメラ等の論理チャンネル）
 *
 * パスの1要素としてそのまま使うため、使用可能な文字を制限する
 */
export type StreamName = string;

const STREAM_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const STREAM_NAME_MAX_LENGTH = 128;

export function isValidStreamName(value: string): value is StreamName {
  return value.length <= STREAM_NAME_MAX_LENGTH && STREAM_NAME_PATTERN.test(value);
}
