import type { StreamName } from '@framevault/common-types';

/**
 * ライブトランスコーダーの入力
 *
 * 順序付きのバイトストリームを受け付け、完了または失敗を通知する
 */
export interface ITranscoderSink {
  /**
   * JPEGフレームを書き込む
   * コンシューマーが詰まっている間は待機し、書き込めない場合は reject
   */
  write(data: Buffer, signal?: AbortSignal): Promise<void>;

  /**
   * 入力を閉じてトランスコーダーの終了を待つ（reject しない）
   */
  end(): Promise<void>;
}

/**
 * Transcoder Service Interface
 *
 * 実装: FfmpegHlsTranscoderService
 */
export interface ITranscoderService {
  /**
   * ストリーム用のトランスコーダーを起動
   * 起動に失敗した場合は TranscoderError
   */
  start(streamName: StreamName, signal?: AbortSignal): Promise<ITranscoderSink>;
}
