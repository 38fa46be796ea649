/**
 * 受信結果
 */
export type HandoffReceiveResult<T> = { done: false; value: T } | { done: true };

/**
 * オファー結果
 * - accepted: キューに格納（または待機中の受信側に直接受け渡し）
 * - full: 容量超過のため破棄
 * - closed: クローズ済みのため破棄
 */
export type HandoffOfferResult = 'accepted' | 'full' | 'closed';

type Waiter<T> = (result: HandoffReceiveResult<T>) => void;

/**
 * FrameHandoff
 *
 * 受信側（Dispatch Pipeline）とArchive Writerをつなぐ固定容量のキュー
 * 送信側は決してブロックしない（満杯なら tryOffer が 'full' を返す）
 * 受信側はフレーム到着・クローズ・キャンセルのいずれか早いものまで待機する
 */
export class FrameHandoff<T extends object> {
  private readonly buffer: T[] = [];
  private readonly waiters = new Set<Waiter<T>>();
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Handoff capacity must be a positive integer: ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * ノンブロッキングでアイテムを投入
   */
  tryOffer(item: T): HandoffOfferResult {
    if (this.closed) {
      return 'closed';
    }

    // 待機中の受信側がいる場合、バッファは必ず空
    const [waiter] = this.waiters;
    if (waiter) {
      this.waiters.delete(waiter);
      waiter({ done: false, value: item });
      return 'accepted';
    }

    if (this.buffer.length >= this.capacity) {
      return 'full';
    }

    this.buffer.push(item);
    return 'accepted';
  }

  /**
   * 次のアイテムを受信
   *
   * バッファ済みのアイテムはクローズ・キャンセル後も先に返す
   * バッファが空でクローズ済み、またはキャンセル済みなら done
   */
  receive(signal?: AbortSignal): Promise<HandoffReceiveResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ done: false, value: item });
    }

    if (this.closed || signal?.aborted) {
      return Promise.resolve({ done: true });
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiters.delete(waiter);
        resolve({ done: true });
      };
      const waiter: Waiter<T> = (result) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      this.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * これ以上アイテムが来ないことを通知（複数回呼び出し可）
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.waiters) {
      waiter({ done: true });
    }
    this.waiters.clear();
  }
}
