import { describe, it, expect } from 'vitest';
import { FrameHandoff } from './FrameHandoff.js';

interface Item {
  id: number;
}

describe('FrameHandoff', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new FrameHandoff<Item>(0)).toThrow(RangeError);
    expect(() => new FrameHandoff<Item>(1.5)).toThrow(RangeError);
  });

  it('accepts items up to capacity and reports full afterwards', () => {
    const handoff = new FrameHandoff<Item>(2);

    expect(handoff.tryOffer({ id: 1 })).toBe('accepted');
    expect(handoff.tryOffer({ id: 2 })).toBe('accepted');
    expect(handoff.tryOffer({ id: 3 })).toBe('full');
    expect(handoff.size).toBe(2);
  });

  it('delivers buffered items in offer order', async () => {
    const handoff = new FrameHandoff<Item>(4);
    handoff.tryOffer({ id: 1 });
    handoff.tryOffer({ id: 2 });

    expect(await handoff.receive()).toEqual({ done: false, value: { id: 1 } });
    expect(await handoff.receive()).toEqual({ done: false, value: { id: 2 } });
    expect(handoff.size).toBe(0);
  });

  it('hands an item straight to a waiting receiver', async () => {
    const handoff = new FrameHandoff<Item>(1);
    const pending = handoff.receive();

    expect(handoff.tryOffer({ id: 7 })).toBe('accepted');
    expect(handoff.size).toBe(0);
    expect(await pending).toEqual({ done: false, value: { id: 7 } });
  });

  it('ends pending receivers on close and refuses later offers', async () => {
    const handoff = new FrameHandoff<Item>(1);
    const pending = handoff.receive();

    handoff.close();

    expect(await pending).toEqual({ done: true });
    expect(handoff.tryOffer({ id: 1 })).toBe('closed');
    expect(handoff.isClosed).toBe(true);
  });

  it('allows close to be called more than once', () => {
    const handoff = new FrameHandoff<Item>(1);
    handoff.close();
    expect(() => handoff.close()).not.toThrow();
  });

  it('drains buffered items after close before reporting done', async () => {
    const handoff = new FrameHandoff<Item>(2);
    handoff.tryOffer({ id: 1 });
    handoff.close();

    expect(await handoff.receive()).toEqual({ done: false, value: { id: 1 } });
    expect(await handoff.receive()).toEqual({ done: true });
  });

  it('ends a pending receive when the signal aborts', async () => {
    const handoff = new FrameHandoff<Item>(1);
    const controller = new AbortController();
    const pending = handoff.receive(controller.signal);

    controller.abort();

    expect(await pending).toEqual({ done: true });
    // 中断された受信側には渡らずバッファに入る
    expect(handoff.tryOffer({ id: 1 })).toBe('accepted');
    expect(handoff.size).toBe(1);
  });

  it('still returns buffered items when the signal is already aborted', async () => {
    const handoff = new FrameHandoff<Item>(2);
    const controller = new AbortController();
    handoff.tryOffer({ id: 1 });
    controller.abort();

    expect(await handoff.receive(controller.signal)).toEqual({ done: false, value: { id: 1 } });
    expect(await handoff.receive(controller.signal)).toEqual({ done: true });
  });
});
