import type { Frame } from '../types.js';

interface Waiter {
  resolve: (frame: Frame) => void;
  reject: (error: Error) => void;
}

/** Unbounded FIFO between the listener and `next()` callers. */
export class FrameQueue {
  private frames: Frame[] = [];
  private waiters: Waiter[] = [];

  push(frame: Frame): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
      return;
    }
    this.frames.push(frame);
  }

  shift(block: true): Promise<Frame>;
  shift(block: boolean): Promise<Frame | null>;
  shift(block: boolean): Promise<Frame | null> {
    const frame = this.frames.shift();
    if (frame) return Promise.resolve(frame);
    if (!block) return Promise.resolve(null);
    return new Promise<Frame>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  drain(): Frame[] {
    const drained = this.frames;
    this.frames = [];
    return drained;
  }

  /** Rejects every blocked `shift`; queued frames are kept. */
  abort(error: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((waiter) => waiter.reject(error));
  }

  clear(): void {
    this.frames = [];
  }

  get size(): number {
    return this.frames.length;
  }

  get blocked(): number {
    return this.waiters.length;
  }
}
