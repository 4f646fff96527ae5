import { ReentrantProtocolError } from './errors.js';
import { STATUS_OK } from './messages.js';
import type { TrackerMessage } from './schemas.js';

/** Promise-chain mutex; `acquire` resolves with the matching release. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  acquire(): Promise<() => void> {
    const previous = this.tail;
    let unlock: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      unlock = () => resolve();
    });
    this.tail = previous.then(() => held);
    this.waiting += 1;
    return previous.then(() => {
      this.waiting -= 1;
      return unlock;
    });
  }

  get pending(): number {
    return this.waiting;
  }
}

interface InFlight {
  resolve: (reply: TrackerMessage) => void;
  reject: (error: Error) => void;
  onAccepted?: () => void;
}

export interface GateTicket {
  /**
   * Runs `write` and waits for the next reply the listener delivers.
   * `onAccepted` runs synchronously on the listener path when that reply
   * carries status 200, before any later message of the same read.
   */
  exchange(write: () => void, onAccepted?: () => void): Promise<TrackerMessage>;
  release(): void;
}

/**
 * Single-slot rendezvous between request/reply callers and the listener.
 * Only a ticket holder can open the reply slot, so at most one request is
 * in flight.
 */
export class ReplyGate {
  private readonly mutex = new Mutex();
  private inFlight: InFlight | null = null;

  async acquire(): Promise<GateTicket> {
    const unlock = await this.mutex.acquire();
    let released = false;

    return {
      exchange: (write, onAccepted) => {
        if (released) {
          return Promise.reject(new Error('Gate ticket used after release'));
        }
        if (this.inFlight) {
          return Promise.reject(new ReentrantProtocolError());
        }
        return new Promise<TrackerMessage>((resolve, reject) => {
          this.inFlight = { resolve, reject, onAccepted };
          try {
            write();
          } catch (error) {
            this.inFlight = null;
            reject(error instanceof Error ? error : new Error(String(error)));
          }
        });
      },
      release: () => {
        if (released) return;
        released = true;
        unlock();
      },
    };
  }

  get awaitingReply(): boolean {
    return this.inFlight !== null;
  }

  get queued(): number {
    return this.mutex.pending;
  }

  /** Hands a reply to the waiting caller. Returns false when nobody waits. */
  deliver(reply: TrackerMessage): boolean {
    const slot = this.inFlight;
    if (!slot) return false;
    this.inFlight = null;
    if (reply.statuscode === STATUS_OK) {
      slot.onAccepted?.();
    }
    slot.resolve(reply);
    return true;
  }

  /** Rejects the in-flight exchange, if any. Queued callers are not touched. */
  abort(error: Error): void {
    const slot = this.inFlight;
    if (!slot) return;
    this.inFlight = null;
    slot.reject(error);
  }
}
