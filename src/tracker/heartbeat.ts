import type { Socket } from 'node:net';
import type { Logger } from '../lib/logger.js';
import { send } from '../lib/utils.js';
import { requests } from './messages.js';

/** Writes the keep-alive request on a fixed interval. Never reads. */
export class HeartbeatGenerator {
  private timer: NodeJS.Timeout | null = null;
  private beats = 0;

  constructor(
    private readonly socket: Socket,
    private readonly intervalMs: number,
    private readonly log: Logger,
  ) {}

  start(): void {
    if (this.timer || this.intervalMs <= 0) return;
    this.beat();
    this.timer = setInterval(() => this.beat(), this.intervalMs);
    this.log.debug({ intervalMs: this.intervalMs }, 'heartbeat_started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.debug({ beats: this.beats }, 'heartbeat_stopped');
  }

  private beat(): void {
    if (!send(this.socket, requests.heartbeat)) {
      // socket is going away; close() or the listener stops us
      this.log.debug('heartbeat_skipped');
      return;
    }
    this.beats += 1;
  }
}
