import type { Socket } from 'node:net';
import type { Logger } from '../lib/logger.js';
import type { Frame, FrameCallback, TrackerMode } from '../types.js';
import {
  ConnectionLostError,
  MalformedFrameError,
  StreamProtocolError,
  TrackerError,
  UnsolicitedReplyError,
} from './errors.js';
import { decodeFrame } from './frameCodec.js';
import type { FrameQueue } from './frameQueue.js';
import type { ReplyGate } from './gate.js';
import { STATUS_CALIBRATION_CHANGE, STATUS_OK } from './messages.js';
import { envelopeSchema, type TrackerMessage } from './schemas.js';

export type InboundMessage =
  | { kind: 'heartbeat'; message: TrackerMessage }
  | { kind: 'calibration-progress'; message: TrackerMessage }
  | { kind: 'frame'; message: TrackerMessage; payload: unknown }
  | { kind: 'reply'; message: TrackerMessage };

/** What the listener needs from the session that owns it. */
export interface ListenerContext {
  readonly mode: TrackerMode;
  readonly gate: ReplyGate;
  readonly frames: FrameQueue;
  readonly frameCallback: FrameCallback | null;
  /** True while silence on the socket means the link is dead. */
  expectingTraffic(): boolean;
  fail(error: TrackerError): void;
}

/**
 * Splits one read into JSON records. The tracker terminates every object
 * with a newline and may batch several per read; objects spanning two reads
 * are not reassembled.
 */
export function splitRecords(chunk: string): string[] {
  return chunk
    .split('\n')
    .map((record) => record.trim())
    .filter((record) => record !== '');
}

export function parseRecord(record: string): TrackerMessage {
  let json: unknown;
  try {
    json = JSON.parse(record);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedFrameError(`Invalid JSON from tracker: ${reason}`);
  }
  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new MalformedFrameError(
      'Message from tracker is not a reply envelope',
      envelope.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return envelope.data;
}

export function classifyMessage(message: TrackerMessage, mode: TrackerMode): InboundMessage {
  if (message.category === 'heartbeat') {
    return { kind: 'heartbeat', message };
  }
  if (message.category === 'calibration' && message.statuscode === STATUS_CALIBRATION_CHANGE) {
    return { kind: 'calibration-progress', message };
  }
  if (mode === 'push' && message.values && 'frame' in message.values) {
    return { kind: 'frame', message, payload: message.values.frame };
  }
  return { kind: 'reply', message };
}

/** Sole reader of the tracker socket; routes every inbound message. */
export class Listener {
  readonly closed: Promise<void>;
  private active = false;
  private watchdog: NodeJS.Timeout | null = null;
  private markClosed: () => void = () => undefined;

  constructor(
    private readonly socket: Socket,
    private readonly ctx: ListenerContext,
    private readTimeoutMs: number,
    private readonly log: Logger,
  ) {
    this.closed = new Promise<void>((resolve) => {
      this.markClosed = resolve;
    });
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.socket.setEncoding('utf8');

    this.socket.on('data', (chunk: Buffer | string) => {
      this.touch();
      this.handleChunk(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    });

    this.socket.on('error', (err) => {
      if (!this.active) {
        this.log.debug({ err }, 'listener_socket_error_after_close');
        return;
      }
      this.ctx.fail(new ConnectionLostError(err.message, err));
    });

    this.socket.on('close', () => {
      this.clearWatchdog();
      this.markClosed();
      if (this.active) {
        this.ctx.fail(new ConnectionLostError('socket closed by tracker'));
      }
    });

    this.armWatchdog();
  }

  /** Stops routing. The socket itself is torn down by the session. */
  stop(): void {
    this.active = false;
    this.clearWatchdog();
  }

  setReadTimeout(ms: number): void {
    this.readTimeoutMs = ms;
    if (this.active) {
      this.clearWatchdog();
      this.armWatchdog();
    }
  }

  /** Restarts the read timeout, as a fresh blocking read would. */
  touch(): void {
    this.watchdog?.refresh();
  }

  handleChunk(chunk: string): void {
    for (const record of splitRecords(chunk)) {
      if (!this.active) return;

      let message: TrackerMessage;
      try {
        message = parseRecord(record);
      } catch (error) {
        if (error instanceof TrackerError) {
          this.log.error({ err: error, record }, 'listener_malformed_message');
          this.ctx.fail(error);
          return;
        }
        throw error;
      }

      this.dispatch(classifyMessage(message, this.ctx.mode));
    }
  }

  private dispatch(inbound: InboundMessage): void {
    switch (inbound.kind) {
      case 'heartbeat':
        break;
      case 'calibration-progress':
        this.log.debug({ request: inbound.message.request }, 'calibration_progress');
        break;
      case 'frame':
        this.routeFrame(inbound.message, inbound.payload);
        break;
      case 'reply':
        if (!this.ctx.gate.deliver(inbound.message)) {
          this.ctx.fail(
            new UnsolicitedReplyError(inbound.message.category, inbound.message.statuscode),
          );
        }
        break;
    }
  }

  private routeFrame(message: TrackerMessage, payload: unknown): void {
    if (message.statuscode !== STATUS_OK) {
      this.ctx.fail(new StreamProtocolError(message.statuscode));
      return;
    }

    let frame: Frame;
    try {
      frame = decodeFrame(payload);
    } catch (error) {
      if (error instanceof MalformedFrameError) {
        this.log.warn({ issues: error.issues }, 'listener_invalid_frame');
        return;
      }
      throw error;
    }

    let suppress = false;
    const callback = this.ctx.frameCallback;
    if (callback) {
      try {
        suppress = callback(frame) === true;
      } catch (error) {
        this.log.error({ err: error }, 'frame_callback_failed');
      }
    }
    if (!suppress) {
      this.ctx.frames.push(frame);
    }
  }

  private armWatchdog(): void {
    this.watchdog = setTimeout(() => this.onReadTimeout(), this.readTimeoutMs);
  }

  private clearWatchdog(): void {
    if (!this.watchdog) return;
    clearTimeout(this.watchdog);
    this.watchdog = null;
  }

  private onReadTimeout(): void {
    if (!this.active) return;
    if (!this.ctx.expectingTraffic()) {
      this.armWatchdog();
      return;
    }
    this.log.warn({ readTimeoutMs: this.readTimeoutMs }, 'listener_read_timeout');
    this.ctx.fail(new ConnectionLostError(`no data for ${this.readTimeoutMs}ms`));
  }
}
