import net, { type Socket } from 'node:net';
import { v4 as uuid } from 'uuid';
import { config } from '../config.js';
import { logger, type Logger } from '../lib/logger.js';
import { send, settlesWithin } from '../lib/utils.js';
import type {
  CalibrationResult,
  Frame,
  FrameCallback,
  ScreenResolution,
  SessionOptions,
  SessionPhase,
  TrackerMode,
} from '../types.js';
import { parseCalibrationResult } from './calibration.js';
import {
  AlreadyConnectedError,
  ConnectionFailedError,
  MalformedFrameError,
  NotConnectedError,
  ShutdownTimeoutError,
  TrackerError,
  TrackerProtocolError,
} from './errors.js';
import { decodeFrame } from './frameCodec.js';
import { FrameQueue } from './frameQueue.js';
import { ReplyGate } from './gate.js';
import { HeartbeatGenerator } from './heartbeat.js';
import { Listener, type ListenerContext } from './listener.js';
import {
  STATUS_OK,
  calibrationPointStartRequest,
  calibrationStartRequest,
  requests,
  type TrackerRequest,
} from './messages.js';
import {
  initValuesSchema,
  screenResolutionValuesSchema,
  type TrackerMessage,
} from './schemas.js';

interface Link {
  socket: Socket;
  listener: Listener;
  heartbeat: HeartbeatGenerator | null;
}

type SessionState =
  | { phase: 'disconnected' }
  | { phase: 'connected'; link: Link }
  | { phase: 'failed'; error: TrackerError };

function openSocket(host: string, port: number, timeoutMs: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const onError = (err: Error) => {
      socket.destroy();
      reject(new ConnectionFailedError(host, port, err));
    };
    socket.once('error', onError);
    socket.setTimeout(timeoutMs, () => {
      socket.destroy(new Error(`connect timed out after ${timeoutMs}ms`));
    });
    socket.once('connect', () => {
      socket.setTimeout(0);
      socket.removeListener('error', onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}

/**
 * One TCP connection to a tracker. Request/reply commands share the socket
 * with the push-mode frame stream; a single listener reads everything and
 * routes replies through the gate and frames to the queue.
 */
export class TrackerSession implements ListenerContext {
  readonly id = uuid();
  readonly gate = new ReplyGate();
  readonly frames = new FrameQueue();

  private state: SessionState = { phase: 'disconnected' };
  private currentMode: TrackerMode = 'pull';
  private callback: FrameCallback | null = null;
  private hostname: string;
  private portNumber: number;
  private readonly defaultReadTimeoutMs: number;
  private readonly shutdownCapMs: number;
  private readTimeoutValue: number;
  private intervalMs = 0;
  private calibrated = false;
  private calibration: CalibrationResult | null = null;
  private readonly log: Logger;

  constructor(options: SessionOptions = {}) {
    this.hostname = options.host ?? config.host;
    this.portNumber = options.port ?? config.port;
    this.defaultReadTimeoutMs = options.readTimeoutMs ?? config.readTimeoutMs;
    this.shutdownCapMs = options.shutdownCapMs ?? config.shutdownCapMs;
    this.readTimeoutValue = this.defaultReadTimeoutMs;
    this.log = logger.child({ sessionId: this.id });
  }

  get phase(): SessionPhase {
    return this.state.phase;
  }

  get mode(): TrackerMode {
    return this.currentMode;
  }

  get frameCallback(): FrameCallback | null {
    return this.callback;
  }

  get failure(): TrackerError | null {
    return this.state.phase === 'failed' ? this.state.error : null;
  }

  get host(): string {
    return this.hostname;
  }

  get port(): number {
    return this.portNumber;
  }

  get heartbeatIntervalSeconds(): number {
    return this.intervalMs / 1000;
  }

  get readTimeoutMs(): number {
    return this.readTimeoutValue;
  }

  get isCalibrated(): boolean {
    return this.calibrated;
  }

  expectingTraffic(): boolean {
    return this.intervalMs > 0 || this.currentMode === 'push' || this.gate.awaitingReply;
  }

  bind(host: string, port: number): void {
    if (this.state.phase === 'connected') {
      throw new AlreadyConnectedError();
    }
    this.hostname = host;
    this.portNumber = port;
  }

  async connect(): Promise<void> {
    if (this.state.phase === 'connected') {
      throw new AlreadyConnectedError();
    }

    const socket = await openSocket(this.hostname, this.portNumber, this.defaultReadTimeoutMs);
    this.currentMode = 'pull';
    this.callback = null;
    this.intervalMs = 0;
    this.calibrated = false;
    this.readTimeoutValue = this.defaultReadTimeoutMs;
    this.frames.clear();

    const listener = new Listener(socket, this, this.defaultReadTimeoutMs, this.log);
    const link: Link = { socket, listener, heartbeat: null };
    this.state = { phase: 'connected', link };
    listener.start();

    try {
      const reply = await this.tellTracker(requests.init);
      const values = initValuesSchema.safeParse(reply.values ?? {});
      if (!values.success) {
        throw new MalformedFrameError(
          'Tracker did not report a heartbeat interval',
          values.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
      }
      this.intervalMs = values.data.heartbeatinterval;
      this.calibrated = values.data.iscalibrated ?? false;

      if (this.intervalMs > 0) {
        this.readTimeoutValue = this.intervalMs * 2;
        listener.setReadTimeout(this.readTimeoutValue);
        link.heartbeat = new HeartbeatGenerator(socket, this.intervalMs, this.log);
        link.heartbeat.start();
      }
    } catch (error) {
      if (this.state.phase === 'connected' && this.state.link === link) {
        this.detach(link, new NotConnectedError('Tracker handshake failed'));
      }
      this.state = { phase: 'disconnected' };
      throw error;
    }

    this.log.info(
      {
        host: this.hostname,
        port: this.portNumber,
        heartbeatIntervalMs: this.intervalMs,
        calibrated: this.calibrated,
      },
      'tracker_connected',
    );
  }

  /**
   * Tears the link down. Blocked callers reject with `NotConnected`. Unless
   * `quick`, waits for the socket to finish closing and throws
   * `ShutdownTimeout` when it does not in time.
   */
  async close(quick = false): Promise<void> {
    if (this.state.phase === 'failed') {
      this.log.info({ code: this.state.error.code }, 'failed_session_reset');
      this.state = { phase: 'disconnected' };
      return;
    }
    if (this.state.phase === 'disconnected') {
      throw new NotConnectedError('Tracker connection is already closed');
    }

    const { link } = this.state;
    this.state = { phase: 'disconnected' };
    this.detach(link, new NotConnectedError('Tracker connection closed'));
    this.log.info({ quick }, 'tracker_closing');

    if (quick) return;

    const graceMs =
      this.intervalMs > 0 ? Math.min(this.intervalMs * 3, this.shutdownCapMs) : this.shutdownCapMs;
    const stopped = await settlesWithin(link.listener.closed, graceMs);
    if (!stopped) {
      throw new ShutdownTimeoutError(graceMs);
    }
    this.log.info('tracker_closed');
  }

  async pushmode(callback?: FrameCallback): Promise<void> {
    this.requireLink();
    if (this.currentMode === 'push') return;

    if (callback) {
      this.callback = callback;
    }
    try {
      await this.tellTracker(requests.setPush, () => {
        this.currentMode = 'push';
      });
    } catch (error) {
      if (this.mode !== 'push') {
        this.callback = null;
      }
      throw error;
    }
    this.log.info({ callback: this.callback !== null }, 'push_mode_enabled');
  }

  async pullmode(): Promise<void> {
    this.requireLink();
    if (this.currentMode === 'pull') return;

    // Frames that follow the acknowledgement in the same read are still
    // routed as push frames; the switch happens once that read is done.
    await this.tellTracker(requests.setPull);
    this.currentMode = 'pull';
    this.callback = null;
    this.log.info({ queued: this.frames.size }, 'pull_mode_enabled');
  }

  /**
   * Push mode: the oldest queued frame, waiting for one when `block` is set
   * and returning null otherwise. Pull mode: requests a frame from the tracker.
   */
  next(): Promise<Frame>;
  next(block: true): Promise<Frame>;
  next(block: boolean): Promise<Frame | null>;
  async next(block = true): Promise<Frame | null> {
    this.requireLink();
    if (this.currentMode === 'push') {
      return this.frames.shift(block);
    }
    const reply = await this.tellTracker(requests.getFrame);
    return decodeFrame(reply.values?.frame);
  }

  /** Removes and returns every queued frame, oldest first. */
  drainFrames(): Frame[] {
    return this.frames.drain();
  }

  async getScreenResolution(): Promise<ScreenResolution> {
    const reply = await this.tellTracker(requests.getScreenResolution);
    const values = screenResolutionValuesSchema.safeParse(reply.values ?? {});
    if (!values.success) {
      throw new MalformedFrameError(
        'Tracker did not report a screen resolution',
        values.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    return { width: values.data.screenresw, height: values.data.screenresh };
  }

  async calibrationStart(pointCount: number): Promise<void> {
    await this.tellTracker(calibrationStartRequest(pointCount));
    this.log.info({ pointCount }, 'calibration_started');
  }

  async calibrationPointStart(x: number, y: number): Promise<void> {
    await this.tellTracker(calibrationPointStartRequest(x, y));
  }

  /**
   * Ends the current point. The reply to the last point carries the
   * calibration result, which replaces the stored one and is returned.
   */
  async calibrationPointEnd(): Promise<CalibrationResult | null> {
    const reply = await this.tellTracker(requests.calibrationPointEnd);
    const raw = reply.values?.calibresult;
    if (raw === undefined) return null;

    const result = parseCalibrationResult(raw);
    this.calibration = result;
    this.log.info(
      { succeeded: result.succeeded, avgErrorDeg: result.avgErrorDeg, points: result.points.length },
      'calibration_completed',
    );
    return result;
  }

  async calibrationAbort(): Promise<void> {
    await this.tellTracker(requests.calibrationAbort);
    this.log.info('calibration_aborted');
  }

  async calibrationClear(): Promise<void> {
    await this.tellTracker(requests.calibrationClear);
    this.log.info('calibration_cleared');
  }

  latestCalibrationResult(): CalibrationResult | null {
    return this.calibration;
  }

  /**
   * Sends one request and waits for its reply while holding the gate.
   * `onAccepted` runs on the listener path as soon as a 200 reply arrives.
   */
  async tellTracker(message: TrackerRequest, onAccepted?: () => void): Promise<TrackerMessage> {
    this.requireLink();
    const ticket = await this.gate.acquire();
    try {
      const link = this.requireLink();
      const reply = await ticket.exchange(() => {
        if (!send(link.socket, message)) {
          throw new NotConnectedError();
        }
        link.listener.touch();
      }, onAccepted);

      if (reply.statuscode !== STATUS_OK) {
        throw new TrackerProtocolError(reply.statuscode, reply.statusmessage);
      }
      return reply;
    } finally {
      ticket.release();
    }
  }

  /** Moves a connected session to `failed`; called from the listener. */
  fail(error: TrackerError): void {
    if (this.state.phase !== 'connected') return;
    const { link } = this.state;
    this.state = { phase: 'failed', error };
    this.log.error({ err: error, code: error.code }, 'session_failed');
    this.detach(link, error);
  }

  private requireLink(): Link {
    switch (this.state.phase) {
      case 'connected':
        return this.state.link;
      case 'failed':
        throw this.state.error;
      case 'disconnected':
        throw new NotConnectedError();
    }
  }

  private detach(link: Link, error: TrackerError): void {
    link.listener.stop();
    link.heartbeat?.stop();
    link.socket.destroy();
    this.currentMode = 'pull';
    this.callback = null;
    this.gate.abort(error);
    this.frames.abort(error);
  }
}
