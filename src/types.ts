export type TrackerMode = 'pull' | 'push';

export type SessionPhase = 'disconnected' | 'connected' | 'failed';

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface EyeSample {
  readonly raw: Point;
  readonly avg: Point;
  readonly pupilSize: number;
  /** Pupil center relative to the eye's bounding box. */
  readonly pupilCenter: Point;
}

export interface Frame {
  /** Epoch seconds at which the client decoded the frame. */
  readonly localReceiptTime: number;
  /** Device monotonic clock, seconds. */
  readonly deviceTime: number;
  /** Device wall clock, epoch seconds with microsecond precision. */
  readonly deviceTimestamp: number;
  readonly fixation: boolean;
  readonly stateBits: number;
  readonly rawGaze: Point;
  readonly avgGaze: Point;
  readonly leftEye: EyeSample;
  readonly rightEye: EyeSample;
}

export interface FrameState {
  gazePresent: boolean;
  eyesPresent: boolean;
  pupilPresent: boolean;
  fixationChanged: boolean;
  trackerLost: boolean;
}

/**
 * Invoked on the listener path for every pushed frame. Returning `true`
 * keeps the frame out of the queue read by `next()`.
 */
export type FrameCallback = (frame: Frame) => boolean | void;

export interface EyeTriple {
  combined: number;
  left: number;
  right: number;
}

export interface CalibrationPoint {
  /** Device status for the point: 0 no data, 1 resample, 2 ok. */
  state: number;
  targetPos: Point;
  correctedTargetPos: Point;
  /** Degrees of visual angle. */
  angularDeviation: EyeTriple;
  meanErrorPixels: EyeTriple;
  stddevPixels: EyeTriple;
}

export interface CalibrationResult {
  succeeded: boolean;
  avgErrorDeg: number;
  avgErrorDegLeft: number;
  avgErrorDegRight: number;
  points: CalibrationPoint[];
}

export interface ScreenResolution {
  width: number;
  height: number;
}

export interface SessionOptions {
  host?: string;
  port?: number;
  /** Read timeout used until the device reports its heartbeat interval. */
  readTimeoutMs?: number;
  /** Upper bound on how long `close()` waits for the socket to finish. */
  shutdownCapMs?: number;
}
