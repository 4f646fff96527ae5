import type { EyeSample, Frame, FrameState, Point } from '../types.js';
import { MalformedFrameError } from './errors.js';
import { framePayloadSchema, type FramePayload } from './schemas.js';

export const STATE_GAZE_PRESENT = 0x01;
export const STATE_EYES_PRESENT = 0x02;
export const STATE_PUPIL_PRESENT = 0x04;
export const STATE_FIXATION_CHANGED = 0x08;
export const STATE_TRACKER_LOST = 0x10;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;

/**
 * Converts the device's `YYYY-MM-DD HH:MM:SS.ffffff` wall clock to epoch
 * seconds. The components are read literally in the local zone; the device
 * and the client are assumed to share one.
 */
export function parseDeviceTimestamp(value: string): number {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new MalformedFrameError(`Invalid device timestamp "${value}"`);
  }
  const [, year, month, day, hour, minute, second, fraction = ''] = match;
  const wholeMs = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
  ).getTime();
  const micros = Number(fraction.padEnd(6, '0'));
  return wholeMs / 1000 + micros / 1_000_000;
}

function toPoint(point: { x: number; y: number }): Point {
  return Object.freeze({ x: point.x, y: point.y });
}

function toEye(eye: FramePayload['lefteye']): EyeSample {
  return Object.freeze({
    raw: toPoint(eye.raw),
    avg: toPoint(eye.avg),
    pupilSize: eye.psize,
    pupilCenter: toPoint(eye.pcenter),
  });
}

/**
 * Decodes the `values.frame` object of a tracker reply. Throws
 * {@link MalformedFrameError} when any field is missing or has the wrong type.
 */
export function decodeFrame(json: unknown, receivedAt: number = Date.now() / 1000): Frame {
  const data = framePayloadSchema.safeParse(json);
  if (!data.success) {
    throw new MalformedFrameError(
      'Frame payload does not match the tracker schema',
      data.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const payload = data.data;

  return Object.freeze({
    localReceiptTime: receivedAt,
    deviceTime: payload.time / 1000,
    deviceTimestamp: parseDeviceTimestamp(payload.timestamp),
    fixation: payload.fix,
    stateBits: payload.state,
    rawGaze: toPoint(payload.raw),
    avgGaze: toPoint(payload.avg),
    leftEye: toEye(payload.lefteye),
    rightEye: toEye(payload.righteye),
  });
}

export function decodeStateBits(stateBits: number): FrameState {
  return {
    gazePresent: (stateBits & STATE_GAZE_PRESENT) !== 0,
    eyesPresent: (stateBits & STATE_EYES_PRESENT) !== 0,
    pupilPresent: (stateBits & STATE_PUPIL_PRESENT) !== 0,
    fixationChanged: (stateBits & STATE_FIXATION_CHANGED) !== 0,
    trackerLost: (stateBits & STATE_TRACKER_LOST) !== 0,
  };
}
