import type { EyeSample, Frame, Point } from '../types.js';
import {
  STATE_EYES_PRESENT,
  STATE_FIXATION_CHANGED,
  STATE_GAZE_PRESENT,
  STATE_PUPIL_PRESENT,
  STATE_TRACKER_LOST,
} from './frameCodec.js';

const COLUMNS = [
  'eT', 'dT', 'aT', 'Fix', 'State',
  'Rwx', 'Rwy', 'Avx', 'Avy',
  'LRwx', 'LRwy', 'LAvx', 'LAvy', 'LPSz', 'LCx', 'LCy',
  'RRwx', 'RRwy', 'RAvx', 'RAvy', 'RPSz', 'RCx', 'RCy',
];

export function frameHeader(separator = ';'): string {
  return COLUMNS.join(separator);
}

function padded(value: number, width: number, decimals: number): string {
  const sign = value < 0 ? '-' : '';
  return sign + Math.abs(value).toFixed(decimals).padStart(width - sign.length, '0');
}

const STATE_FLAGS: Array<[number, string]> = [
  [STATE_TRACKER_LOST, 'L'],
  [STATE_FIXATION_CHANGED, 'F'],
  [STATE_PUPIL_PRESENT, 'P'],
  [STATE_EYES_PRESENT, 'E'],
  [STATE_GAZE_PRESENT, 'G'],
];

function stateFlags(stateBits: number): string {
  return STATE_FLAGS.map(([bit, flag]) => ((stateBits & bit) !== 0 ? flag : '.')).join('');
}

function screenPoint(point: Point, separator: string): string {
  return `${Math.trunc(point.x)}${separator}${Math.trunc(point.y)}`;
}

function eyeColumns(eye: EyeSample, separator: string): string {
  return [
    screenPoint(eye.raw, separator),
    screenPoint(eye.avg, separator),
    eye.pupilSize.toFixed(1),
    `${eye.pupilCenter.x.toFixed(3)}${separator}${eye.pupilCenter.y.toFixed(3)}`,
  ].join(separator);
}

/** One separator-joined line per frame, matching {@link frameHeader}. */
export function formatFrame(frame: Frame, separator = ';'): string {
  return [
    padded(frame.localReceiptTime, 14, 3),
    padded(frame.deviceTime, 7, 3),
    padded(frame.deviceTimestamp, 7, 3),
    frame.fixation ? 'F' : 'N',
    stateFlags(frame.stateBits),
    screenPoint(frame.rawGaze, separator),
    screenPoint(frame.avgGaze, separator),
    eyeColumns(frame.leftEye, separator),
    eyeColumns(frame.rightEye, separator),
  ].join(separator);
}
