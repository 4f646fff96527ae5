import type { CalibrationPoint, CalibrationResult } from '../types.js';
import { MalformedFrameError } from './errors.js';
import { calibrationResultSchema, type CalibrationResultPayload } from './schemas.js';

export const CALIBRATION_POINT_NO_DATA = 0;
export const CALIBRATION_POINT_RESAMPLE = 1;
export const CALIBRATION_POINT_OK = 2;

type PointPayload = CalibrationResultPayload['calibpoints'][number];

function toPoint(point: PointPayload): CalibrationPoint {
  return {
    state: point.state,
    targetPos: { x: point.cp.x, y: point.cp.y },
    correctedTargetPos: { x: point.mecp.x, y: point.mecp.y },
    angularDeviation: { combined: point.acd.ad, left: point.acd.adl, right: point.acd.adr },
    meanErrorPixels: { combined: point.mepix.mep, left: point.mepix.mepl, right: point.mepix.mepr },
    stddevPixels: { combined: point.asdp.asd, left: point.asdp.asdl, right: point.asdp.asdr },
  };
}

/** Parses `values.calibresult` from a `pointend` reply. Point order is kept. */
export function parseCalibrationResult(json: unknown): CalibrationResult {
  const data = calibrationResultSchema.safeParse(json);
  if (!data.success) {
    throw new MalformedFrameError(
      'Calibration result does not match the tracker schema',
      data.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return {
    succeeded: data.data.result,
    avgErrorDeg: data.data.deg,
    avgErrorDegLeft: data.data.degl,
    avgErrorDegRight: data.data.degr,
    points: data.data.calibpoints.map(toPoint),
  };
}
