export { TrackerSession } from './session.js';
export { decodeFrame, decodeStateBits, parseDeviceTimestamp } from './frameCodec.js';
export {
  CALIBRATION_POINT_NO_DATA,
  CALIBRATION_POINT_OK,
  CALIBRATION_POINT_RESAMPLE,
  parseCalibrationResult,
} from './calibration.js';
export { formatFrame, frameHeader } from './format.js';
export * from './errors.js';
export type * from '../types.js';
