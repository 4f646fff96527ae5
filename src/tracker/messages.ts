export const STATUS_OK = 200;
export const STATUS_CALIBRATION_CHANGE = 800;

export type TrackerRequest =
  | { category: 'heartbeat' }
  | { category: 'tracker'; request: 'get'; values: string[] }
  | { category: 'tracker'; request: 'set'; values: { push: boolean } }
  | { category: 'calibration'; request: 'start'; values: { pointcount: number } }
  | { category: 'calibration'; request: 'pointstart'; values: { x: number; y: number } }
  | { category: 'calibration'; request: 'pointend' | 'abort' | 'clear' };

export const requests = {
  init: { category: 'tracker', request: 'get', values: ['iscalibrated', 'heartbeatinterval'] },
  setPush: { category: 'tracker', request: 'set', values: { push: true } },
  setPull: { category: 'tracker', request: 'set', values: { push: false } },
  getFrame: { category: 'tracker', request: 'get', values: ['frame'] },
  getScreenResolution: { category: 'tracker', request: 'get', values: ['screenresw', 'screenresh'] },
  heartbeat: { category: 'heartbeat' },
  calibrationPointEnd: { category: 'calibration', request: 'pointend' },
  calibrationAbort: { category: 'calibration', request: 'abort' },
  calibrationClear: { category: 'calibration', request: 'clear' },
} satisfies Record<string, TrackerRequest>;

export function calibrationStartRequest(pointCount: number): TrackerRequest {
  return { category: 'calibration', request: 'start', values: { pointcount: pointCount } };
}

export function calibrationPointStartRequest(x: number, y: number): TrackerRequest {
  return { category: 'calibration', request: 'pointstart', values: { x, y } };
}
