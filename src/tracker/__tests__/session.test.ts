/**
 * TrackerSession against an in-process fake tracker: handshake, gate
 * discipline, push/pull switching, calibration and failure handling.
 */

import { afterEach, describe, expect, it } from 'vitest';
import { TrackerSession } from '../session.js';
import { decodeStateBits } from '../frameCodec.js';
import {
  AlreadyConnectedError,
  ConnectionFailedError,
  ConnectionLostError,
  MalformedFrameError,
  NotConnectedError,
  StreamProtocolError,
  TrackerProtocolError,
  UnsolicitedReplyError,
} from '../errors.js';
import type { CalibrationResult, SessionOptions } from '../../types.js';
import {
  FakeTracker,
  asksFor,
  calibResult,
  delay,
  frameMessage,
  setsPush,
  waitFor,
  type FakeTrackerOptions,
} from './fakeTracker.js';

let tracker: FakeTracker | undefined;
let session: TrackerSession | undefined;

afterEach(async () => {
  if (session && session.phase !== 'disconnected') {
    await session.close(true);
  }
  await tracker?.stop();
  session = undefined;
  tracker = undefined;
});

async function setup(
  trackerOptions: FakeTrackerOptions = {},
  sessionOptions: SessionOptions = {},
): Promise<{ tracker: FakeTracker; session: TrackerSession }> {
  const fake = await FakeTracker.start(trackerOptions);
  tracker = fake;
  const created = new TrackerSession({ host: '127.0.0.1', port: fake.port, ...sessionOptions });
  session = created;
  await created.connect();
  return { tracker: fake, session: created };
}

const setAck = { category: 'tracker', request: 'set', statuscode: 200 };

describe('TrackerSession', () => {
  describe('connect', () => {
    it('learns the heartbeat interval and tightens the read timeout', async () => {
      const { tracker, session } = await setup({ heartbeatInterval: 500 });

      expect(session.phase).toBe('connected');
      expect(session.mode).toBe('pull');
      expect(session.heartbeatIntervalSeconds).toBe(0.5);
      expect(session.readTimeoutMs).toBe(1000);
      expect(session.isCalibrated).toBe(true);
      expect(tracker.received[0]).toEqual({
        category: 'tracker',
        request: 'get',
        values: ['iscalibrated', 'heartbeatinterval'],
      });
    });

    it('keeps the default read timeout when no heartbeat is required', async () => {
      const { tracker, session } = await setup({ calibrated: false }, { readTimeoutMs: 5000 });

      await delay(100);
      expect(session.heartbeatIntervalSeconds).toBe(0);
      expect(session.readTimeoutMs).toBe(5000);
      expect(session.isCalibrated).toBe(false);
      expect(tracker.requests('heartbeat')).toHaveLength(0);
    });

    it('refuses a second connect', async () => {
      const { session } = await setup();

      await expect(session.connect()).rejects.toBeInstanceOf(AlreadyConnectedError);
      expect(() => session.bind('127.0.0.1', 1)).toThrow(AlreadyConnectedError);
    });

    it('reports a refused connection', async () => {
      const fake = await FakeTracker.start();
      const port = fake.port;
      await fake.stop();
      const offline = new TrackerSession({ host: '127.0.0.1', port });

      await expect(offline.connect()).rejects.toBeInstanceOf(ConnectionFailedError);
      expect(offline.phase).toBe('disconnected');
    });

    it('can be rebound and reconnected after close', async () => {
      const fake = await FakeTracker.start();
      tracker = fake;
      const created = new TrackerSession({ host: '127.0.0.1', port: 1 });
      session = created;

      created.bind('127.0.0.1', fake.port);
      await created.connect();
      await created.close();
      expect(created.phase).toBe('disconnected');

      await created.connect();
      expect(created.phase).toBe('connected');
      expect(fake.requests('tracker', 'get')).toHaveLength(2);
    });

    it('forgets the calibrated flag of a previous connection', async () => {
      const { tracker, session } = await setup({ calibrated: true });
      expect(session.isCalibrated).toBe(true);
      await session.close();

      tracker.onRequest = (request, fake) => {
        if (!asksFor(request, 'heartbeatinterval')) return false;
        fake.write({ category: 'tracker', request: 'get', statuscode: 200, values: { heartbeatinterval: 0 } });
        return true;
      };
      await session.connect();

      expect(session.phase).toBe('connected');
      expect(session.isCalibrated).toBe(false);
    });
  });

  describe('heartbeat', () => {
    it('sends keep-alives on the reported interval', async () => {
      const { tracker, session } = await setup({ heartbeatInterval: 100 });

      await waitFor(() => tracker.requests('heartbeat').length >= 3);
      expect(session.phase).toBe('connected');
      expect(tracker.requests('heartbeat')[0]).toEqual({
        category: 'heartbeat',
        request: undefined,
        values: undefined,
      });
    });
  });

  describe('request/reply gate', () => {
    it('returns a pulled frame in pull mode', async () => {
      const { tracker, session } = await setup();

      const frame = await session.next();

      expect(tracker.received.at(-1)).toEqual({
        category: 'tracker',
        request: 'get',
        values: ['frame'],
      });
      expect(frame.deviceTime).toBe(1234.567);
      expect(decodeStateBits(frame.stateBits).gazePresent).toBe(true);
    });

    it('fetches the screen resolution', async () => {
      const { session } = await setup();

      await expect(session.getScreenResolution()).resolves.toEqual({ width: 1920, height: 1080 });
    });

    it('raises the tracker status and stays usable', async () => {
      const { session } = await setup({
        onRequest: (request, fake) => {
          if (request.category !== 'calibration' || request.request !== 'start') return false;
          fake.write({
            category: 'calibration',
            request: 'start',
            statuscode: 503,
            statusmessage: 'Calibration busy',
          });
          return true;
        },
      });

      const error = await session.calibrationStart(9).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TrackerProtocolError);
      expect(error).toMatchObject({ statusCode: 503, code: 'TRACKER_PROTOCOL' });
      expect(session.phase).toBe('connected');
      await expect(session.getScreenResolution()).resolves.toEqual({ width: 1920, height: 1080 });
    });

    it('holds a second request back until the first reply arrives', async () => {
      let stalls = 0;
      const { tracker, session } = await setup({
        onRequest: (request) => {
          if (!asksFor(request, 'screenresw') || stalls > 0) return false;
          stalls += 1;
          return true;
        },
      });

      const first = session.getScreenResolution();
      const second = session.calibrationStart(9);
      await waitFor(() => stalls === 1);
      await delay(50);

      expect(tracker.requests('calibration')).toHaveLength(0);
      expect(session.gate.queued).toBe(1);

      tracker.write({
        category: 'tracker',
        request: 'get',
        statuscode: 200,
        values: { screenresw: 800, screenresh: 600 },
      });

      await expect(first).resolves.toEqual({ width: 800, height: 600 });
      await second;
      expect(tracker.requests('calibration', 'start')).toHaveLength(1);
    });

    it('gives each concurrent caller its own reply', async () => {
      let served = 0;
      const { session } = await setup({
        onRequest: (request, fake) => {
          if (!asksFor(request, 'screenresw')) return false;
          fake.write({
            category: 'tracker',
            request: 'get',
            statuscode: 200,
            values: { screenresw: 1000 + served, screenresh: 500 },
          });
          served += 1;
          return true;
        },
      });

      const results = await Promise.all(
        Array.from({ length: 5 }, () => session.getScreenResolution()),
      );

      expect(results.map((result) => result.width)).toEqual([1000, 1001, 1002, 1003, 1004]);
      expect(served).toBe(5);
    });

    it('treats a reply nobody asked for as fatal', async () => {
      const { tracker, session } = await setup();

      tracker.write({ category: 'tracker', request: 'get', statuscode: 200, values: {} });

      await waitFor(() => session.phase === 'failed');
      expect(session.failure).toBeInstanceOf(UnsolicitedReplyError);
      await expect(session.getScreenResolution()).rejects.toBeInstanceOf(UnsolicitedReplyError);
    });

    it('treats unparsable data as fatal', async () => {
      const { tracker, session } = await setup();

      tracker.writeRaw('not json\n');

      await waitFor(() => session.phase === 'failed');
      expect(session.failure).toBeInstanceOf(MalformedFrameError);
    });
  });

  describe('push mode', () => {
    it('queues streamed frames in order', async () => {
      const { tracker, session } = await setup();

      await session.pushmode();
      expect(session.mode).toBe('push');
      tracker.write(frameMessage(1000), frameMessage(2000), frameMessage(3000));

      expect((await session.next()).deviceTime).toBe(1);
      expect((await session.next()).deviceTime).toBe(2);
      expect((await session.next()).deviceTime).toBe(3);
      await expect(session.next(false)).resolves.toBeNull();
    });

    it('streams a frame that shares a read with the push acknowledgement', async () => {
      const { session } = await setup({
        onRequest: (request, fake) => {
          if (!setsPush(request, true)) return false;
          fake.write(setAck, frameMessage(7000));
          return true;
        },
      });

      await session.pushmode();

      expect((await session.next()).deviceTime).toBe(7);
      expect(session.phase).toBe('connected');
    });

    it('lets the callback keep frames out of the queue', async () => {
      const { tracker, session } = await setup();
      const seen: number[] = [];

      await session.pushmode((frame) => {
        seen.push(frame.deviceTime);
        return frame.deviceTime === 2;
      });
      tracker.write(frameMessage(1000), frameMessage(2000), frameMessage(3000));

      await waitFor(() => seen.length === 3);
      expect(seen).toEqual([1, 2, 3]);
      expect(session.drainFrames().map((frame) => frame.deviceTime)).toEqual([1, 3]);
    });

    it('drops a malformed pushed frame and keeps streaming', async () => {
      const { tracker, session } = await setup();

      await session.pushmode();
      tracker.write(
        { category: 'tracker', request: 'get', statuscode: 200, values: { frame: { time: 1 } } },
        frameMessage(2000),
      );

      expect((await session.next()).deviceTime).toBe(2);
      expect(session.phase).toBe('connected');
    });

    it('ignores heartbeat and calibration progress messages', async () => {
      const { tracker, session } = await setup();

      await session.pushmode();
      tracker.write(
        { category: 'heartbeat', statuscode: 200 },
        { category: 'calibration', statuscode: 800 },
        frameMessage(4000),
      );

      expect((await session.next()).deviceTime).toBe(4);
      expect(session.frames.size).toBe(0);
    });

    it('fails the session on a bad stream status', async () => {
      const { tracker, session } = await setup();

      await session.pushmode();
      const blocked = expect(session.next()).rejects.toBeInstanceOf(StreamProtocolError);
      tracker.write(frameMessage(1000, 500));

      await blocked;
      expect(session.phase).toBe('failed');
      expect(session.failure).toMatchObject({ statusCode: 500 });
      await expect(session.getScreenResolution()).rejects.toBeInstanceOf(StreamProtocolError);

      await session.close();
      expect(session.phase).toBe('disconnected');
    });

    it('is a no-op when already pushing', async () => {
      const { tracker, session } = await setup();

      await session.pushmode();
      await session.pushmode();

      expect(tracker.received.filter((request) => setsPush(request, true))).toHaveLength(1);
    });
  });

  describe('pull mode', () => {
    it('keeps a frame that shares a read with the pull acknowledgement', async () => {
      const { tracker, session } = await setup({
        onRequest: (request, fake) => {
          if (!setsPush(request, false)) return false;
          fake.write(frameMessage(5000), setAck);
          return true;
        },
      });

      await session.pushmode(() => false);
      await session.pullmode();

      expect(session.mode).toBe('pull');
      expect(session.frameCallback).toBeNull();
      expect(session.drainFrames().map((frame) => frame.deviceTime)).toEqual([5]);
      expect(session.phase).toBe('connected');

      await session.next();
      expect(tracker.received.filter((request) => asksFor(request, 'frame'))).toHaveLength(1);
    });

    it('keeps a frame that follows the pull acknowledgement in the same read', async () => {
      const seen: number[] = [];
      const { tracker, session } = await setup({
        onRequest: (request, fake) => {
          if (!setsPush(request, false)) return false;
          fake.write(setAck, frameMessage(6000));
          return true;
        },
      });

      await session.pushmode((frame) => {
        seen.push(frame.deviceTime);
      });
      await session.pullmode();

      expect(session.phase).toBe('connected');
      expect(session.mode).toBe('pull');
      expect(session.frameCallback).toBeNull();
      expect(seen).toEqual([6]);
      expect(session.drainFrames().map((frame) => frame.deviceTime)).toEqual([6]);

      await session.next();
      expect(tracker.received.filter((request) => asksFor(request, 'frame'))).toHaveLength(1);
    });

    it('is a no-op when already pulling', async () => {
      const { tracker, session } = await setup();

      await session.pullmode();

      expect(tracker.received.filter((request) => request.request === 'set')).toHaveLength(0);
    });
  });

  describe('calibration', () => {
    it('collects the result of a nine-point calibration', async () => {
      let pointEnds = 0;
      const { tracker, session } = await setup({
        onRequest: (request, fake) => {
          if (request.category !== 'calibration' || request.request !== 'pointend') return false;
          pointEnds += 1;
          const reply =
            pointEnds === 9
              ? { category: 'calibration', request: 'pointend', statuscode: 200, values: { calibresult: calibResult(9) } }
              : { category: 'calibration', request: 'pointend', statuscode: 200 };
          fake.write({ category: 'calibration', statuscode: 800 }, reply);
          return true;
        },
      });

      expect(session.latestCalibrationResult()).toBeNull();
      await session.calibrationStart(9);
      const results: Array<CalibrationResult | null> = [];
      for (let index = 0; index < 9; index += 1) {
        await session.calibrationPointStart(100 * index, 50);
        results.push(await session.calibrationPointEnd());
      }

      expect(results.slice(0, 8)).toEqual(Array(8).fill(null));
      const result = results[8];
      expect(result?.points).toHaveLength(9);
      expect(result?.points.map((point) => point.targetPos.x)).toEqual([
        0, 100, 200, 300, 400, 500, 600, 700, 800,
      ]);
      expect(session.latestCalibrationResult()).toBe(result);
      expect(tracker.requests('calibration', 'start')[0]?.values).toEqual({ pointcount: 9 });
      expect(tracker.requests('calibration', 'pointstart')[3]?.values).toEqual({ x: 300, y: 50 });
    });

    it('sends abort and clear', async () => {
      const { tracker, session } = await setup();

      await session.calibrationAbort();
      await session.calibrationClear();

      expect(tracker.requests('calibration').map((request) => request.request)).toEqual([
        'abort',
        'clear',
      ]);
    });
  });

  describe('connection loss', () => {
    it('fails blocked callers when the read times out', async () => {
      const { session } = await setup(
        { onRequest: (request) => asksFor(request, 'screenresw') },
        { readTimeoutMs: 150 },
      );

      const first = expect(session.getScreenResolution()).rejects.toBeInstanceOf(ConnectionLostError);
      const second = expect(session.calibrationStart(9)).rejects.toBeInstanceOf(ConnectionLostError);

      await first;
      await second;
      expect(session.phase).toBe('failed');
      await expect(session.next()).rejects.toBeInstanceOf(ConnectionLostError);

      await session.close();
      expect(session.phase).toBe('disconnected');
    });

    it('stays connected while idle without heartbeats', async () => {
      const { session } = await setup({}, { readTimeoutMs: 100 });

      await delay(300);

      expect(session.phase).toBe('connected');
    });

    it('fails a blocked reader when the tracker hangs up', async () => {
      const { tracker, session } = await setup();

      await session.pushmode();
      const blocked = expect(session.next()).rejects.toBeInstanceOf(ConnectionLostError);
      tracker.dropClient();

      await blocked;
      expect(session.phase).toBe('failed');
    });
  });

  describe('close', () => {
    it('unblocks a waiting caller with NotConnected', async () => {
      let stalled = false;
      const { session } = await setup({
        onRequest: (request) => {
          stalled = asksFor(request, 'screenresw');
          return stalled;
        },
      });

      const blocked = expect(session.getScreenResolution()).rejects.toBeInstanceOf(NotConnectedError);
      await waitFor(() => stalled);
      await session.close();

      await blocked;
      expect(session.phase).toBe('disconnected');
    });

    it('unblocks a waiting push reader', async () => {
      const { session } = await setup();

      await session.pushmode();
      const blocked = expect(session.next()).rejects.toBeInstanceOf(NotConnectedError);
      await session.close(true);

      await blocked;
      expect(session.mode).toBe('pull');
    });

    it('refuses to close twice', async () => {
      const { session } = await setup({ heartbeatInterval: 200 });

      await session.close();

      await expect(session.close()).rejects.toBeInstanceOf(NotConnectedError);
      await expect(session.getScreenResolution()).rejects.toBeInstanceOf(NotConnectedError);
    });
  });
});
