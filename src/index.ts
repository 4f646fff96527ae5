#!/usr/bin/env node
import { config } from './config.js';
import { logger } from './lib/logger.js';
import { formatFrame, frameHeader } from './tracker/format.js';
import { TrackerSession } from './tracker/session.js';

const tracker = new TrackerSession();

async function main(): Promise<void> {
  await tracker.connect();
  logger.info(
    {
      host: tracker.host,
      port: tracker.port,
      heartbeatIntervalSeconds: tracker.heartbeatIntervalSeconds,
      calibrated: tracker.isCalibrated,
    },
    'demo_connected',
  );

  const first = await tracker.next();
  logger.info({ deviceTimestamp: first.deviceTimestamp }, 'demo_pulled_frame');

  process.stdout.write(`${frameHeader()}\n`);
  await tracker.pushmode();
  for (let count = 0; count < config.demoFrameCount; count += 1) {
    const frame = await tracker.next();
    process.stdout.write(`${formatFrame(frame)}\n`);
  }

  await tracker.pullmode();
  const leftover = tracker.drainFrames();
  logger.info({ leftover: leftover.length }, 'demo_pull_mode_restored');
  await tracker.close();
}

process.on('SIGINT', () => {
  logger.info('shutting_down');
  tracker.close(true).then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error({ err }, 'shutdown_failed');
      process.exit(1);
    },
  );
});

main().catch((err: unknown) => {
  logger.error({ err }, 'demo_failed');
  process.exitCode = 1;
  if (tracker.phase === 'connected') {
    tracker.close(true).catch((closeErr: unknown) => {
      logger.error({ err: closeErr }, 'shutdown_failed');
    });
  }
});
