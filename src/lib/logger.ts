import pino from 'pino';
import { config } from '../config.js';

export type { Logger } from 'pino';

export const logger = pino({
  name: 'gazelink',
  level: config.logLevel,
});
