import { pino } from 'pino';
import { config } from '../config.js';

export type { Logger } from 'pino';

export const logger = pino({
  name: 'framecast',
  level: config.logLevel,
});
