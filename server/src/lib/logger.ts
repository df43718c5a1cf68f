import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  name: 'ledfx-client-hub',
  level: config.logLevel,
});
