import pino from 'pino';
import { config } from '../config';

/**
 * Process-wide structured logger.
 *
 * Fields first, message second: logger.info({ latency }, 'Retrieval completed')
 */
export const logger = pino({
  level: config.logLevel,
  base: { service: 'corpus-gate-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
