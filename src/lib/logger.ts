import pino from 'pino';
import type { Logger } from 'pino';

function createLogger(): Logger {
  const isDevelopment = process.env.NODE_ENV !== 'production';
  const level = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');
  return pino({
    level,
    base: { service: 'repo-risk-classifier', env: process.env.NODE_ENV || 'development' },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export const logger = createLogger();

export type { Logger };
