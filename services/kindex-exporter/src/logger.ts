import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export const createLogger = (level: string): LoggerOptions => ({
  level,
  name: 'kindex-exporter',
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label })
  }
});
