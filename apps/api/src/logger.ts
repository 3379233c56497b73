import pino from 'pino';
import { getConfig } from './config';

export const logger = pino({
  level: getConfig().logLevel,
  base: { service: 'schema-ferry' },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: { level: (label: string) => ({ level: label }) }
});

export type Logger = pino.Logger;

export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}
