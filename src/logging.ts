import pino, { type Logger } from 'pino';
import type { LogLevel } from './types';

const REDACTED_PATHS = ['tronApiKey', 'config.tronApiKey', 'headers["TRON-PRO-API-KEY"]'];

export function createLogger(level: LogLevel, pretty: boolean): Logger {
  return pino({
    name: 'balance-harvest',
    level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: { colorize: true, singleLine: true, ignore: 'pid,hostname' }
        }
      : undefined
  });
}
