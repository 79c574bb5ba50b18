import { pino, type BaseLogger, type LevelWithSilent } from 'pino';

export type Logger = BaseLogger;

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: 'course-context', level });
}
