import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export type { Logger } from 'pino';

export type CreateLoggerOptions = {
  name?: string;
  level?: string;
  env?: Record<string, string | undefined>;
};

const DEFAULT_LEVEL = 'warn';

export function resolveLogLevel(env: Record<string, string | undefined> = process.env): string {
  const configured = env.ESFORGE_LOG_LEVEL?.trim().toLowerCase();
  return configured && configured.length > 0 ? configured : DEFAULT_LEVEL;
}

export const loggerOptions = (name: string, level: string): LoggerOptions => ({
  name,
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel(options.env);
  return pino(loggerOptions(options.name ?? 'esforge', level));
}

export const silentLogger: Logger = pino({ level: 'silent' });
