import pino from 'pino';

export interface LoggerOptions {
  level?: string;
}

export function createLogger(options: LoggerOptions = {}) {
  return pino({ level: options.level ?? 'info' });
}

export type Logger = Pick<
  ReturnType<typeof createLogger>,
  'info' | 'error' | 'warn' | 'debug'
>;
