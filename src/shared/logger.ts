import pino, { type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** The only logging capability the runners need. A pino logger satisfies it. */
export interface DebugSink {
  debug(data: Record<string, unknown>, message: string): void;
}

export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'exec-tools', level }, pino.destination(2));
}
