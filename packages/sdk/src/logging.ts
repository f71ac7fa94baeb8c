import pino from 'pino';

export type LogLevel = pino.LevelWithSilent;

/**
 * Structured logger: a context object first, then the message.
 * Phrases, seeds and private keys must never appear in the context.
 */
export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}

export const makeLogger = (level: LogLevel = 'info', name = 'stakeline'): Logger =>
  pino({ level, name });

export function errorContext(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { err: error.name, reason: error.message };
  }
  return { reason: String(error) };
}
