import pino, { type LevelWithSilent, type Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/** Library default: diagnostics are dropped unless a caller injects a logger. */
export const silentLogger: Logger = pino({ level: 'silent' });

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

/** Diagnostic logger writing JSON lines to stderr, keeping stdout for the transcript. */
export function createDiagnosticLogger(level: LevelWithSilent): Logger {
  return pino({ name: 'cipherpack', level }, pino.destination(2));
}
