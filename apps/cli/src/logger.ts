import pino, { type Logger, type LevelWithSilent } from 'pino';

/**
 * Diagnostics go to stderr so stdout carries only command results.
 */
export function createLogger(level: LevelWithSilent): Logger {
  return pino({ name: 'ethkey', level }, pino.destination(2));
}
