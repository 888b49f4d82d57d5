/**
 * Key tool configuration.
 *
 * Read from the environment after dotenv has loaded `.env`.
 */

import type { LevelWithSilent } from 'pino';

export type OutputFormat = 'text' | 'json';

export interface CliConfig {
  /** Default signing key for `sign`, hex */
  privateKey?: string;
  logLevel: LevelWithSilent;
  output: OutputFormat;
}

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const rawLevel = env.LOG_LEVEL ?? 'info';
  const logLevel = LOG_LEVELS.find((level) => level === rawLevel);
  if (!logLevel) {
    throw new ConfigError(`Invalid LOG_LEVEL "${rawLevel}"; expected one of ${LOG_LEVELS.join(', ')}`);
  }

  const rawOutput = env.ETHKEY_OUTPUT ?? 'text';
  const output = OUTPUT_FORMATS.find((format) => format === rawOutput);
  if (!output) {
    throw new ConfigError(`Invalid ETHKEY_OUTPUT "${rawOutput}"; expected text or json`);
  }

  // Empty means unset
  const privateKey = env.ETHKEY_PRIVATE_KEY || undefined;

  return { privateKey, logLevel, output };
}
