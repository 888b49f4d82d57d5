#!/usr/bin/env tsx
/**
 * ethkey - command-line key tool
 *
 * Usage: ethkey <command> [options]
 * Environment: ETHKEY_PRIVATE_KEY, ETHKEY_OUTPUT, LOG_LEVEL (also read from .env)
 */

import dotenv from 'dotenv';
import { CryptoError } from '@ethkey/crypto';
import { loadConfig } from './config';
import { createLogger } from './logger';
import { buildProgram } from './program';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  try {
    await buildProgram({ config, logger }).parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CryptoError) {
      logger.error({ code: error.code }, error.message);
    } else {
      logger.error({ err: error }, 'Command failed');
    }
    process.exitCode = 1;
  }
}

main().catch((error) => {
  // Configuration errors happen before the logger exists
  console.error('ethkey failed:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
