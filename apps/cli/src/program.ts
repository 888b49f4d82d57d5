/**
 * Commander wiring for the key tool. Each action parses its arguments,
 * calls the matching run* function and prints the result.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { Logger } from 'pino';
import { CRYPTO_VERSION } from '@ethkey/crypto';
import { ConfigError, type CliConfig, type OutputFormat } from './config';
import {
  runKeygen,
  formatKeygen,
  runAddress,
  formatAddress,
  runHash,
  formatHash,
  runSign,
  formatSign,
  runVerify,
  formatVerify,
  runRecover,
  formatRecover,
  runChecksum,
  formatChecksum,
  type HashBits,
} from './commands';

export interface ProgramContext {
  config: CliConfig;
  logger: Logger;
  /** Sink for command results; stdout by default */
  write?: (text: string) => void;
}

function parseBits(value: string): HashBits {
  if (value === '256') return 256;
  if (value === '512') return 512;
  throw new InvalidArgumentError('Must be 256 or 512.');
}

function parseRecoveryId(value: string): number {
  const id = Number(value);
  if (value.trim() === '' || Number.isNaN(id)) {
    throw new InvalidArgumentError('Must be a number.');
  }
  return id;
}

export function buildProgram({ config, logger, write = console.log }: ProgramContext): Command {
  const program = new Command();

  program
    .name('ethkey')
    .description('secp256k1 keys, checksum addresses, Keccak hashing and recoverable signatures')
    .version(CRYPTO_VERSION)
    .option('--json', 'print results as JSON');

  const emit = <T>(result: T, format: (result: T) => string): void => {
    const output: OutputFormat = program.opts<{ json?: boolean }>().json ? 'json' : config.output;
    write(output === 'json' ? JSON.stringify(result, null, 2) : format(result));
  };

  program
    .command('keygen')
    .description('generate a new private key')
    .action(() => {
      const result = runKeygen();
      logger.info({ address: result.address }, 'Generated key');
      emit(result, formatKeygen);
    });

  program
    .command('address')
    .description('derive the checksum address of a key')
    .argument('<key>', 'private key hex (or public key hex with --public)')
    .option('--public', 'treat <key> as a 65-byte public key')
    .action((key: string, options: { public?: boolean }) => {
      emit(runAddress(key, options), formatAddress);
    });

  program
    .command('hash')
    .description('Keccak digest of the input')
    .argument('<data>', 'text to hash (or hex with --hex)')
    .option('--hex', 'decode <data> as hex')
    .option('--bits <bits>', 'digest size: 256 or 512', parseBits, 256)
    .action((data: string, options: { hex?: boolean; bits: HashBits }) => {
      emit(runHash(data, options), formatHash);
    });

  program
    .command('sign')
    .description('sign keccak256 of a message')
    .argument('<message>', 'text to sign (or hex with --hex)')
    .option('--key <hex>', 'private key hex (default: ETHKEY_PRIVATE_KEY)')
    .option('--hex', 'decode <message> as hex')
    .action((message: string, options: { key?: string; hex?: boolean }) => {
      const key = options.key ?? config.privateKey;
      if (!key) {
        throw new ConfigError('No signing key: pass --key or set ETHKEY_PRIVATE_KEY');
      }

      const result = runSign(message, { key, hex: options.hex });
      logger.info({ signer: result.address, recoveryId: result.recoveryId }, 'Signed message');
      emit(result, formatSign);
    });

  program
    .command('verify')
    .description('verify a compact signature over keccak256 of a message')
    .argument('<message>', 'signed text (or hex with --hex)')
    .argument('<signature>', '64-byte compact signature hex')
    .argument('<publicKey>', '65-byte public key hex')
    .option('--hex', 'decode <message> as hex')
    .action((message: string, signature: string, publicKey: string, options: { hex?: boolean }) => {
      const result = runVerify(message, signature, publicKey, options);
      logger.debug({ valid: result.valid }, 'Verified signature');
      emit(result, formatVerify);
    });

  program
    .command('recover')
    .description('recover the signer from a 32-byte digest')
    .argument('<digest>', '32-byte digest hex (not hashed again)')
    .argument('<signature>', '64-byte compact signature hex')
    .argument('<recoveryId>', 'recovery id, 0 to 3', parseRecoveryId)
    .action((digest: string, signature: string, recoveryId: number) => {
      emit(runRecover(digest, signature, recoveryId), formatRecover);
    });

  program
    .command('checksum')
    .description('render an address in checksum form')
    .argument('<address>', '20-byte address hex')
    .action((address: string) => {
      emit(runChecksum(address), formatChecksum);
    });

  return program;
}
