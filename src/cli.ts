import { Command } from 'commander';
import { type CliOptions, resolveConfig } from './config.js';
import { TxCodecError, TxCodecErrorCodes } from './errors.js';
import { bytesToHex, hexToBytes } from './utils/hex.js';
import {
  MAX_UINT64,
  serCompactSize,
  deserializeTransaction,
  encodeTransactionHex,
  formatTransaction,
  transactionFromJSON,
  transactionToJSON,
} from './transaction/index.js';

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TxCodecError(
      TxCodecErrorCodes.InvalidFormat,
      'Input is not valid JSON',
      error instanceof Error ? error.message : String(error)
    );
  }
}

function parseMagnitude(text: string): bigint {
  const value = /^\d+$/.test(text) ? BigInt(text) : -1n;
  if (value < 0n || value > MAX_UINT64) {
    throw new TxCodecError(
      TxCodecErrorCodes.InvalidFormat,
      `Not an unsigned 64-bit integer: ${text}`
    );
  }
  return value;
}

/**
 * Build the txcodec command line program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('txcodec')
    .description('Encode, decode and inspect inputs-only Bitcoin transactions');

  program
    .command('decode')
    .description('Decode a raw transaction given as hex')
    .argument('<hex>', 'serialized transaction')
    .option('-f, --format <format>', 'output format: text or json')
    .option('-v, --verbose', 'report consumed and trailing bytes')
    .action((hex: string, options: CliOptions) => {
      const config = resolveConfig(options);
      const bytes = hexToBytes(hex);
      const { value: tx, bytesRead } = deserializeTransaction(bytes);

      if (config.verbose) {
        console.error(`Decoded ${bytesRead} bytes, ${bytes.length - bytesRead} trailing`);
      }

      if (config.format === 'json') {
        console.log(JSON.stringify(transactionToJSON(tx), null, 2));
      } else {
        console.log(formatTransaction(tx).trimEnd());
      }
    });

  program
    .command('encode')
    .description('Encode a JSON transaction to hex')
    .argument('<json>', 'transaction as JSON')
    .action((json: string) => {
      console.log(encodeTransactionHex(transactionFromJSON(parseJson(json))));
    });

  program
    .command('varint')
    .description('Show the compact size encoding of a number')
    .argument('<value>', 'unsigned 64-bit decimal value')
    .action((value: string) => {
      console.log(bytesToHex(serCompactSize(parseMagnitude(value))));
    });

  return program;
}
