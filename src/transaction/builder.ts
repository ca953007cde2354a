import { bytesToHex, concatBytes, hexToBytes } from '../utils/hex.js';
import { assertUint32, serCompactSize, serUint32 } from './serialize.js';
import { type Decoded, deserCompactSize, deserUint32 } from './deserialize.js';
import { type CTxIn, serializeTxIn, deserializeTxIn } from './structures.js';

/**
 * Inputs-only transaction: version, inputs, lock time. No outputs or witness data.
 */
export interface Transaction {
  readonly version: number;
  readonly vin: readonly CTxIn[];
  readonly lockTime: number;
}

/**
 * Create a transaction; `version` and `lockTime` must be unsigned 32-bit integers
 */
export function createTransaction(
  version: number,
  vin: readonly CTxIn[],
  lockTime: number
): Transaction {
  return {
    version: assertUint32(version, 'version'),
    vin: [...vin],
    lockTime: assertUint32(lockTime, 'lockTime'),
  };
}

/**
 * Serialize a complete transaction
 */
export function serializeTransaction(tx: Transaction): Uint8Array {
  const parts: Uint8Array[] = [serUint32(tx.version)];

  // Inputs
  parts.push(serCompactSize(tx.vin.length));
  for (const vin of tx.vin) {
    parts.push(serializeTxIn(vin));
  }

  // Lock time
  parts.push(serUint32(tx.lockTime));

  return concatBytes(...parts);
}

/**
 * Deserialize a transaction from the start of `bytes`.
 *
 * Any failing input aborts the whole decode. Bytes after the lock time are ignored;
 * `bytesRead` tells the caller where the transaction ended.
 */
export function deserializeTransaction(bytes: Uint8Array): Decoded<Transaction> {
  const version = deserUint32(bytes, 0, 'transaction version');
  const count = deserCompactSize(bytes.subarray(4));

  const vin: CTxIn[] = [];
  let cursor = 4 + count.bytesRead;
  for (let i = 0n; i < count.value; i++) {
    const input = deserializeTxIn(bytes.subarray(cursor));
    vin.push(input.value);
    cursor += input.bytesRead;
  }

  const lockTime = deserUint32(bytes, cursor, 'transaction lock time');
  return { value: { version, vin, lockTime }, bytesRead: cursor + 4 };
}

/**
 * Serialize a transaction to lowercase hex
 */
export function encodeTransactionHex(tx: Transaction): string {
  return bytesToHex(serializeTransaction(tx));
}

/**
 * Deserialize a transaction from hex, ignoring any trailing bytes
 */
export function decodeTransactionHex(hex: string): Transaction {
  return deserializeTransaction(hexToBytes(hex)).value;
}

/**
 * Human-readable view, one field per line. One-way: there is no parser for it.
 */
export function formatTransaction(tx: Transaction): string {
  const lines = [`Version: ${tx.version}`];
  for (const input of tx.vin) {
    lines.push(`Previous Output Vout: ${input.prevout.vout}`);
    lines.push(`ScriptSig Length: ${input.scriptSig.bytes.length}`);
    lines.push(`ScriptSig: ${bytesToHex(input.scriptSig.bytes)}`);
    lines.push(`Sequence: ${input.sequence}`);
  }
  lines.push(`Lock Time: ${tx.lockTime}`);
  return lines.join('\n') + '\n';
}
