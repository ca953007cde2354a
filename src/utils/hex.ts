import {
  bytesToHex as nobleBytesToHex,
  hexToBytes as nobleHexToBytes,
  concatBytes as nobleConcatBytes,
} from '@noble/hashes/utils';
import { TxCodecError, TxCodecErrorCodes } from '../errors.js';

/**
 * Convert bytes to lowercase hex
 */
export function bytesToHex(bytes: Uint8Array): string {
  return nobleBytesToHex(bytes);
}

/**
 * Convert hex to bytes. Accepts upper or lower case, rejects odd lengths and non-hex characters.
 */
export function hexToBytes(hex: string): Uint8Array {
  try {
    return nobleHexToBytes(hex);
  } catch (error) {
    throw new TxCodecError(
      TxCodecErrorCodes.InvalidFormat,
      'Invalid hex string',
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Concatenate byte arrays into a new array
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  return nobleConcatBytes(...arrays);
}
