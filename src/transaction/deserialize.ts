import { TxCodecError, TxCodecErrorCodes, ensureAvailable } from '../errors.js';

/**
 * A decoded value together with the number of input bytes it occupied
 */
export interface Decoded<T> {
  value: T;
  bytesRead: number;
}

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Deserialize a compact size integer
 *
 * Non-minimal encodings (e.g. fd 01 00) are accepted; only the prefix byte decides the width.
 */
export function deserCompactSize(bytes: Uint8Array): Decoded<bigint> {
  ensureAvailable(1, bytes.length, 'compact size prefix');
  const prefix = bytes[0];

  if (prefix < 253) {
    return { value: BigInt(prefix), bytesRead: 1 };
  }
  if (prefix === 253) {
    ensureAvailable(3, bytes.length, 'compact size (16-bit)');
    return { value: BigInt(view(bytes).getUint16(1, true)), bytesRead: 3 };
  }
  if (prefix === 254) {
    ensureAvailable(5, bytes.length, 'compact size (32-bit)');
    return { value: BigInt(view(bytes).getUint32(1, true)), bytesRead: 5 };
  }
  ensureAvailable(9, bytes.length, 'compact size (64-bit)');
  return { value: view(bytes).getBigUint64(1, true), bytesRead: 9 };
}

/**
 * Deserialize a 32-bit unsigned integer (little-endian) at `offset`
 */
export function deserUint32(bytes: Uint8Array, offset = 0, field = 'uint32'): number {
  ensureAvailable(offset + 4, bytes.length, field);
  return view(bytes).getUint32(offset, true);
}

/**
 * Deserialize variable length bytes (compact size length prefix, then the body)
 *
 * The declared length is checked against the remaining input before anything is copied.
 */
export function deserString(bytes: Uint8Array, field = 'bytes'): Decoded<Uint8Array> {
  const { value: length, bytesRead: prefixWidth } = deserCompactSize(bytes);
  const remaining = bytes.length - prefixWidth;
  if (length > BigInt(remaining)) {
    throw new TxCodecError(
      TxCodecErrorCodes.InsufficientBytes,
      `Not enough bytes to read ${field}`,
      `need=${BigInt(prefixWidth) + length} have=${bytes.length}`
    );
  }
  const end = prefixWidth + Number(length);
  return { value: bytes.slice(prefixWidth, end), bytesRead: end };
}
