import { concatBytes } from '../utils/hex.js';

export const MAX_UINT64 = 0xffffffffffffffffn;
export const MAX_UINT32 = 0xffffffff;

function toUint64(n: number | bigint): bigint {
  const v = typeof n === 'number' && !Number.isInteger(n) ? -1n : BigInt(n);
  if (v < 0n || v > MAX_UINT64) {
    throw new RangeError(`Compact size out of range: ${n}`);
  }
  return v;
}

/**
 * Throw RangeError unless `n` is an integer in [0, 2^32 - 1]
 */
export function assertUint32(n: number, field = 'uint32'): number {
  if (!Number.isInteger(n) || n < 0 || n > MAX_UINT32) {
    throw new RangeError(`${field} out of range: ${n}`);
  }
  return n;
}

/**
 * Number of bytes the compact size encoding of `n` occupies
 */
export function compactSizeLength(n: number | bigint): 1 | 3 | 5 | 9 {
  const v = toUint64(n);
  if (v < 253n) return 1;
  if (v <= 0xffffn) return 3;
  if (v <= 0xffffffffn) return 5;
  return 9;
}

/**
 * Serialize a compact size integer (variable length)
 *
 * Always picks the shortest width for the magnitude. Values must lie in [0, 2^64 - 1].
 */
export function serCompactSize(n: number | bigint): Uint8Array {
  const v = toUint64(n);
  switch (compactSizeLength(v)) {
    case 1:
      return new Uint8Array([Number(v)]);
    case 3: {
      const buf = new Uint8Array(3);
      buf[0] = 253;
      new DataView(buf.buffer).setUint16(1, Number(v), true);
      return buf;
    }
    case 5: {
      const buf = new Uint8Array(5);
      buf[0] = 254;
      new DataView(buf.buffer).setUint32(1, Number(v), true);
      return buf;
    }
    case 9: {
      const buf = new Uint8Array(9);
      buf[0] = 255;
      new DataView(buf.buffer).setBigUint64(1, v, true);
      return buf;
    }
  }
}

/**
 * Serialize a variable length string/bytes
 */
export function serString(data: Uint8Array): Uint8Array {
  return concatBytes(serCompactSize(data.length), data);
}

/**
 * Serialize a 32-bit unsigned integer (little-endian)
 */
export function serUint32(n: number): Uint8Array {
  const buf = new Uint8Array(4);
  new DataView(buf.buffer).setUint32(0, assertUint32(n), true);
  return buf;
}
