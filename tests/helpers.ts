import { expect } from 'vitest';
import { type TxCodecErrorCode, isTxCodecError } from '../src/errors.js';

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export function expectCodecError(fn: () => unknown, code: TxCodecErrorCode): void {
  expect(isTxCodecError(catchError(fn), code)).toBe(true);
}

export function ascendingBytes(length: number, start = 1): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => start + i);
}
