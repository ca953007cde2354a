import { TxCodecError, TxCodecErrorCodes } from '../errors.js';
import { bytesToHex, hexToBytes } from '../utils/hex.js';

export const TXID_LENGTH = 32;

/**
 * 32-byte transaction identifier.
 *
 * Bytes are kept in wire order and the hex form is a direct rendering of them;
 * no byte reversal is applied in either direction.
 */
export class Txid {
  private readonly data: Uint8Array;

  constructor(bytes: Uint8Array) {
    if (bytes.length !== TXID_LENGTH) {
      throw new TxCodecError(
        TxCodecErrorCodes.InvalidFormat,
        'Invalid transaction id',
        `expected ${TXID_LENGTH} bytes, got ${bytes.length}`
      );
    }
    this.data = new Uint8Array(bytes);
  }

  /**
   * Parse a 64-character hex identifier
   */
  static fromHex(hex: string): Txid {
    let bytes: Uint8Array;
    try {
      bytes = hexToBytes(hex);
    } catch (error) {
      throw new TxCodecError(
        TxCodecErrorCodes.InvalidFormat,
        'Invalid transaction id',
        error instanceof TxCodecError && error.detail !== null ? error.detail : undefined
      );
    }
    return new Txid(bytes);
  }

  /**
   * A copy of the identifier bytes
   */
  get bytes(): Uint8Array {
    return new Uint8Array(this.data);
  }

  toHex(): string {
    return bytesToHex(this.data);
  }

  toString(): string {
    return this.toHex();
  }

  equals(other: Txid): boolean {
    return this.data.every((b, i) => b === other.data[i]);
  }
}
