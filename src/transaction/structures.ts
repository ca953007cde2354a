import { concatBytes } from '../utils/hex.js';
import { ensureAvailable } from '../errors.js';
import { assertUint32, serString, serUint32 } from './serialize.js';
import { type Decoded, deserString, deserUint32 } from './deserialize.js';
import { TXID_LENGTH, Txid } from './txid.js';

export const OUTPOINT_LENGTH = TXID_LENGTH + 4;

/**
 * Transaction outpoint (reference to a previous output)
 */
export interface COutPoint {
  readonly txid: Txid;
  readonly vout: number; // output index
}

/**
 * Opaque script bytes, never interpreted
 */
export interface CScript {
  readonly bytes: Uint8Array;
}

/**
 * Transaction input
 */
export interface CTxIn {
  readonly prevout: COutPoint;
  readonly scriptSig: CScript;
  readonly sequence: number;
}

/**
 * Create an outpoint; `vout` must be an unsigned 32-bit integer
 */
export function createOutPoint(txid: Txid | Uint8Array, vout: number): COutPoint {
  return {
    txid: txid instanceof Txid ? txid : new Txid(txid),
    vout: assertUint32(vout, 'vout'),
  };
}

/**
 * Create a script from a copy of `bytes`
 */
export function createScript(bytes: ArrayLike<number>): CScript {
  return { bytes: Uint8Array.from(bytes) };
}

/**
 * Create a transaction input; `sequence` must be an unsigned 32-bit integer
 */
export function createTxIn(prevout: COutPoint, scriptSig: CScript, sequence: number): CTxIn {
  return { prevout, scriptSig, sequence: assertUint32(sequence, 'sequence') };
}

/**
 * Serialize an outpoint
 */
export function serializeOutPoint(outpoint: COutPoint): Uint8Array {
  return concatBytes(outpoint.txid.bytes, serUint32(outpoint.vout));
}

/**
 * Deserialize an outpoint: txid (32 bytes) then the output index
 */
export function deserializeOutPoint(bytes: Uint8Array): Decoded<COutPoint> {
  ensureAvailable(OUTPOINT_LENGTH, bytes.length, 'outpoint');
  return {
    value: createOutPoint(bytes.subarray(0, TXID_LENGTH), deserUint32(bytes, TXID_LENGTH)),
    bytesRead: OUTPOINT_LENGTH,
  };
}

/**
 * Serialize a script with its compact size length prefix
 */
export function serializeScript(script: CScript): Uint8Array {
  return serString(script.bytes);
}

/**
 * Deserialize a length-prefixed script
 */
export function deserializeScript(bytes: Uint8Array): Decoded<CScript> {
  const { value, bytesRead } = deserString(bytes, 'script');
  return { value: { bytes: value }, bytesRead };
}

/**
 * Serialize a transaction input
 */
export function serializeTxIn(txin: CTxIn): Uint8Array {
  return concatBytes(
    serializeOutPoint(txin.prevout),
    serializeScript(txin.scriptSig),
    serUint32(txin.sequence)
  );
}

/**
 * Deserialize a transaction input: outpoint, script, sequence
 */
export function deserializeTxIn(bytes: Uint8Array): Decoded<CTxIn> {
  const prevout = deserializeOutPoint(bytes);
  const scriptSig = deserializeScript(bytes.subarray(prevout.bytesRead));
  const offset = prevout.bytesRead + scriptSig.bytesRead;
  const sequence = deserUint32(bytes, offset, 'input sequence');

  return {
    value: createTxIn(prevout.value, scriptSig.value, sequence),
    bytesRead: offset + 4,
  };
}
