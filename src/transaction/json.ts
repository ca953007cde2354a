/**
 * Structured (JSON) form of the transaction types.
 *
 * Only the identifier has a custom text form (see Txid); everything else maps
 * field by field, with scripts rendered as hex.
 */

import { z } from 'zod';
import { TxCodecError, TxCodecErrorCodes } from '../errors.js';
import { bytesToHex, hexToBytes } from '../utils/hex.js';
import { Txid } from './txid.js';
import {
  type COutPoint,
  type CTxIn,
  createOutPoint,
  createScript,
  createTxIn,
} from './structures.js';
import { type Transaction, createTransaction } from './builder.js';

const Uint32Schema = z.number().int().min(0).max(0xffffffff);

const HexSchema = z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, 'must be even-length hex');

const TxidSchema = z.string().transform((hex, ctx) => {
  try {
    return Txid.fromHex(hex);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : 'Invalid transaction id',
    });
    return z.NEVER;
  }
});

export const OutPointJsonSchema = z.object({
  txid: TxidSchema,
  vout: Uint32Schema,
});

export const TxInJsonSchema = z.object({
  previousOutput: OutPointJsonSchema,
  scriptSig: HexSchema,
  sequence: Uint32Schema,
});

export const TransactionJsonSchema = z.object({
  version: Uint32Schema,
  inputs: z.array(TxInJsonSchema),
  lockTime: Uint32Schema,
});

export type OutPointJson = z.input<typeof OutPointJsonSchema>;
export type TxInJson = z.input<typeof TxInJsonSchema>;
export type TransactionJson = z.input<typeof TransactionJsonSchema>;

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new TxCodecError(TxCodecErrorCodes.InvalidFormat, `Invalid ${what} JSON`, detail);
  }
  return result.data;
}

export function outPointToJSON(outpoint: COutPoint): OutPointJson {
  return { txid: outpoint.txid.toHex(), vout: outpoint.vout };
}

export function txInToJSON(txin: CTxIn): TxInJson {
  return {
    previousOutput: outPointToJSON(txin.prevout),
    scriptSig: bytesToHex(txin.scriptSig.bytes),
    sequence: txin.sequence,
  };
}

export function transactionToJSON(tx: Transaction): TransactionJson {
  return {
    version: tx.version,
    inputs: tx.vin.map(txInToJSON),
    lockTime: tx.lockTime,
  };
}

function toOutPoint(parsed: z.output<typeof OutPointJsonSchema>): COutPoint {
  return createOutPoint(parsed.txid, parsed.vout);
}

function toTxIn(parsed: z.output<typeof TxInJsonSchema>): CTxIn {
  return createTxIn(
    toOutPoint(parsed.previousOutput),
    createScript(hexToBytes(parsed.scriptSig)),
    parsed.sequence
  );
}

export function outPointFromJSON(value: unknown): COutPoint {
  return toOutPoint(parseWith(OutPointJsonSchema, value, 'outpoint'));
}

export function txInFromJSON(value: unknown): CTxIn {
  return toTxIn(parseWith(TxInJsonSchema, value, 'input'));
}

export function transactionFromJSON(value: unknown): Transaction {
  const parsed = parseWith(TransactionJsonSchema, value, 'transaction');
  return createTransaction(parsed.version, parsed.inputs.map(toTxIn), parsed.lockTime);
}
