import { describe, it, expect } from 'vitest';
import {
  outPointToJSON,
  outPointFromJSON,
  txInToJSON,
  txInFromJSON,
  transactionToJSON,
  transactionFromJSON,
} from '../../src/transaction/json.js';
import { createTransaction } from '../../src/transaction/builder.js';
import { createOutPoint, createScript, createTxIn } from '../../src/transaction/structures.js';
import { TxCodecErrorCodes } from '../../src/errors.js';
import { ascendingBytes, catchError, expectCodecError } from '../helpers.js';

const ASCENDING_HEX = '0102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f20';

const txin = createTxIn(createOutPoint(ascendingBytes(32), 1), createScript([0x51, 0xac]), 0xffffffff);
const tx = createTransaction(2, [txin], 100);

const txJson = {
  version: 2,
  inputs: [
    {
      previousOutput: { txid: ASCENDING_HEX, vout: 1 },
      scriptSig: '51ac',
      sequence: 4294967295,
    },
  ],
  lockTime: 100,
};

describe('JSON serialization', () => {
  it('writes the txid as hex', () => {
    expect(outPointToJSON(txin.prevout)).toEqual({ txid: ASCENDING_HEX, vout: 1 });
  });

  it('writes an input', () => {
    expect(txInToJSON(txin)).toEqual(txJson.inputs[0]);
  });

  it('writes a transaction', () => {
    expect(transactionToJSON(tx)).toEqual(txJson);
  });

  it('survives a JSON string round trip', () => {
    const text = JSON.stringify(transactionToJSON(tx));
    expect(transactionFromJSON(JSON.parse(text))).toEqual(tx);
  });

  it('reads an outpoint and an input', () => {
    expect(outPointFromJSON({ txid: ASCENDING_HEX, vout: 1 })).toEqual(txin.prevout);
    expect(txInFromJSON(txJson.inputs[0])).toEqual(txin);
  });

  it('accepts upper case hex', () => {
    const parsed = txInFromJSON({
      previousOutput: { txid: ASCENDING_HEX.toUpperCase(), vout: 1 },
      scriptSig: '51AC',
      sequence: 4294967295,
    });
    expect(parsed).toEqual(txin);
  });

  it.each([
    ['a negative vout', { txid: ASCENDING_HEX, vout: -1 }],
    ['a vout above 32 bits', { txid: ASCENDING_HEX, vout: 2 ** 32 }],
    ['a fractional vout', { txid: ASCENDING_HEX, vout: 1.5 }],
    ['a short txid', { txid: 'abcd', vout: 0 }],
    ['a non-hex txid', { txid: 'zz'.repeat(32), vout: 0 }],
    ['a missing txid', { vout: 0 }],
  ])('rejects an outpoint with %s', (_label, value) => {
    expectCodecError(() => outPointFromJSON(value), TxCodecErrorCodes.InvalidFormat);
  });

  it('rejects odd-length script hex', () => {
    expectCodecError(
      () => txInFromJSON({ ...txJson.inputs[0], scriptSig: 'abc' }),
      TxCodecErrorCodes.InvalidFormat
    );
  });

  it('rejects a non-object transaction', () => {
    expectCodecError(() => transactionFromJSON('tx'), TxCodecErrorCodes.InvalidFormat);
  });

  it('names the offending field', () => {
    const error = catchError(() => transactionFromJSON({ ...txJson, lockTime: -5 }));
    expect(error).toMatchObject({ code: TxCodecErrorCodes.InvalidFormat });
    expect(error instanceof Error && 'detail' in error ? String(error.detail) : '').toMatch(
      /^lockTime: /
    );
  });
});
