export {
  MAX_UINT64,
  MAX_UINT32,
  assertUint32,
  compactSizeLength,
  serCompactSize,
  serString,
  serUint32,
} from './serialize.js';

export {
  type Decoded,
  deserCompactSize,
  deserString,
  deserUint32,
} from './deserialize.js';

export { TXID_LENGTH, Txid } from './txid.js';

export {
  OUTPOINT_LENGTH,
  type COutPoint,
  type CScript,
  type CTxIn,
  createOutPoint,
  createScript,
  createTxIn,
  serializeOutPoint,
  deserializeOutPoint,
  serializeScript,
  deserializeScript,
  serializeTxIn,
  deserializeTxIn,
} from './structures.js';

export {
  type Transaction,
  createTransaction,
  serializeTransaction,
  deserializeTransaction,
  encodeTransactionHex,
  decodeTransactionHex,
  formatTransaction,
} from './builder.js';

export {
  type OutPointJson,
  type TxInJson,
  type TransactionJson,
  OutPointJsonSchema,
  TxInJsonSchema,
  TransactionJsonSchema,
  outPointToJSON,
  outPointFromJSON,
  txInToJSON,
  txInFromJSON,
  transactionToJSON,
  transactionFromJSON,
} from './json.js';
