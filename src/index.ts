export * from './transaction/index.js';
export {
  TxCodecError,
  TxCodecErrorCodes,
  type TxCodecErrorCode,
  isTxCodecError,
} from './errors.js';
export { bytesToHex, hexToBytes, concatBytes } from './utils/index.js';
