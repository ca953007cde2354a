export { bytesToHex, hexToBytes, concatBytes } from './hex.js';
