export {
  encodeBase64,
  decodeBase64,
  decodeHexPayload,
  parseUnsignedDecimal,
  toAddress,
  UINT64_MAX,
} from './encoding.js';
