import { describe, it, expect } from 'vitest';
import {
  decodeBase64,
  decodeHexPayload,
  encodeBase64,
  parseUnsignedDecimal,
  toAddress,
  UINT64_MAX,
} from '../index.js';

const ADDRESS = '0xabababababababababababababababababababab';

describe('base64', () => {
  it('encodes bytes with padding', () => {
    expect(encodeBase64(new Uint8Array([1, 2]))).toBe('AQI=');
    expect(encodeBase64(new Uint8Array([0xfb, 0xff]))).toBe('+/8=');
  });

  it('decodes padded base64', () => {
    expect(decodeBase64('aGVsbG8=')).toEqual(new Uint8Array([104, 101, 108, 108, 111]));
    expect(decodeBase64('+/8=')).toEqual(new Uint8Array([0xfb, 0xff]));
  });

  it('decodes the empty string to empty bytes', () => {
    expect(decodeBase64('')).toEqual(new Uint8Array([]));
  });

  it('rejects missing padding, whitespace and url-safe characters', () => {
    expect(decodeBase64('aGVsbG8')).toBeUndefined();
    expect(decodeBase64('aGVs bG8=')).toBeUndefined();
    expect(decodeBase64('-_8=')).toBeUndefined();
  });
});

describe('decodeHexPayload', () => {
  it('decodes with and without the 0x prefix', () => {
    expect(decodeHexPayload('0xdeadbeef')).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
    expect(decodeHexPayload('DEADBEEF')).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
  });

  it('decodes empty input to empty bytes', () => {
    expect(decodeHexPayload('')).toEqual(new Uint8Array([]));
    expect(decodeHexPayload('0x')).toEqual(new Uint8Array([]));
  });

  it('rejects odd length and non-hex digits', () => {
    expect(decodeHexPayload('0xabc')).toBeUndefined();
    expect(decodeHexPayload('zz')).toBeUndefined();
  });
});

describe('parseUnsignedDecimal', () => {
  it('parses integers beyond the safe integer range', () => {
    expect(parseUnsignedDecimal('21000')).toBe(21000n);
    expect(parseUnsignedDecimal('123456789012345678901234567890')).toBe(
      123456789012345678901234567890n,
    );
  });

  it('accepts a leading plus sign', () => {
    expect(parseUnsignedDecimal('+1')).toBe(1n);
    expect(parseUnsignedDecimal('+18446744073709551615', UINT64_MAX)).toBe(UINT64_MAX);
  });

  it('rejects negatives, bare signs, exponents, whitespace and empty input', () => {
    expect(parseUnsignedDecimal('-1')).toBeUndefined();
    expect(parseUnsignedDecimal('+')).toBeUndefined();
    expect(parseUnsignedDecimal('++1')).toBeUndefined();
    expect(parseUnsignedDecimal('1e3')).toBeUndefined();
    expect(parseUnsignedDecimal(' 1')).toBeUndefined();
    expect(parseUnsignedDecimal('')).toBeUndefined();
    expect(parseUnsignedDecimal('0x10')).toBeUndefined();
  });

  it('enforces an upper bound', () => {
    expect(parseUnsignedDecimal('18446744073709551615', UINT64_MAX)).toBe(UINT64_MAX);
    expect(parseUnsignedDecimal('18446744073709551616', UINT64_MAX)).toBeUndefined();
  });
});

describe('toAddress', () => {
  it('accepts 20-byte hex addresses as given', () => {
    expect(toAddress(ADDRESS)).toBe(ADDRESS);
  });

  it('rejects short or unprefixed values', () => {
    expect(toAddress('0x123')).toBeUndefined();
    expect(toAddress(ADDRESS.slice(2))).toBeUndefined();
  });
});
