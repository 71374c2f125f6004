/**
 * Byte, integer and address codecs shared by the command parser, the result
 * encoder and the caller-side helpers.
 *
 * Decoders return `undefined` instead of throwing; callers decide whether a
 * missing value is fatal.
 */

import { hexToBytes, isAddress, type Address } from 'viem';

/** Standard alphabet, padded, no whitespace. */
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const DECIMAL_PATTERN = /^\+?\d+$/;

const HEX_DIGITS_PATTERN = /^[0-9a-fA-F]*$/;

export const UINT64_MAX = 2n ** 64n - 1n;

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/**
 * Strict base64 decode. The empty string decodes to empty bytes.
 */
export function decodeBase64(value: string): Uint8Array | undefined {
  if (!BASE64_PATTERN.test(value)) return undefined;
  return new Uint8Array(Buffer.from(value, 'base64'));
}

/**
 * Decode a hex payload, with or without the 0x prefix.
 */
export function decodeHexPayload(value: string): Uint8Array | undefined {
  const digits = value.startsWith('0x') || value.startsWith('0X') ? value.slice(2) : value;
  if (digits.length % 2 !== 0 || !HEX_DIGITS_PATTERN.test(digits)) return undefined;
  return hexToBytes(`0x${digits}`);
}

/**
 * Parse an unsigned base-10 integer of any size. A leading '+' is allowed;
 * '-', whitespace, hex and exponents are rejected.
 */
export function parseUnsignedDecimal(value: string, max?: bigint): bigint | undefined {
  if (!DECIMAL_PATTERN.test(value)) return undefined;
  const parsed = BigInt(value);
  if (max !== undefined && parsed > max) return undefined;
  return parsed;
}

/**
 * Accept a 20-byte hex address in any letter case. The value is kept as
 * given (no checksum normalization).
 */
export function toAddress(value: string): Address | undefined {
  return isAddress(value, { strict: false }) ? value : undefined;
}
