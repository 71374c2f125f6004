import { describe, it, expect } from 'vitest';
import {
  CallbackParamSchema,
  SignMessageParamsSchema,
  SignTransactionParamsSchema,
  isSigningOperation,
} from '../index.js';

const TO = '0x1111111111111111111111111111111111111111';

describe('SignMessageParamsSchema', () => {
  it('decodes message and address', () => {
    const result = SignMessageParamsSchema.parse({ message: 'aGVsbG8=', address: TO });
    expect(result.message).toEqual(new Uint8Array([104, 101, 108, 108, 111]));
    expect(result.address).toBe(TO);
  });

  it('treats an invalid address as absent', () => {
    const result = SignMessageParamsSchema.parse({ message: 'aGVsbG8=', address: 'nope' });
    expect(result.address).toBeUndefined();
  });

  it('reports a missing message', () => {
    const result = SignMessageParamsSchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]?.path).toEqual(['message']);
      expect(result.error.issues[0]?.message).toBe('is required');
    }
  });

  it('reports a message that is not base64', () => {
    const result = SignMessageParamsSchema.safeParse({ message: 'not base64' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('must be valid base64');
    }
  });
});

describe('SignTransactionParamsSchema', () => {
  it('decodes a complete transaction with defaults', () => {
    const result = SignTransactionParamsSchema.parse({
      gasPrice: '1',
      gasLimit: '21000',
      to: TO,
      amount: '100',
    });
    expect(result).toEqual({
      gasPrice: 1n,
      gasLimit: 21000n,
      to: TO,
      amount: 100n,
      nonce: 0n,
      data: undefined,
    });
  });

  it('decodes nonce and data', () => {
    const result = SignTransactionParamsSchema.parse({
      gasPrice: '1',
      gasLimit: '21000',
      to: TO,
      amount: '0',
      nonce: '7',
      data: '0xa9059cbb',
    });
    expect(result.nonce).toBe(7n);
    expect(result.data).toEqual(new Uint8Array([0xa9, 0x05, 0x9c, 0xbb]));
  });

  it('falls back to nonce 0 and no payload on unparsable values', () => {
    const result = SignTransactionParamsSchema.parse({
      gasPrice: '1',
      gasLimit: '21000',
      to: TO,
      amount: '0',
      nonce: 'seven',
      data: 'xyz',
    });
    expect(result.nonce).toBe(0n);
    expect(result.data).toBeUndefined();
  });

  it('reports every missing mandatory field in declaration order', () => {
    const result = SignTransactionParamsSchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.path.join('.'))).toEqual([
        'gasPrice',
        'gasLimit',
        'to',
        'amount',
      ]);
    }
  });

  it('accepts plus-signed integers', () => {
    const result = SignTransactionParamsSchema.parse({
      gasPrice: '+1',
      gasLimit: '+21000',
      to: TO,
      amount: '+0',
      nonce: '+3',
    });
    expect(result.gasPrice).toBe(1n);
    expect(result.gasLimit).toBe(21000n);
    expect(result.amount).toBe(0n);
    expect(result.nonce).toBe(3n);
  });

  it('rejects a gas limit above the 64-bit range', () => {
    const result = SignTransactionParamsSchema.safeParse({
      gasPrice: '1',
      gasLimit: '18446744073709551616',
      to: TO,
      amount: '0',
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe(
        'must be an unsigned decimal integer no greater than 18446744073709551615',
      );
    }
  });

  it('rejects an invalid recipient', () => {
    const result = SignTransactionParamsSchema.safeParse({
      gasPrice: '1',
      gasLimit: '21000',
      to: '0x12',
      amount: '0',
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['to']);
      expect(result.error.issues[0]?.message).toBe('must be a 20-byte hex address');
    }
  });
});

describe('CallbackParamSchema', () => {
  it('parses absolute URLs of any scheme', () => {
    expect(CallbackParamSchema.parse('app://cb')?.href).toBe('app://cb');
    expect(CallbackParamSchema.parse('https://dapp.example/done')?.href).toBe(
      'https://dapp.example/done',
    );
  });

  it('treats relative or missing values as absent', () => {
    expect(CallbackParamSchema.parse('not a url')).toBeUndefined();
    expect(CallbackParamSchema.parse(undefined)).toBeUndefined();
  });
});

describe('isSigningOperation', () => {
  it('recognizes the three operations only', () => {
    expect(isSigningOperation('sign-message')).toBe(true);
    expect(isSigningOperation('sign-personal-message')).toBe(true);
    expect(isSigningOperation('sign-transaction')).toBe(true);
    expect(isSigningOperation('unknown-op')).toBe(false);
  });
});
