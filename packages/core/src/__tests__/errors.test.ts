import { describe, it, expect } from 'vitest';
import {
  SigningError,
  SIGNING_ERROR_CODES,
  SIGNING_ERROR_KINDS,
  signingErrorKindFromCode,
} from '../index.js';

describe('Signing error matrix', () => {
  it('has one entry per error kind', () => {
    expect(Object.keys(SIGNING_ERROR_CODES)).toEqual([...SIGNING_ERROR_KINDS]);
  });

  it('every entry is keyed by its own kind', () => {
    for (const [key, entry] of Object.entries(SIGNING_ERROR_CODES)) {
      expect(entry.kind).toBe(key);
      expect(entry.message).toBeTruthy();
    }
  });

  it('numeric codes are unique', () => {
    const codes = Object.values(SIGNING_ERROR_CODES).map((e) => e.code);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it('only the none sentinel is not serializable', () => {
    const hidden = Object.values(SIGNING_ERROR_CODES).filter((e) => !e.serializable);
    expect(hidden.map((e) => e.kind)).toEqual(['none']);
  });

  it('maps numeric codes back to kinds', () => {
    expect(signingErrorKindFromCode(2)).toBe('invalidRequest');
    expect(signingErrorKindFromCode(-1)).toBe('none');
    expect(signingErrorKindFromCode(99)).toBeUndefined();
  });
});

describe('SigningError', () => {
  it('creates error from kind with default message and code', () => {
    const err = new SigningError('cancelled');
    expect(err.kind).toBe('cancelled');
    expect(err.code).toBe(1);
    expect(err.message).toBe('Signing request was cancelled by the user');
    expect(err.name).toBe('SigningError');
    expect(err).toBeInstanceOf(Error);
  });

  it('accepts a custom message and cause', () => {
    const cause = new Error('keystore locked');
    const err = new SigningError('watchOnly', { message: 'no key for 0xabc', cause });
    expect(err.message).toBe('no key for 0xabc');
    expect(err.cause).toBe(cause);
  });

  it('serializes to JSON', () => {
    const err = new SigningError('unsupportedAddress');
    expect(JSON.parse(JSON.stringify(err))).toEqual({
      kind: 'unsupportedAddress',
      code: 4,
      message: 'Requested address is not available to the signer',
    });
  });
});
