import { describe, it, expect } from 'vitest';
import { getQueryParameter, readQueryParameters } from '../query.js';

describe('getQueryParameter', () => {
  it('keeps + and / in values', () => {
    const url = new URL('linksign://sign-message?message=+/8=');
    expect(getQueryParameter(url, 'message')).toBe('+/8=');
  });

  it('percent-decodes names and values', () => {
    const url = new URL('linksign://sign-message?mess%61ge=aGVsbG8%3D');
    expect(getQueryParameter(url, 'message')).toBe('aGVsbG8=');
  });

  it('returns the first occurrence of a repeated name', () => {
    const url = new URL('linksign://sign-message?message=first&message=second');
    expect(getQueryParameter(url, 'message')).toBe('first');
  });

  it('matches names case-sensitively', () => {
    const url = new URL('linksign://sign-transaction?GasPrice=1');
    expect(getQueryParameter(url, 'gasPrice')).toBeUndefined();
  });

  it('treats an item without = as having no value', () => {
    const url = new URL('linksign://sign-message?message&message=aGVsbG8=');
    expect(getQueryParameter(url, 'message')).toBeUndefined();
  });

  it('keeps an empty value', () => {
    const url = new URL('linksign://sign-message?message=');
    expect(getQueryParameter(url, 'message')).toBe('');
  });

  it('treats a malformed percent escape as no value', () => {
    const url = new URL('linksign://sign-message?message=%E0%A4%A');
    expect(getQueryParameter(url, 'message')).toBeUndefined();
  });

  it('returns undefined without a query', () => {
    expect(getQueryParameter(new URL('linksign://sign-message'), 'message')).toBeUndefined();
  });
});

describe('readQueryParameters', () => {
  it('collects only parameters that carry a value', () => {
    const url = new URL('app://x?a=1&b&c=3');
    expect(readQueryParameters(url, ['a', 'b', 'c', 'd'])).toEqual({ a: '1', c: '3' });
  });
});
