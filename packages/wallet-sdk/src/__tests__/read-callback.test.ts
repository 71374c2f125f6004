import { describe, it, expect } from 'vitest';
import { readCallbackResult } from '../read-callback.js';
import { InvalidCallbackUrlError } from '../errors.js';

describe('readCallbackResult', () => {
  it('decodes a success result with literal + and /', () => {
    expect(readCallbackResult('app://cb?result=+/8=')).toEqual({
      status: 'success',
      payload: new Uint8Array([0xfb, 0xff]),
    });
  });

  it('decodes symbolic and numeric errors', () => {
    expect(readCallbackResult('app://cb?error=invalidRequest')).toEqual({
      status: 'failure',
      error: 'invalidRequest',
    });
    expect(readCallbackResult(new URL('app://cb?error=1'))).toEqual({
      status: 'failure',
      error: 'cancelled',
    });
  });

  it('returns empty when neither parameter is present', () => {
    expect(readCallbackResult('https://dapp.example/done?session=42')).toEqual({ status: 'empty' });
  });

  it('rejects malformed values', () => {
    expect(() => readCallbackResult('app://cb?result=AQI')).toThrow(InvalidCallbackUrlError);
    expect(() => readCallbackResult('app://cb?error=exploded')).toThrow('Unknown error value: exploded');
    expect(() => readCallbackResult('app://cb?error=none')).toThrow(InvalidCallbackUrlError);
    expect(() => readCallbackResult('app://cb?error=-1')).toThrow(InvalidCallbackUrlError);
  });

  it('rejects an unparsable URL', () => {
    expect(() => readCallbackResult('::')).toThrow(InvalidCallbackUrlError);
  });
});
