import { describe, it, expect } from 'vitest';
import { formatDisplayMessage } from '../display.js';

const TO = '0x1111111111111111111111111111111111111111';

describe('formatDisplayMessage', () => {
  it('shows text messages and the default account', () => {
    const text = formatDisplayMessage({
      operation: 'sign-message',
      message: new TextEncoder().encode('Log in to Example'),
      callback: new URL('app://cb'),
    });
    expect(text).toBe(
      ['Sign Message Request', '', 'Account: default account', 'Message: Log in to Example', 'Callback: app://cb'].join('\n'),
    );
  });

  it('shows binary messages as hex', () => {
    const text = formatDisplayMessage({
      operation: 'sign-personal-message',
      message: new Uint8Array([0x00, 0xff]),
      address: TO,
    });
    expect(text).toBe(
      [
        'Sign Personal Message Request',
        '',
        `Account: ${TO}`,
        'Message (hex): 0x00ff',
        'Callback: none',
      ].join('\n'),
    );
  });

  it('summarizes a transaction in ETH and gwei', () => {
    const text = formatDisplayMessage({
      operation: 'sign-transaction',
      transaction: {
        nonce: 4n,
        gasPrice: 20000000000n,
        gasLimit: 21000n,
        to: TO,
        amount: 1500000000000000000n,
        payload: new Uint8Array([1, 2, 3]),
      },
    });
    expect(text).toBe(
      [
        'Sign Transaction Request',
        '',
        `To: ${TO}`,
        'Amount: 1.5 ETH',
        'Gas price: 20 gwei',
        'Gas limit: 21000',
        'Nonce: 4',
        'Data: 3 bytes',
        'Callback: none',
      ].join('\n'),
    );
  });
});
