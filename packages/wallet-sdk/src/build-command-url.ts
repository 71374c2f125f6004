/**
 * buildCommandUrl - Caller-side counterpart of parseCommand.
 *
 * Format: {scheme}://{operation}?{params}
 */

import { bytesToHex } from 'viem';
import { encodeBase64, type Command, type CommandParam } from '@linksign/core';
import { InvalidCommandUrlError } from './errors.js';

const SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*$/;

function commandParams(command: Command): Array<[CommandParam, string]> {
  switch (command.operation) {
    case 'sign-message':
    case 'sign-personal-message': {
      const params: Array<[CommandParam, string]> = [['message', encodeBase64(command.message)]];
      if (command.address !== undefined) params.push(['address', command.address]);
      return params;
    }
    case 'sign-transaction': {
      const tx = command.transaction;
      const params: Array<[CommandParam, string]> = [
        ['to', tx.to],
        ['amount', tx.amount.toString()],
        ['gasPrice', tx.gasPrice.toString()],
        ['gasLimit', tx.gasLimit.toString()],
        ['nonce', tx.nonce.toString()],
      ];
      if (tx.payload !== undefined) params.push(['data', bytesToHex(tx.payload)]);
      return params;
    }
  }
}

/**
 * Build the URL a caller opens to request a signature.
 *
 * @param scheme - URL scheme the wallet registered (without "://")
 * @throws InvalidCommandUrlError if the scheme is not a valid URL scheme
 */
export function buildCommandUrl(scheme: string, command: Command): string {
  if (!SCHEME_PATTERN.test(scheme)) {
    throw new InvalidCommandUrlError(`Invalid URL scheme: ${scheme}`);
  }

  const params = commandParams(command);
  if (command.callback) params.push(['callback', command.callback.href]);

  const query = params.map(([name, value]) => `${name}=${encodeURIComponent(value)}`).join('&');
  return `${scheme}://${command.operation}?${query}`;
}
