/**
 * `linksign read <callback-url>` -- Decode the wallet's answer.
 *
 * Exit code: 0 for a signed result, 1 for an error or an empty callback.
 */

import { bytesToHex } from 'viem';
import { SIGNING_ERROR_CODES } from '@linksign/core';
import { readCallbackResult } from '@linksign/wallet-sdk';

export function readCommand(url: string): number {
  const result = readCallbackResult(url);
  switch (result.status) {
    case 'success':
      console.log(`Result: ${bytesToHex(result.payload)}`);
      return 0;
    case 'failure':
      console.log(`Error: ${result.error} (${SIGNING_ERROR_CODES[result.error].message})`);
      return 1;
    case 'empty':
      console.log('Callback carries no result or error');
      return 1;
  }
}
