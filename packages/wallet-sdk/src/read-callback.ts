/**
 * readCallbackResult - Caller-side decoding of a callback URL launched by
 * the wallet.
 */

import {
  decodeBase64,
  SigningErrorKindEnum,
  signingErrorKindFromCode,
  type SigningErrorKind,
} from '@linksign/core';
import { getQueryParameter } from './query.js';
import { InvalidCallbackUrlError } from './errors.js';

export type CallbackResult =
  | { status: 'success'; payload: Uint8Array }
  | { status: 'failure'; error: SigningErrorKind }
  | { status: 'empty' };

const NUMERIC_CODE_PATTERN = /^-?\d+$/;

function parseErrorValue(value: string): SigningErrorKind | undefined {
  let kind: SigningErrorKind | undefined;
  const symbolic = SigningErrorKindEnum.safeParse(value);
  if (symbolic.success) {
    kind = symbolic.data;
  } else if (NUMERIC_CODE_PATTERN.test(value)) {
    kind = signingErrorKindFromCode(Number(value));
  }
  // 'none' is never written by a wallet
  return kind === 'none' ? undefined : kind;
}

/**
 * Read the `result` or `error` parameter of a callback URL.
 *
 * @returns `empty` when the URL carries neither parameter
 * @throws InvalidCallbackUrlError - unparsable URL, non-base64 result or
 *         unknown error value
 */
export function readCallbackResult(url: string | URL): CallbackResult {
  let parsed: URL;
  if (url instanceof URL) {
    parsed = url;
  } else if (URL.canParse(url)) {
    parsed = new URL(url);
  } else {
    throw new InvalidCallbackUrlError(`Invalid URL: ${url}`);
  }

  const result = getQueryParameter(parsed, 'result');
  if (result !== undefined) {
    const payload = decodeBase64(result);
    if (!payload) {
      throw new InvalidCallbackUrlError('Malformed result parameter: expected base64');
    }
    return { status: 'success', payload };
  }

  const error = getQueryParameter(parsed, 'error');
  if (error !== undefined) {
    const kind = parseErrorValue(error);
    if (!kind) {
      throw new InvalidCallbackUrlError(`Unknown error value: ${error}`);
    }
    return { status: 'failure', error: kind };
  }

  return { status: 'empty' };
}
