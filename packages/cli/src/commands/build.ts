/**
 * `linksign build <operation>` -- Print a command URL for a caller to open.
 *
 * --message is UTF-8 text; it is base64-encoded into the URL.
 */

import {
  decodeHexPayload,
  parseUnsignedDecimal,
  SIGNING_OPERATIONS,
  SigningOperationEnum,
  SignTransactionParamsSchema,
  toAddress,
  type Command,
} from '@linksign/core';
import { buildCommandUrl } from '@linksign/wallet-sdk';

export interface BuildCommandOptions {
  scheme: string;
  message?: string;
  address?: string;
  to?: string;
  amount?: string;
  gasPrice?: string;
  gasLimit?: string;
  nonce?: string;
  data?: string;
  callback?: string;
}

function callbackField(value: string | undefined): { callback?: URL } {
  if (value === undefined) return {};
  if (!URL.canParse(value)) throw new Error(`--callback must be an absolute URL: ${value}`);
  return { callback: new URL(value) };
}

function toCommand(operation: string, opts: BuildCommandOptions): Command {
  const parsedOperation = SigningOperationEnum.safeParse(operation);
  if (!parsedOperation.success) {
    throw new Error(
      `Unknown operation '${operation}'. Expected one of: ${SIGNING_OPERATIONS.join(', ')}`,
    );
  }

  const callback = callbackField(opts.callback);
  const op = parsedOperation.data;
  switch (op) {
    case 'sign-message':
    case 'sign-personal-message': {
      if (opts.message === undefined) throw new Error('--message is required');
      const address = opts.address !== undefined ? toAddress(opts.address) : undefined;
      if (opts.address !== undefined && address === undefined) {
        throw new Error(`--address is not a 20-byte hex address: ${opts.address}`);
      }
      return {
        operation: op,
        message: new TextEncoder().encode(opts.message),
        ...(address !== undefined ? { address } : {}),
        ...callback,
      };
    }
    case 'sign-transaction': {
      // The URL parser tolerates a bad nonce or data; the builder does not.
      if (opts.nonce !== undefined && parseUnsignedDecimal(opts.nonce) === undefined) {
        throw new Error('--nonce must be an unsigned decimal integer');
      }
      if (opts.data !== undefined && decodeHexPayload(opts.data) === undefined) {
        throw new Error('--data must be an even-length hex string');
      }

      const result = SignTransactionParamsSchema.safeParse({
        gasPrice: opts.gasPrice,
        gasLimit: opts.gasLimit,
        to: opts.to,
        amount: opts.amount,
        nonce: opts.nonce,
        data: opts.data,
      });
      if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        throw new Error(`Invalid transaction: ${issues.join('; ')}`);
      }

      const { nonce, gasPrice, gasLimit, to, amount, data } = result.data;
      return {
        operation: 'sign-transaction',
        transaction: {
          nonce,
          gasPrice,
          gasLimit,
          to,
          amount,
          ...(data !== undefined ? { payload: data } : {}),
        },
        ...callback,
      };
    }
  }
}

/**
 * @returns the command URL
 * @throws Error describing the first invalid option
 */
export function buildCommand(operation: string, opts: BuildCommandOptions): string {
  return buildCommandUrl(opts.scheme, toCommand(operation, opts));
}
