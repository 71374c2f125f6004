/**
 * Command schemas: query parameter validation and the typed Command union.
 *
 * Each operation has a params schema that takes the raw query values
 * (strings, or undefined when the parameter is missing) and produces decoded
 * fields. Lenient fields fall back to undefined/defaults; mandatory fields add
 * an issue, which the dispatcher reports as `invalidRequest`.
 */

import { z } from 'zod';
import type { Address } from 'viem';
import {
  decodeBase64,
  decodeHexPayload,
  parseUnsignedDecimal,
  toAddress,
  UINT64_MAX,
} from '../utils/encoding.js';

// ---------------------------------------------------------------------------
// Query parameter names
// ---------------------------------------------------------------------------

export const COMMAND_PARAMS = [
  'callback',
  'message',
  'address',
  'gasPrice',
  'gasLimit',
  'to',
  'amount',
  'nonce',
  'data',
] as const;
export type CommandParam = (typeof COMMAND_PARAMS)[number];

/** Raw query values keyed by parameter name. */
export type RawCommandParams = Partial<Record<CommandParam, string>>;

// ---------------------------------------------------------------------------
// Field schemas
// ---------------------------------------------------------------------------

const REQUIRED = { required_error: 'is required' };

const Base64BytesSchema = z.string(REQUIRED).transform((value, ctx) => {
  const bytes = decodeBase64(value);
  if (!bytes) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid base64' });
    return z.NEVER;
  }
  return bytes;
});

const AddressSchema = z.string(REQUIRED).transform((value, ctx): Address => {
  const address = toAddress(value);
  if (!address) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a 20-byte hex address' });
    return z.NEVER;
  }
  return address;
});

const OptionalAddressSchema = z
  .string()
  .optional()
  .transform((value) => (value === undefined ? undefined : toAddress(value)));

function unsignedDecimal(max?: bigint) {
  const message =
    max === undefined
      ? 'must be an unsigned decimal integer'
      : `must be an unsigned decimal integer no greater than ${max.toString()}`;
  return z.string(REQUIRED).transform((value, ctx) => {
    const parsed = parseUnsignedDecimal(value, max);
    if (parsed === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    }
    return parsed;
  });
}

const NonceSchema = z
  .string()
  .optional()
  .transform((value) => (value === undefined ? 0n : (parseUnsignedDecimal(value) ?? 0n)));

const PayloadSchema = z
  .string()
  .optional()
  .transform((value) => (value === undefined ? undefined : decodeHexPayload(value)));

/**
 * `callback` never fails validation: an unparsable or relative URL is
 * treated as absent.
 */
export const CallbackParamSchema = z
  .string()
  .optional()
  .transform((value) => (value !== undefined && URL.canParse(value) ? new URL(value) : undefined));

// ---------------------------------------------------------------------------
// Params schemas (one per operation)
// ---------------------------------------------------------------------------

export const SignMessageParamsSchema = z.object({
  message: Base64BytesSchema,
  address: OptionalAddressSchema,
});

export const SignPersonalMessageParamsSchema = SignMessageParamsSchema;

export const SignTransactionParamsSchema = z.object({
  gasPrice: unsignedDecimal(),
  gasLimit: unsignedDecimal(UINT64_MAX),
  to: AddressSchema,
  amount: unsignedDecimal(),
  nonce: NonceSchema,
  data: PayloadSchema,
});

export type SignMessageParams = z.infer<typeof SignMessageParamsSchema>;
export type SignTransactionParams = z.infer<typeof SignTransactionParamsSchema>;

// ---------------------------------------------------------------------------
// Command (tagged union on `operation`)
// ---------------------------------------------------------------------------

export interface TransactionRequest {
  readonly nonce: bigint;
  readonly gasPrice: bigint;
  readonly gasLimit: bigint;
  readonly to: Address;
  readonly amount: bigint;
  readonly payload?: Uint8Array;
}

export interface SignMessageCommand {
  readonly operation: 'sign-message';
  readonly message: Uint8Array;
  readonly address?: Address;
  readonly callback?: URL;
}

export interface SignPersonalMessageCommand {
  readonly operation: 'sign-personal-message';
  readonly message: Uint8Array;
  readonly address?: Address;
  readonly callback?: URL;
}

export interface SignTransactionCommand {
  readonly operation: 'sign-transaction';
  readonly transaction: TransactionRequest;
  readonly callback?: URL;
}

export type Command = SignMessageCommand | SignPersonalMessageCommand | SignTransactionCommand;
