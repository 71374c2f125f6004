/**
 * parseCommand - Turn an inbound command URL into a typed Command.
 *
 * URL layout: {scheme}://{operation}?{params}
 *   - sign-message / sign-personal-message: message (base64), address?, callback?
 *   - sign-transaction: gasPrice, gasLimit, to, amount, nonce?, data (hex)?, callback?
 *
 * Pure, synchronous and total: never throws and performs no I/O.
 */

import type { ZodError } from 'zod';
import {
  CallbackParamSchema,
  COMMAND_PARAMS,
  isSigningOperation,
  SignMessageParamsSchema,
  SignPersonalMessageParamsSchema,
  SignTransactionParamsSchema,
  type Command,
  type RawCommandParams,
  type SigningOperation,
  type SignMessageCommand,
  type SignPersonalMessageCommand,
  type SignTransactionCommand,
  type TransactionRequest,
} from '@linksign/core';
import { readQueryParameters } from './query.js';

export interface UnhandledUrl {
  status: 'unhandled';
}

export interface ParsedCommand {
  status: 'parsed';
  command: Command;
}

export interface InvalidCommand {
  status: 'invalid';
  operation: SigningOperation;
  callback?: URL;
  issues: string[];
}

export type ParseResult = UnhandledUrl | ParsedCommand | InvalidCommand;

const UNHANDLED: UnhandledUrl = Object.freeze({ status: 'unhandled' });

function toUrl(input: string | URL): URL | undefined {
  if (input instanceof URL) return input;
  return URL.canParse(input) ? new URL(input) : undefined;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

function invalid(
  operation: SigningOperation,
  callback: URL | undefined,
  error: ZodError,
): InvalidCommand {
  return {
    status: 'invalid',
    operation,
    ...(callback !== undefined ? { callback } : {}),
    issues: formatIssues(error),
  };
}

function parseMessageCommand(
  operation: 'sign-message' | 'sign-personal-message',
  params: RawCommandParams,
  callback: URL | undefined,
): ParsedCommand | InvalidCommand {
  const schema =
    operation === 'sign-message' ? SignMessageParamsSchema : SignPersonalMessageParamsSchema;
  const result = schema.safeParse(params);
  if (!result.success) return invalid(operation, callback, result.error);

  const { message, address } = result.data;
  const command: SignMessageCommand | SignPersonalMessageCommand = {
    operation,
    message,
    ...(address !== undefined ? { address } : {}),
    ...(callback !== undefined ? { callback } : {}),
  };
  return { status: 'parsed', command: Object.freeze(command) };
}

function parseTransactionCommand(
  params: RawCommandParams,
  callback: URL | undefined,
): ParsedCommand | InvalidCommand {
  const result = SignTransactionParamsSchema.safeParse(params);
  if (!result.success) return invalid('sign-transaction', callback, result.error);

  const { nonce, gasPrice, gasLimit, to, amount, data } = result.data;
  const transaction: TransactionRequest = {
    nonce,
    gasPrice,
    gasLimit,
    to,
    amount,
    ...(data !== undefined ? { payload: data } : {}),
  };
  const command: SignTransactionCommand = {
    operation: 'sign-transaction',
    transaction: Object.freeze(transaction),
    ...(callback !== undefined ? { callback } : {}),
  };
  return { status: 'parsed', command: Object.freeze(command) };
}

/**
 * Parse a command URL.
 *
 * @returns `unhandled` when the URL is unparsable or its host is not a known
 *          operation, `invalid` when a mandatory parameter is missing or
 *          malformed, `parsed` otherwise.
 */
export function parseCommand(input: string | URL): ParseResult {
  const url = toUrl(input);
  if (!url) return UNHANDLED;

  const operation = url.hostname;
  if (!isSigningOperation(operation)) return UNHANDLED;

  const params = readQueryParameters(url, COMMAND_PARAMS);
  const callback = CallbackParamSchema.parse(params.callback);

  switch (operation) {
    case 'sign-message':
    case 'sign-personal-message':
      return parseMessageCommand(operation, params, callback);
    case 'sign-transaction':
      return parseTransactionCommand(params, callback);
  }
}
