import { z } from 'zod';

// SigningOperation: the inbound URL host names the operation.
export const SIGNING_OPERATIONS = [
  'sign-message',
  'sign-personal-message',
  'sign-transaction',
] as const;
export type SigningOperation = (typeof SIGNING_OPERATIONS)[number];
export const SigningOperationEnum = z.enum(SIGNING_OPERATIONS);

export function isSigningOperation(value: string): value is SigningOperation {
  return SIGNING_OPERATIONS.some((operation) => operation === value);
}
