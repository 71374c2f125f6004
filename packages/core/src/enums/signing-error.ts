import { z } from 'zod';

// SigningErrorKind: 'none' is a sentinel and is never written to a callback.
export const SIGNING_ERROR_KINDS = [
  'none',
  'unknown',
  'cancelled',
  'invalidRequest',
  'watchOnly',
  'unsupportedAddress',
] as const;
export type SigningErrorKind = (typeof SIGNING_ERROR_KINDS)[number];
export const SigningErrorKindEnum = z.enum(SIGNING_ERROR_KINDS);

// Encodings accepted for the callback `error` parameter.
export const ERROR_ENCODINGS = ['symbolic', 'numeric'] as const;
export type ErrorEncoding = (typeof ERROR_ENCODINGS)[number];
export const ErrorEncodingEnum = z.enum(ERROR_ENCODINGS);
