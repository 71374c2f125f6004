import type { SigningErrorKind } from '../enums/signing-error.js';
import { SIGNING_ERROR_CODES } from './error-codes.js';

/**
 * Error a signing provider rejects with. The protocol engine forwards `kind`
 * to the caller's callback without interpreting it.
 */
export class SigningError extends Error {
  readonly kind: SigningErrorKind;
  readonly code: number;

  constructor(
    kind: SigningErrorKind,
    options?: {
      message?: string;
      cause?: Error;
    },
  ) {
    const entry = SIGNING_ERROR_CODES[kind];
    super(options?.message ?? entry.message);
    this.name = 'SigningError';
    this.kind = kind;
    this.code = entry.code;
    if (options?.cause) this.cause = options.cause;
  }

  toJSON() {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
    };
  }
}
