import type { SigningErrorKind } from '../enums/signing-error.js';

export interface SigningErrorCodeEntry {
  kind: SigningErrorKind;
  /** Numeric wire code, used when callbacks are configured for numeric errors. */
  code: number;
  /** Whether the kind may be written to a callback URL. */
  serializable: boolean;
  message: string;
}

/**
 * Signing error matrix. SSoT for kind, numeric code and default message.
 */
export const SIGNING_ERROR_CODES: Record<SigningErrorKind, SigningErrorCodeEntry> = {
  none: {
    kind: 'none',
    code: -1,
    serializable: false,
    message: 'No error',
  },
  unknown: {
    kind: 'unknown',
    code: 0,
    serializable: true,
    message: 'Signing failed for an unknown reason',
  },
  cancelled: {
    kind: 'cancelled',
    code: 1,
    serializable: true,
    message: 'Signing request was cancelled by the user',
  },
  invalidRequest: {
    kind: 'invalidRequest',
    code: 2,
    serializable: true,
    message: 'Signing request is missing or has malformed parameters',
  },
  watchOnly: {
    kind: 'watchOnly',
    code: 3,
    serializable: true,
    message: 'Active wallet is watch-only and cannot sign',
  },
  unsupportedAddress: {
    kind: 'unsupportedAddress',
    code: 4,
    serializable: true,
    message: 'Requested address is not available to the signer',
  },
};

/** Reverse lookup: numeric wire code -> kind. */
export function signingErrorKindFromCode(code: number): SigningErrorKind | undefined {
  for (const entry of Object.values(SIGNING_ERROR_CODES)) {
    if (entry.code === code) return entry.kind;
  }
  return undefined;
}
