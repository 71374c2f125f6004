import type { SigningErrorKind } from '../enums/signing-error.js';

export interface SigningSuccess {
  status: 'success';
  signedPayload: Uint8Array;
}

export interface SigningFailure {
  status: 'failure';
  error: SigningErrorKind;
}

/** Result of one dispatched command, produced once. */
export type SigningOutcome = SigningSuccess | SigningFailure;
