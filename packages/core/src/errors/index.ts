export {
  SIGNING_ERROR_CODES,
  type SigningErrorCodeEntry,
  signingErrorKindFromCode,
} from './error-codes.js';
export { SigningError } from './base-error.js';
