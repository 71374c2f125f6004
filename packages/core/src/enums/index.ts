export {
  SIGNING_OPERATIONS,
  type SigningOperation,
  SigningOperationEnum,
  isSigningOperation,
} from './operation.js';
export {
  SIGNING_ERROR_KINDS,
  type SigningErrorKind,
  SigningErrorKindEnum,
  ERROR_ENCODINGS,
  type ErrorEncoding,
  ErrorEncodingEnum,
} from './signing-error.js';
