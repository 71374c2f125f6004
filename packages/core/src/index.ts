// @linksign/core - shared types, schemas, errors, interfaces

// Enums
export {
  SIGNING_OPERATIONS,
  type SigningOperation,
  SigningOperationEnum,
  isSigningOperation,
  SIGNING_ERROR_KINDS,
  type SigningErrorKind,
  SigningErrorKindEnum,
  ERROR_ENCODINGS,
  type ErrorEncoding,
  ErrorEncodingEnum,
} from './enums/index.js';

// Schemas (query params -> Command)
export {
  COMMAND_PARAMS,
  type CommandParam,
  type RawCommandParams,
  CallbackParamSchema,
  SignMessageParamsSchema,
  SignPersonalMessageParamsSchema,
  SignTransactionParamsSchema,
  type SignMessageParams,
  type SignTransactionParams,
  type TransactionRequest,
  type SignMessageCommand,
  type SignPersonalMessageCommand,
  type SignTransactionCommand,
  type Command,
} from './schemas/index.js';

// Errors
export {
  SIGNING_ERROR_CODES,
  type SigningErrorCodeEntry,
  signingErrorKindFromCode,
  SigningError,
} from './errors/index.js';

// Interfaces
export type {
  IWalletSigner,
  SignerSource,
  IUrlLauncher,
  SigningOutcome,
  SigningSuccess,
  SigningFailure,
} from './interfaces/index.js';

// Utils
export {
  encodeBase64,
  decodeBase64,
  decodeHexPayload,
  parseUnsignedDecimal,
  toAddress,
  UINT64_MAX,
} from './utils/index.js';
