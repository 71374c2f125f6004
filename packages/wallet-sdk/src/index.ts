/**
 * @linksign/wallet-sdk - URL command protocol engine for wallet signing.
 *
 * Wallet side:
 *   - SigningLinkHandler.handle(url) - Parse, dispatch to the signer, deliver the callback
 *   - parseCommand(url) - Inbound URL -> typed Command
 *   - CommandDispatcher / ResultEncoder - The engine's stages, for custom wiring
 *   - formatDisplayMessage(command) - Confirmation screen text
 *   - OpenUrlLauncher / FunctionUrlLauncher - Callback delivery
 *
 * Caller side:
 *   - buildCommandUrl(scheme, command) - Typed Command -> inbound URL
 *   - readCallbackResult(url) - Decode the wallet's callback URL
 */

// Engine
export {
  SigningLinkHandler,
  type SigningLinkHandlerOptions,
  type HandleResult,
  type UnhandledResult,
} from './handler.js';
export {
  parseCommand,
  type ParseResult,
  type ParsedCommand,
  type InvalidCommand,
  type UnhandledUrl,
} from './parse-command.js';
export {
  CommandDispatcher,
  type CommandDispatcherOptions,
  type DispatchResult,
  type IgnoredDispatch,
  type RejectedDispatch,
  type StartedDispatch,
  signingErrorKindOf,
  toSigningOutcome,
} from './dispatcher.js';
export {
  ResultEncoder,
  type ResultEncoderOptions,
  appendQueryItem,
  buildSuccessUrl,
  buildFailureUrl,
} from './result-encoder.js';
export { getQueryParameter, readQueryParameters } from './query.js';
export { createConsoleLogger, type ProtocolLogger } from './logger.js';

// Display
export { formatDisplayMessage } from './display.js';

// Caller side
export { buildCommandUrl } from './build-command-url.js';
export { readCallbackResult, type CallbackResult } from './read-callback.js';

// Launchers
export { OpenUrlLauncher, FunctionUrlLauncher } from './launchers/index.js';

// Error classes
export { InvalidCommandUrlError, InvalidCallbackUrlError } from './errors.js';

// Re-export types from @linksign/core for convenience
export type {
  Command,
  TransactionRequest,
  IWalletSigner,
  IUrlLauncher,
  SignerSource,
  SigningOutcome,
  SigningErrorKind,
} from '@linksign/core';
export { SigningError } from '@linksign/core';
