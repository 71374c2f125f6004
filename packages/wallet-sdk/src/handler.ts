/**
 * SigningLinkHandler - entry point for inbound command URLs.
 *
 * inbound URL -> parseCommand -> CommandDispatcher -> signer
 *                                                  -> ResultEncoder -> launcher
 */

import type { ErrorEncoding, IUrlLauncher, SignerSource } from '@linksign/core';
import { parseCommand } from './parse-command.js';
import { CommandDispatcher, type DispatchResult } from './dispatcher.js';
import { ResultEncoder } from './result-encoder.js';
import { createConsoleLogger, type ProtocolLogger } from './logger.js';

export interface SigningLinkHandlerOptions {
  /** Signing provider, or a getter resolved on every command. Absent -> URLs are declined. */
  signer?: SignerSource;
  launcher: IUrlLauncher;
  /** How failure kinds are written to callbacks. Default 'symbolic'. */
  errorEncoding?: ErrorEncoding;
  logger?: ProtocolLogger;
}

export interface UnhandledResult {
  status: 'unhandled';
  accepted: false;
  error: 'none';
}

export type HandleResult = UnhandledResult | DispatchResult;

const UNHANDLED: UnhandledResult = Object.freeze({
  status: 'unhandled',
  accepted: false,
  error: 'none',
});

export class SigningLinkHandler {
  private readonly dispatcher: CommandDispatcher;

  constructor(options: SigningLinkHandlerOptions) {
    const logger = options.logger ?? createConsoleLogger();
    const encoder = new ResultEncoder({
      launcher: options.launcher,
      errorEncoding: options.errorEncoding,
      logger,
    });
    this.dispatcher = new CommandDispatcher({ signer: options.signer, encoder, logger });
  }

  /**
   * Handle a URL passed to the wallet.
   *
   * @returns true if this protocol claimed the URL (even when the request
   *          was malformed); false for foreign URLs or when no signer is attached
   */
  handle(url: string | URL): boolean {
    return this.handleDetailed(url).accepted;
  }

  /**
   * Like handle(), but exposes whether the command was ignored, rejected or
   * dispatched, and the completion of a dispatched command.
   */
  handleDetailed(url: string | URL): HandleResult {
    const parsed = parseCommand(url);
    if (parsed.status === 'unhandled') return UNHANDLED;
    return this.dispatcher.dispatch(parsed);
  }
}
