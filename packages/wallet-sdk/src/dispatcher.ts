/**
 * CommandDispatcher - hand a parsed command to the signer and route its
 * outcome to the result encoder.
 *
 * Order of checks:
 *   1. No signer attached  -> ignored (nothing is launched, not accepted)
 *   2. Invalid command     -> rejected, `invalidRequest` sent to the callback
 *                             before dispatch() returns
 *   3. Well-formed command -> exactly one signer call; dispatch() returns
 *                             without waiting for it
 *
 * The dispatcher keeps no state between commands: every completion captures
 * its own callback.
 */

import {
  SigningError,
  type Command,
  type IWalletSigner,
  type SignerSource,
  type SigningErrorKind,
  type SigningOutcome,
} from '@linksign/core';
import type { InvalidCommand, ParsedCommand } from './parse-command.js';
import type { ResultEncoder } from './result-encoder.js';
import { createConsoleLogger, type ProtocolLogger } from './logger.js';

export interface IgnoredDispatch {
  status: 'ignored';
  accepted: false;
  error: 'none';
}

export interface RejectedDispatch {
  status: 'rejected';
  accepted: true;
  error: 'invalidRequest';
  issues: string[];
}

export interface StartedDispatch {
  status: 'dispatched';
  accepted: true;
  error: 'none';
  /** Settles once the outcome has been delivered (or dropped). Never rejects. */
  completion: Promise<SigningOutcome>;
}

export type DispatchResult = IgnoredDispatch | RejectedDispatch | StartedDispatch;

export interface CommandDispatcherOptions {
  signer?: SignerSource;
  encoder: ResultEncoder;
  logger?: ProtocolLogger;
}

const IGNORED: IgnoredDispatch = Object.freeze({
  status: 'ignored',
  accepted: false,
  error: 'none',
});

/**
 * Map a signer rejection to the kind written to the callback.
 */
export function signingErrorKindOf(err: unknown): SigningErrorKind {
  if (err instanceof SigningError && err.kind !== 'none') return err.kind;
  return 'unknown';
}

/**
 * Settle a pending signature into a SigningOutcome. Never rejects.
 */
export async function toSigningOutcome(pending: Promise<Uint8Array>): Promise<SigningOutcome> {
  try {
    const signedPayload = await pending;
    return { status: 'success', signedPayload };
  } catch (err) {
    return { status: 'failure', error: signingErrorKindOf(err) };
  }
}

export class CommandDispatcher {
  private readonly signer: SignerSource | undefined;
  private readonly encoder: ResultEncoder;
  private readonly logger: ProtocolLogger;

  constructor(options: CommandDispatcherOptions) {
    this.signer = options.signer;
    this.encoder = options.encoder;
    this.logger = options.logger ?? createConsoleLogger();
  }

  dispatch(parsed: ParsedCommand | InvalidCommand): DispatchResult {
    const signer = this.resolveSigner();
    if (!signer) {
      this.logger.debug('No signer attached, ignoring command');
      return IGNORED;
    }

    if (parsed.status === 'invalid') {
      this.logger.warn(`Rejected ${parsed.operation}: ${parsed.issues.join('; ')}`);
      if (parsed.callback) {
        this.encoder.encodeFailure(parsed.callback, 'invalidRequest');
      } else {
        this.logger.debug(`No callback for ${parsed.operation}, dropping invalidRequest`);
      }
      return { status: 'rejected', accepted: true, error: 'invalidRequest', issues: parsed.issues };
    }

    const { command } = parsed;
    const completion = this.complete(command, this.invoke(signer, command));
    return { status: 'dispatched', accepted: true, error: 'none', completion };
  }

  private resolveSigner(): IWalletSigner | undefined {
    return typeof this.signer === 'function' ? this.signer() : this.signer;
  }

  private invoke(signer: IWalletSigner, command: Command): Promise<Uint8Array> {
    try {
      switch (command.operation) {
        case 'sign-message':
          return signer.signMessage(command.message, command.address);
        case 'sign-personal-message':
          return signer.signPersonalMessage(command.message, command.address);
        case 'sign-transaction':
          return signer.signTransaction(command.transaction);
      }
    } catch (err) {
      return Promise.reject(err);
    }
  }

  private async complete(
    command: Command,
    pending: Promise<Uint8Array>,
  ): Promise<SigningOutcome> {
    const outcome = await toSigningOutcome(pending);
    if (outcome.status === 'failure') {
      this.logger.warn(`Signer reported ${outcome.error} for ${command.operation}`);
    }

    if (command.callback) {
      this.encoder.deliver(command.callback, outcome);
    } else {
      this.logger.debug(`No callback for ${command.operation}, dropping ${outcome.status}`);
    }
    return outcome;
  }
}
