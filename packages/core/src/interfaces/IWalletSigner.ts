import type { Address } from 'viem';
import type { TransactionRequest } from '../schemas/command.schema.js';

/**
 * Signing provider the protocol engine dispatches to.
 *
 * Each method settles exactly once. Failures reject with a SigningError whose
 * `kind` is forwarded to the caller; any other rejection is reported as
 * `unknown`.
 */
export interface IWalletSigner {
  /** Sign raw message bytes. `address` selects the account; undefined lets the signer choose. */
  signMessage(message: Uint8Array, address?: Address): Promise<Uint8Array>;

  /** Sign message bytes with the personal-message prefix. */
  signPersonalMessage(message: Uint8Array, address?: Address): Promise<Uint8Array>;

  /** Sign a fully-populated transaction and return its serialized signed form. */
  signTransaction(transaction: TransactionRequest): Promise<Uint8Array>;
}

/**
 * Non-owning binding to the signer. A function is resolved again on every
 * dispatch, so the host can detach the signer without rebuilding the engine.
 */
export type SignerSource = IWalletSigner | (() => IWalletSigner | undefined);
