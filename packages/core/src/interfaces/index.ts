export type { IWalletSigner, SignerSource } from './IWalletSigner.js';
export type { IUrlLauncher } from './IUrlLauncher.js';
export type { SigningOutcome, SigningSuccess, SigningFailure } from './signing-outcome.js';
