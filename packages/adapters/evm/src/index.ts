export { LocalAccountSigner, type LocalAccountSignerOptions } from './local-account-signer.js';
