/**
 * LocalAccountSigner - IWalletSigner backed by a viem local account.
 *
 *   sign-message          -> secp256k1 signature over keccak256(message)
 *   sign-personal-message -> EIP-191 personal_sign over the raw bytes
 *   sign-transaction      -> EIP-155 legacy transaction, serialized and signed
 *
 * Signatures are returned as 65 bytes (r || s || v).
 */

import { bytesToHex, hexToBytes, keccak256, type Address, type Hex } from 'viem';
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import { SigningError, type IWalletSigner, type TransactionRequest } from '@linksign/core';

export interface LocalAccountSignerOptions {
  privateKey: Hex;
  chainId: number;
}

const MAX_NONCE = BigInt(Number.MAX_SAFE_INTEGER);

export class LocalAccountSigner implements IWalletSigner {
  private readonly account: PrivateKeyAccount;
  readonly chainId: number;

  constructor(options: LocalAccountSignerOptions) {
    this.account = privateKeyToAccount(options.privateKey);
    this.chainId = options.chainId;
  }

  get address(): Address {
    return this.account.address;
  }

  async signMessage(message: Uint8Array, address?: Address): Promise<Uint8Array> {
    this.ensureAccount(address);
    const signature = await this.account.sign({ hash: keccak256(message) });
    return hexToBytes(signature);
  }

  async signPersonalMessage(message: Uint8Array, address?: Address): Promise<Uint8Array> {
    this.ensureAccount(address);
    const signature = await this.account.signMessage({ message: { raw: message } });
    return hexToBytes(signature);
  }

  async signTransaction(transaction: TransactionRequest): Promise<Uint8Array> {
    if (transaction.nonce > MAX_NONCE) {
      throw new SigningError('invalidRequest', {
        message: `Nonce ${transaction.nonce.toString()} is out of range`,
      });
    }

    const signedHex = await this.account.signTransaction({
      type: 'legacy',
      chainId: this.chainId,
      nonce: Number(transaction.nonce),
      gasPrice: transaction.gasPrice,
      gas: transaction.gasLimit,
      to: transaction.to,
      value: transaction.amount,
      ...(transaction.payload !== undefined ? { data: bytesToHex(transaction.payload) } : {}),
    });
    return hexToBytes(signedHex);
  }

  private ensureAccount(address: Address | undefined): void {
    if (address === undefined) return;
    if (address.toLowerCase() !== this.account.address.toLowerCase()) {
      throw new SigningError('unsupportedAddress', {
        message: `Signer holds ${this.account.address}, not ${address}`,
      });
    }
  }
}
