/**
 * Result encoder: write a signing outcome into the caller's callback URL and
 * launch it.
 *
 * Success: {callback}?result={base64 signed payload}
 * Failure: {callback}?error={kind | numeric code}
 *
 * Exactly one query item is appended; existing query items and the fragment
 * are kept. The callback's scheme and origin are not checked.
 */

import {
  encodeBase64,
  SIGNING_ERROR_CODES,
  type ErrorEncoding,
  type IUrlLauncher,
  type SigningErrorKind,
  type SigningOutcome,
} from '@linksign/core';
import { createConsoleLogger, type ProtocolLogger } from './logger.js';

/**
 * Percent-encode a query component, keeping the base64 characters '+', '/'
 * and '=' literal.
 */
function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value)
    .replace(/%2B/g, '+')
    .replace(/%2F/g, '/')
    .replace(/%3D/g, '=');
}

/**
 * Append one `name=value` item to a copy of `callback`.
 *
 * @returns the new URL, or undefined when the callback cannot be re-parsed
 */
export function appendQueryItem(callback: URL, name: string, value: string): URL | undefined {
  if (!URL.canParse(callback.href)) return undefined;

  const target = new URL(callback.href);
  const item = `${encodeQueryComponent(name)}=${encodeQueryComponent(value)}`;
  const query = target.search.slice(1);
  target.search = query ? `${query}&${item}` : item;
  return target;
}

export function buildSuccessUrl(callback: URL, signedPayload: Uint8Array): URL | undefined {
  return appendQueryItem(callback, 'result', encodeBase64(signedPayload));
}

/**
 * @returns undefined for the `none` sentinel, which is never serialized
 */
export function buildFailureUrl(
  callback: URL,
  error: SigningErrorKind,
  encoding: ErrorEncoding = 'symbolic',
): URL | undefined {
  const entry = SIGNING_ERROR_CODES[error];
  if (!entry.serializable) return undefined;
  const value = encoding === 'numeric' ? String(entry.code) : entry.kind;
  return appendQueryItem(callback, 'error', value);
}

export interface ResultEncoderOptions {
  launcher: IUrlLauncher;
  errorEncoding?: ErrorEncoding;
  logger?: ProtocolLogger;
}

export class ResultEncoder {
  private readonly launcher: IUrlLauncher;
  private readonly errorEncoding: ErrorEncoding;
  private readonly logger: ProtocolLogger;

  constructor(options: ResultEncoderOptions) {
    this.launcher = options.launcher;
    this.errorEncoding = options.errorEncoding ?? 'symbolic';
    this.logger = options.logger ?? createConsoleLogger();
  }

  encodeSuccess(callback: URL, signedPayload: Uint8Array): void {
    const url = buildSuccessUrl(callback, signedPayload);
    if (!url) {
      this.logger.warn('Callback URL could not be re-parsed, dropping result');
      return;
    }
    this.launch(url);
  }

  encodeFailure(callback: URL, error: SigningErrorKind): void {
    if (!SIGNING_ERROR_CODES[error].serializable) {
      this.logger.warn(`Error kind '${error}' is not deliverable, dropping failure`);
      return;
    }
    const url = buildFailureUrl(callback, error, this.errorEncoding);
    if (!url) {
      this.logger.warn('Callback URL could not be re-parsed, dropping failure');
      return;
    }
    this.launch(url);
  }

  deliver(callback: URL, outcome: SigningOutcome): void {
    if (outcome.status === 'success') {
      this.encodeSuccess(callback, outcome.signedPayload);
    } else {
      this.encodeFailure(callback, outcome.error);
    }
  }

  private launch(url: URL): void {
    let pending: void | Promise<void>;
    try {
      pending = this.launcher.launch(url);
    } catch (err) {
      this.logger.error(`Failed to launch callback ${url.protocol}//${url.host}`, err);
      return;
    }
    if (pending instanceof Promise) {
      void pending.catch((err: unknown) => {
        this.logger.error(`Failed to launch callback ${url.protocol}//${url.host}`, err);
      });
    }
  }
}
