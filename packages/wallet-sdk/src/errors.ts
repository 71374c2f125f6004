/**
 * Custom error classes for @linksign/wallet-sdk.
 *
 * The protocol engine itself never throws; these are raised by the
 * caller-side helpers that build command URLs and read callback URLs.
 */

/**
 * Thrown when a command URL cannot be built (e.g. an invalid scheme).
 */
export class InvalidCommandUrlError extends Error {
  override readonly name = 'InvalidCommandUrlError';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Thrown when a callback URL is unparsable or carries a malformed
 * `result` / `error` parameter.
 */
export class InvalidCallbackUrlError extends Error {
  override readonly name = 'InvalidCallbackUrlError';

  constructor(message: string) {
    super(message);
  }
}
