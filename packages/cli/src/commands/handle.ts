/**
 * `linksign handle <url>` -- Act as the wallet for one command URL.
 *
 * Prints the confirmation summary, signs with the configured key and
 * delivers the callback (printed, or opened with --open).
 *
 * Exit code: 0 when the URL was handled, 1 otherwise.
 */

import {
  createConsoleLogger,
  formatDisplayMessage,
  FunctionUrlLauncher,
  OpenUrlLauncher,
  parseCommand,
  SigningLinkHandler,
} from '@linksign/wallet-sdk';
import type { IUrlLauncher } from '@linksign/core';
import { LocalAccountSigner } from '@linksign/adapter-evm';
import type { LinksignConfig } from '../config/loader.js';

export interface HandleCommandOptions {
  config: LinksignConfig;
  /** Open the callback with the system opener regardless of `launcher.mode`. */
  open?: boolean;
}

export function createLauncher(config: LinksignConfig, open = false): IUrlLauncher {
  if (open || config.launcher.mode === 'open') return new OpenUrlLauncher();
  return new FunctionUrlLauncher((url) => {
    console.log(url.href);
  });
}

export function createHandler(config: LinksignConfig, open = false): SigningLinkHandler {
  const privateKey = config.signer.private_key;
  const signer =
    privateKey !== undefined
      ? new LocalAccountSigner({ privateKey, chainId: config.signer.chain_id })
      : undefined;

  return new SigningLinkHandler({
    ...(signer !== undefined ? { signer } : {}),
    launcher: createLauncher(config, open),
    errorEncoding: config.protocol.error_encoding,
    logger: createConsoleLogger('[linksign]'),
  });
}

export async function handleCommand(url: string, opts: HandleCommandOptions): Promise<number> {
  const { scheme } = opts.config.protocol;
  if (URL.canParse(url) && new URL(url).protocol !== `${scheme.toLowerCase()}:`) {
    console.error(`Not a ${scheme}:// URL: ${url}`);
    return 1;
  }

  const parsed = parseCommand(url);
  if (parsed.status === 'parsed') {
    console.log(formatDisplayMessage(parsed.command));
  }

  const result = createHandler(opts.config, opts.open).handleDetailed(url);
  switch (result.status) {
    case 'unhandled':
      console.error(`Not a signing command: ${url}`);
      return 1;
    case 'ignored':
      console.error(
        'No signer configured. Set [signer] private_key or LINKSIGN_SIGNER_PRIVATE_KEY.',
      );
      return 1;
    case 'rejected':
      console.log(`Status: rejected (${result.issues.join('; ')})`);
      return 0;
    case 'dispatched': {
      const outcome = await result.completion;
      console.log(
        outcome.status === 'success' ? 'Status: signed' : `Status: failed (${outcome.error})`,
      );
      return 0;
    }
  }
}
