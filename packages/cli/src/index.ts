#!/usr/bin/env node
/**
 * linksign CLI entry point.
 *
 * Commands:
 *   handle <url>            -- Sign a command URL and deliver its callback
 *   build <operation>       -- Print a command URL
 *   read <callback-url>     -- Decode a callback URL
 *
 * handle and build accept --config <path> (default: ~/.linksign/config.toml)
 */

import { Command } from 'commander';
import { handleCommand } from './commands/handle.js';
import { buildCommand, type BuildCommandOptions } from './commands/build.js';
import { readCommand } from './commands/read.js';
import { loadConfig } from './config/loader.js';
import { resolveConfigPath } from './utils/config-path.js';

const program = new Command();

program
  .name('linksign')
  .description('linksign - URL command protocol for wallet signing')
  .version('0.1.0');

program
  .command('handle')
  .description('Sign a command URL and deliver the result to its callback')
  .argument('<url>', 'Command URL, e.g. linksign://sign-message?message=...')
  .option('--config <path>', 'Config file path')
  .option('--open', 'Open the callback URL instead of printing it')
  .action(async (url: string, opts: { config?: string; open?: boolean }) => {
    const config = loadConfig(resolveConfigPath(opts));
    process.exitCode = await handleCommand(url, { config, open: opts.open === true });
  });

program
  .command('build')
  .description('Print a command URL')
  .argument('<operation>', 'sign-message | sign-personal-message | sign-transaction')
  .option('--config <path>', 'Config file path')
  .option('--scheme <scheme>', 'URL scheme (default: [protocol] scheme)')
  .option('--message <text>', 'Message text (UTF-8)')
  .option('--address <address>', 'Account to sign with')
  .option('--to <address>', 'Transaction recipient')
  .option('--amount <wei>', 'Transaction value in wei')
  .option('--gas-price <wei>', 'Gas price in wei')
  .option('--gas-limit <gas>', 'Gas limit')
  .option('--nonce <nonce>', 'Transaction nonce (default: 0)')
  .option('--data <hex>', 'Transaction calldata')
  .option('--callback <url>', 'URL the wallet opens with the result')
  .action(
    (operation: string, opts: Omit<BuildCommandOptions, 'scheme'> & { config?: string; scheme?: string }) => {
      const scheme = opts.scheme ?? loadConfig(resolveConfigPath(opts)).protocol.scheme;
      console.log(buildCommand(operation, { ...opts, scheme }));
    },
  );

program
  .command('read')
  .description('Decode the result or error carried by a callback URL')
  .argument('<callback-url>', 'URL the wallet opened')
  .action((url: string) => {
    process.exitCode = readCommand(url);
  });

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(err.message);
  process.exit(1);
});
