/**
 * Resolve the linksign config file path.
 *
 * Priority:
 *   1. --config CLI option
 *   2. LINKSIGN_CONFIG environment variable
 *   3. Default: ~/.linksign/config.toml
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export function resolveConfigPath(opts?: { config?: string }): string {
  if (opts?.config) return opts.config;
  if (process.env['LINKSIGN_CONFIG']) return process.env['LINKSIGN_CONFIG'];
  return join(homedir(), '.linksign', 'config.toml');
}
