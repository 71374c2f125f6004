/**
 * Launcher that hands callback URLs to the operating system's URL opener.
 */

import open from 'open';
import type { IUrlLauncher } from '@linksign/core';

export class OpenUrlLauncher implements IUrlLauncher {
  async launch(url: URL): Promise<void> {
    await open(url.href);
  }
}
