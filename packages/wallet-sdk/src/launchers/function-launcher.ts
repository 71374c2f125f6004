import type { IUrlLauncher } from '@linksign/core';

/**
 * Launcher that passes every URL to a host-supplied function.
 */
export class FunctionUrlLauncher implements IUrlLauncher {
  private readonly onLaunch: (url: URL) => void | Promise<void>;

  constructor(onLaunch: (url: URL) => void | Promise<void>) {
    this.onLaunch = onLaunch;
  }

  launch(url: URL): void | Promise<void> {
    return this.onLaunch(url);
  }
}
