/**
 * Delivers a URL to whatever process handles it. Fire-and-forget: there is no
 * delivery acknowledgment.
 */
export interface IUrlLauncher {
  launch(url: URL): void | Promise<void>;
}
