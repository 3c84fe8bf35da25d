import type { BrowserService } from "../ports/browser.js";

/** Launches a URL with the platform's opener; `wait: false` returns once it is handed off */
export type Opener = (url: string, options: { wait: boolean }) => Promise<unknown>;

export interface SystemBrowserOptions {
  opener?: Opener;
}

const WEB_PROTOCOLS = new Set(["http:", "https:"]);

// `open` is loaded lazily so listing links never pulls it in
const defaultOpener: Opener = async (url, options) => {
  const openModule = await import("open");
  return openModule.default(url, options);
};

/**
 * Browser service that hands each profile link to the default browser, which
 * opens it as a new tab in the running window. Only http(s) links are opened.
 */
export function createSystemBrowser(options: SystemBrowserOptions = {}): BrowserService {
  const opener = options.opener ?? defaultOpener;

  return {
    async open(url: string): Promise<void> {
      let protocol: string;
      try {
        protocol = new URL(url).protocol;
      } catch {
        throw new Error(`Not a valid URL: ${url}`);
      }
      if (!WEB_PROTOCOLS.has(protocol)) {
        throw new Error(`Only http(s) links are opened, got ${protocol}`);
      }
      // don't block on the browser process; the pause between batches paces tabs
      await opener(url, { wait: false });
    },
  };
}

export const systemBrowser: BrowserService = createSystemBrowser();
