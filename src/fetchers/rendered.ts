import { BrowserError, errorMessage, sleep } from '../utils/index.js';
import { withBrowser } from './browser.js';

export interface RenderedFetchOptions {
  headless: boolean;
  /** Time given to page scripts after navigation before the DOM is captured. */
  settleMs: number;
}

/** Run one browser call, reporting its failure as a BrowserError. */
async function step<T>(what: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    throw new BrowserError(`${what} failed: ${errorMessage(err)}`, { cause: err });
  }
}

/** Render the page in a fresh browser and return the serialized DOM. */
export async function fetchRendered(url: string, options: RenderedFetchOptions): Promise<string> {
  return withBrowser({ headless: options.headless }, async (browser) => {
    const page = await step('Opening a page', () => browser.newPage());
    await step(`Navigation to ${url}`, () => page.goto(url));
    await sleep(options.settleMs);
    return step('Reading page content', () => page.content());
  });
}
