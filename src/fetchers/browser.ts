import { chromium, type Browser, type LaunchOptions } from 'playwright-core';
import { BrowserError, errorMessage, logger } from '../utils/index.js';

/**
 * Launch a browser, hand it to `use`, and close it on every way out.
 * A failed launch is reported as a BrowserError.
 */
export async function withBrowser<T>(
  options: LaunchOptions,
  use: (browser: Browser) => Promise<T>,
): Promise<T> {
  let browser: Browser;
  try {
    browser = await chromium.launch(options);
  } catch (err) {
    throw new BrowserError(`Browser launch failed: ${errorMessage(err)}`, { cause: err });
  }

  try {
    return await use(browser);
  } finally {
    // A failing close must not replace the error already on its way out
    await browser.close().then(
      () => logger.debug('Browser closed'),
      (err: unknown) => logger.warn(`Browser close failed: ${errorMessage(err)}`),
    );
  }
}
