import type { AppConfig } from './config.js';
import { fetchRendered, fetchStatic } from './fetchers/index.js';
import { GoogleSheetsProvider } from './providers/index.js';
import { ScrapeEngine } from './scrape/index.js';

export interface ScraperOptions {
  headless: boolean;
}

export function createScrapeEngine(config: AppConfig, options: ScraperOptions): ScrapeEngine {
  const sink = new GoogleSheetsProvider({
    spreadsheetId: config.spreadsheetId,
    sheetTab: config.sheetTab,
    credentialsPath: config.credentialsPath,
  });

  return new ScrapeEngine(config.targetUrl, {
    fetchStatic: (url) => fetchStatic(url, { throttleMs: config.throttleMs, userAgent: config.userAgent }),
    fetchRendered: (url) => fetchRendered(url, { headless: options.headless, settleMs: config.throttleMs }),
  }, sink);
}
