#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from './cli.js';
import { loadConfig } from './config.js';
import { createScrapeEngine } from './scraper.js';
import { attachLogFile, logger } from './utils/index.js';

async function main() {
  const { headless } = parseArgs(process.argv);
  const config = loadConfig();
  attachLogFile(config.logFile, { maxBytes: config.logMaxBytes, maxFiles: config.logMaxFiles });

  const engine = createScrapeEngine(config, { headless });
  const result = await engine.run();
  logger.debug(`Finished in ${result.duration}ms via ${result.source} fetch`);
}

main().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
