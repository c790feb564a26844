import type { ContactSink, PageFetchers } from '../types/index.js';
import { deduplicateEntries, parseEntries } from '../contacts/index.js';
import { logger } from '../utils/index.js';

export type ScrapeStage =
  | 'init'
  | 'fetch-static'
  | 'fetch-rendered'
  | 'parse-done'
  | 'dedupe'
  | 'upload'
  | 'done';

export interface ScrapeResult {
  source: 'static' | 'rendered';
  parsed: number;
  unique: number;
  appended: number;
  duration: number;
}

/**
 * One pass of fetch → parse → dedupe → upload. The rendered fetch runs only
 * when the static page parses to zero entries; a failed static fetch is not
 * retried through it. Any error aborts the run and leaves `stage` where it
 * happened.
 */
export class ScrapeEngine {
  private targetUrl: string;
  private fetchers: PageFetchers;
  private sink: ContactSink;
  private current: ScrapeStage = 'init';

  constructor(targetUrl: string, fetchers: PageFetchers, sink: ContactSink) {
    this.targetUrl = targetUrl;
    this.fetchers = fetchers;
    this.sink = sink;
  }

  get stage(): ScrapeStage {
    return this.current;
  }

  private enter(stage: ScrapeStage): void {
    logger.debug(`scrape: ${this.current} -> ${stage}`);
    this.current = stage;
  }

  async run(): Promise<ScrapeResult> {
    const startTime = Date.now();
    logger.info('Starting scrape');

    this.enter('fetch-static');
    let source: ScrapeResult['source'] = 'static';
    let entries = parseEntries(await this.fetchers.fetchStatic(this.targetUrl));

    if (entries.length === 0) {
      logger.info('Switching to rendered fetch');
      this.enter('fetch-rendered');
      source = 'rendered';
      entries = parseEntries(await this.fetchers.fetchRendered(this.targetUrl));
    }
    this.enter('parse-done');

    this.enter('dedupe');
    const rows = deduplicateEntries(entries);
    logger.info(`Parsed ${rows.length} unique rows`);

    this.enter('upload');
    const appended = await this.sink.append(rows);
    logger.info('Completed upload');

    this.enter('done');
    return {
      source,
      parsed: entries.length,
      unique: rows.length,
      appended,
      duration: Date.now() - startTime,
    };
  }
}
