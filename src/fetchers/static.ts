import fetch, { type Response } from 'node-fetch';
import { FetchError, logger, sleep } from '../utils/index.js';

export interface StaticFetchOptions {
  /** Pause after a successful response, to go easy on the origin. */
  throttleMs: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36';

/** Single GET, no retries. Any non-2xx status is a FetchError. */
export async function fetchStatic(url: string, options: StaticFetchOptions): Promise<string> {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: {
        'Accept': 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      },
    });
  } catch (err) {
    throw new FetchError(url, null, { cause: err });
  }

  if (!res.ok) throw new FetchError(url, res.status);

  const body = await res.text();
  logger.debug(`GET ${url} -> ${res.status} (${body.length} chars)`);
  await sleep(options.throttleMs);
  return body;
}
