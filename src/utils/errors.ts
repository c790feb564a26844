export class FetchError extends Error {
  readonly url: string;
  /** HTTP status, or null when the request never got a response. */
  readonly status: number | null;

  constructor(url: string, status: number | null, options?: ErrorOptions) {
    super(status === null
      ? `Request to ${url} failed`
      : `HTTP ${status} while fetching ${url}`, options);
    this.name = 'FetchError';
    this.url = url;
    this.status = status;
  }
}

export class BrowserError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BrowserError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UploadError extends Error {
  constructor(sink: string, message: string, options?: ErrorOptions) {
    super(`[${sink}] ${message}`, options);
    this.name = 'UploadError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
