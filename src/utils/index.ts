export { logger, attachLogFile, detachLogFile } from './logger.js';
export type { LogLevel, LogFileOptions } from './logger.js';
export { FetchError, BrowserError, ConfigError, UploadError, errorMessage } from './errors.js';

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
