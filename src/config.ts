import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './utils/index.js';

export interface AppConfig {
  targetUrl: string;
  spreadsheetId: string;
  sheetTab: string;
  credentialsPath?: string;
  logFile: string;
  logMaxBytes: number;
  logMaxFiles: number;
  throttleMs: number;
  userAgent?: string;
}

export const DEFAULT_TARGET_URL = 'https://sudburyrealestateboard.com/find-a-realtor/';
export const DEFAULT_SPREADSHEET_ID = '1-kGNDW07iQ7WarkpHmhPCgI6wEHFyFbf6-VqnIEiYQs';
export const DEFAULT_SHEET_TAB = 'Mortgage Agent List';

const optionalText = z.string().trim().optional().transform(v => v || undefined);

const EnvSchema = z.object({
  SCRAPE_URL: z.string().url().default(DEFAULT_TARGET_URL),
  SHEET_ID: z.string().trim().min(1).default(DEFAULT_SPREADSHEET_ID),
  SHEET_TAB: z.string().trim().min(1).default(DEFAULT_SHEET_TAB),
  GOOGLE_CREDS_JSON: optionalText,
  LOG_DIR: z.string().trim().min(1).default('logs'),
  LOG_MAX_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  LOG_MAX_FILES: z.coerce.number().int().positive().default(5),
  THROTTLE_MS: z.coerce.number().int().nonnegative().default(1000),
  HTTP_USER_AGENT: optionalText,
});

/** Read settings from the environment (after dotenv has loaded `.env`). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    targetUrl: vars.SCRAPE_URL,
    spreadsheetId: vars.SHEET_ID,
    sheetTab: vars.SHEET_TAB,
    credentialsPath: vars.GOOGLE_CREDS_JSON,
    logFile: path.join(vars.LOG_DIR, 'scrape.log'),
    logMaxBytes: vars.LOG_MAX_BYTES,
    logMaxFiles: vars.LOG_MAX_FILES,
    throttleMs: vars.THROTTLE_MS,
    userAgent: vars.HTTP_USER_AGENT,
  };
}
