import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import {
  DEFAULT_SHEET_TAB,
  DEFAULT_SPREADSHEET_ID,
  DEFAULT_TARGET_URL,
  loadConfig,
} from '../src/config.js';
import { ConfigError } from '../src/utils/errors.js';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      targetUrl: DEFAULT_TARGET_URL,
      spreadsheetId: DEFAULT_SPREADSHEET_ID,
      sheetTab: DEFAULT_SHEET_TAB,
      credentialsPath: undefined,
      logFile: path.join('logs', 'scrape.log'),
      logMaxBytes: 5 * 1024 * 1024,
      logMaxFiles: 5,
      throttleMs: 1000,
      userAgent: undefined,
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      SCRAPE_URL: 'https://directory.test/agents',
      SHEET_ID: 'sheet-123',
      SHEET_TAB: 'Agents',
      GOOGLE_CREDS_JSON: '/secrets/service-account.json',
      LOG_DIR: '/var/log/scraper',
      THROTTLE_MS: '250',
      LOG_MAX_FILES: '2',
      HTTP_USER_AGENT: 'test-agent',
    });

    expect(config).toMatchObject({
      targetUrl: 'https://directory.test/agents',
      spreadsheetId: 'sheet-123',
      sheetTab: 'Agents',
      credentialsPath: '/secrets/service-account.json',
      logFile: path.join('/var/log/scraper', 'scrape.log'),
      throttleMs: 250,
      logMaxFiles: 2,
      userAgent: 'test-agent',
    });
  });

  it('should treat an empty credential path as unset', () => {
    expect(loadConfig({ GOOGLE_CREDS_JSON: '' }).credentialsPath).toBeUndefined();
  });

  it('should reject an invalid target URL', () => {
    expect(() => loadConfig({ SCRAPE_URL: 'not a url' })).toThrow(ConfigError);
    expect(() => loadConfig({ SCRAPE_URL: 'not a url' })).toThrow(/SCRAPE_URL/);
  });

  it('should list every invalid variable', () => {
    expect(() => loadConfig({ THROTTLE_MS: '-5', LOG_MAX_FILES: '0' })).toThrow(
      /LOG_MAX_FILES: .*; THROTTLE_MS: /,
    );
  });

  it('should reject an empty sheet tab', () => {
    expect(() => loadConfig({ SHEET_TAB: '   ' })).toThrow(/SHEET_TAB/);
  });
});
