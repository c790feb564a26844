import * as fs from 'node:fs';
import * as path from 'node:path';
import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogFileOptions {
  /** Rotate before a write would grow the file past this size. */
  maxBytes?: number;
  /** Rotated files to keep (`scrape.log.1` … `scrape.log.N`). */
  maxFiles?: number;
}

interface LogFile {
  path: string;
  maxBytes: number;
  maxFiles: number;
}

let logFile: LogFile | null = null;

/** Mirror every log line into a size-rotated file, in addition to stderr. */
export function attachLogFile(filePath: string, options: LogFileOptions = {}): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  logFile = {
    path: filePath,
    maxBytes: options.maxBytes ?? 5 * 1024 * 1024,
    maxFiles: options.maxFiles ?? 5,
  };
}

export function detachLogFile(): void {
  logFile = null;
}

function rotate(file: LogFile, incoming: number): void {
  let size: number;
  try {
    size = fs.statSync(file.path).size;
  } catch {
    return; // nothing written yet
  }
  if (size === 0 || size + incoming <= file.maxBytes) return;

  for (let i = file.maxFiles - 1; i >= 1; i--) {
    const from = `${file.path}.${i}`;
    if (fs.existsSync(from)) fs.renameSync(from, `${file.path}.${i + 1}`);
  }
  fs.renameSync(file.path, `${file.path}.1`);
}

function write(level: LogLevel, args: unknown[]): void {
  const tag = `[${level.toUpperCase()}]`;
  // stderr keeps stdout free for piping scraped output
  console.error(tag, ...args);

  if (!logFile) return;
  const line = `${new Date().toISOString()} ${tag} ${format(...args)}\n`;
  rotate(logFile, Buffer.byteLength(line));
  fs.appendFileSync(logFile.path, line);
}

export const logger = {
  info: (...args: unknown[]) => write('info', args),
  warn: (...args: unknown[]) => write('warn', args),
  error: (...args: unknown[]) => write('error', args),
  debug: (...args: unknown[]) => {
    if (process.env.DEBUG) write('debug', args);
  },
};
