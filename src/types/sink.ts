import type { ContactEntry } from './contact.js';

/** Append-only destination for scraped contacts. */
export interface ContactSink {
  readonly name: string;

  /** Append entries as new rows; resolves to the number of rows written. */
  append(entries: ContactEntry[]): Promise<number>;
}
