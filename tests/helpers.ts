import type { ContactEntry, ContactSink } from '../src/types/index.js';

/** Build a contact entry for testing. */
export function makeEntry(overrides: Partial<ContactEntry> = {}): ContactEntry {
  return {
    name: overrides.name ?? 'Test Agent',
    brokerage: overrides.brokerage ?? 'Test Realty',
    email: overrides.email ?? 'agent@example.test',
    phone: overrides.phone ?? '',
  };
}

/** Directory-style list item: a mailto link followed by one span per line. */
export function listItem(email: string, ...lines: string[]): string {
  const spans = lines.map(line => `<span>${line}</span>`).join('');
  return `<li><a href="mailto:${email}">${email}</a>${spans}</li>`;
}

/** In-memory sink that records every batch it is given. */
export class RecordingSink implements ContactSink {
  readonly name = 'recording';
  readonly batches: ContactEntry[][] = [];

  async append(entries: ContactEntry[]): Promise<number> {
    this.batches.push(entries);
    return entries.length;
  }
}
