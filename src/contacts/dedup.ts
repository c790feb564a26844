import type { ContactEntry } from '../types/index.js';
import { normalizeEmail } from './normalize.js';

/**
 * Keep the first entry seen for each email (case-insensitive), in input order.
 * Entries without an email are dropped.
 */
export function deduplicateEntries(entries: ContactEntry[]): ContactEntry[] {
  const seen = new Set<string>();
  const unique: ContactEntry[] = [];

  for (const entry of entries) {
    const key = normalizeEmail(entry.email);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    unique.push(entry);
  }

  return unique;
}
