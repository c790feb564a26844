import * as cheerio from 'cheerio';
import type { ContactEntry } from '../types/index.js';
import { collapseWhitespace, emailFromMailto } from './normalize.js';

/** North American number: "(705) 555-1234", "705-555-1234", "705.555.1234", "7055551234". */
export const PHONE_PATTERN = /\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/;
const ALL_PHONES = new RegExp(PHONE_PATTERN.source, 'g');

/** Nearest of these around a mailto link bounds one directory record. */
const RECORD_CONTAINERS = 'li, div, tr';
const HIDDEN_CONTENT = 'script, style, noscript';

const EDGE_PUNCTUATION = /^[\s:|,•·–-]+|[\s:|,•·–-]+$/g;
const CONTACT_LABEL = /^(e-?mail|phone|tel|telephone|cell|mobile|office|fax|direct|contact)$/i;

const BROKERAGE_WORDS = new Set([
  'realty', 'real', 'brokerage', 'realtor', 'realtors', 'properties', 'property',
  'homes', 'group', 'team', 'associates', 'inc', 'ltd', 'limited', 'corp',
  'corporation', 'llc',
]);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Drop the email and any phone numbers from a line, plus the separators they leave behind. */
function stripContactDetails(line: string, email: string): string {
  const rest = line
    .replace(new RegExp(escapeRegExp(email), 'gi'), ' ')
    .replace(ALL_PHONES, ' ');
  return collapseWhitespace(rest).replace(EDGE_PUNCTUATION, '');
}

/**
 * Split a single "Jane Doe ABC Realty" line into name and brokerage.
 * Only splits when a brokerage word appears after the first two words; the
 * brokerage then starts one word before it. Otherwise the whole line is the name.
 */
export function splitNameAndBrokerage(line: string): [name: string, brokerage: string] {
  const words = collapseWhitespace(line).split(' ');
  const at = words.findIndex(w => BROKERAGE_WORDS.has(w.toLowerCase().replace(/[.,]/g, '')));
  if (words.length < 3 || at < 2) return [line.trim(), ''];
  const start = Math.max(2, at - 1);
  return [words.slice(0, start).join(' '), words.slice(start).join(' ')];
}

/**
 * Pull contact entries out of a directory page, one per mailto link, in
 * document order. Never throws on odd markup; a page without mailto links
 * yields an empty list.
 */
export function parseEntries(html: string): ContactEntry[] {
  const $ = cheerio.load(html);
  const entries: ContactEntry[] = [];

  $('a[href^="mailto:" i]').each((_, anchor) => {
    const $anchor = $(anchor);
    const email = emailFromMailto($anchor.attr('href') ?? '');
    if (!email) return;

    const container = $anchor.parents(RECORD_CONTAINERS).first();
    const block = container.length > 0 ? container : $anchor.parent();

    // One line per text node: fence every element with newlines, then split
    const copy = block.clone();
    copy.find(HIDDEN_CONTENT).remove();
    copy.find('*').each((_, el) => {
      $(el).before('\n').after('\n');
    });
    const lines = copy.text()
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);

    // Per line, so a number never spans two text nodes
    const phone = lines.map(line => line.match(PHONE_PATTERN)?.[0]).find(Boolean) ?? '';

    const remaining = lines
      .map(line => stripContactDetails(line, email))
      .filter(line => line.length > 0 && !CONTACT_LABEL.test(line));

    let name = remaining[0] ?? '';
    let brokerage = remaining[1] ?? '';
    if (remaining.length === 1) {
      [name, brokerage] = splitNameAndBrokerage(remaining[0]);
    }

    entries.push({ name, brokerage, email, phone });
  });

  return entries;
}
