/** Normalize an email address (lowercase, trim). */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Extract the address from a `mailto:` href. Drops the scheme and any
 * `?subject=...` query, then percent-decodes. Returns '' for a bare `mailto:`.
 */
export function emailFromMailto(href: string): string {
  const address = href.trim().replace(/^mailto:/i, '').split('?')[0].trim();
  try {
    return decodeURIComponent(address).trim();
  } catch {
    // Malformed escape sequence: keep what the page had
    return address;
  }
}

/** Collapse runs of whitespace into single spaces and trim. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
