export { parseEntries, splitNameAndBrokerage, PHONE_PATTERN } from './parse.js';
export { deduplicateEntries } from './dedup.js';
export { normalizeEmail, emailFromMailto, collapseWhitespace } from './normalize.js';
