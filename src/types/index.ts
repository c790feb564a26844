export type { ContactEntry, SheetRow } from './contact.js';
export { toSheetRow } from './contact.js';
export type { ContactSink } from './sink.js';
export type { PageFetcher, PageFetchers } from './fetcher.js';
