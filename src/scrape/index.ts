export { ScrapeEngine } from './engine.js';
export type { ScrapeStage, ScrapeResult } from './engine.js';
