export { fetchStatic } from './static.js';
export type { StaticFetchOptions } from './static.js';
export { fetchRendered } from './rendered.js';
export type { RenderedFetchOptions } from './rendered.js';
export { withBrowser } from './browser.js';
