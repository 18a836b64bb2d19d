/**
 * @module web
 * Live web search fallback.
 */

export type { WebResult, BackendType, BackendConfig, SearchBackend } from './types.js';
export { DuckDuckGoBackend, DUCKDUCKGO_ENDPOINT } from './duckduckgo.js';
export { WikipediaBackend } from './wikipedia.js';
export { stripHtml } from './html.js';
export {
  WebFallback,
  NO_WEB_RESULTS,
  DEFAULT_WEB_TIMEOUT_MS,
  MAX_WEB_RESULTS,
  createBackend,
  defaultBackends,
  formatResults,
} from './web-fallback.js';
export type { FetchLike, WebFallbackOptions } from './web-fallback.js';
