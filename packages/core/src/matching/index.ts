/**
 * @module matching
 * Alias matching over the knowledge base.
 */

export { MatchEngine, DEFAULT_MIN_CONFIDENCE, DEFAULT_MATCH_CACHE_SIZE } from './match-engine.js';
export type { MatchHit, MatchEngineOptions } from './match-engine.js';
export { LRUCache } from './lru-cache.js';
export { tokenize, ratio, tokenSetRatio } from './similarity.js';
