/**
 * @module semantic
 * Optional embedding-similarity fallback.
 */

export type { Embedder } from './embedder.js';
export { cosineSimilarity } from './embedder.js';
export { OpenAIEmbedder, DEFAULT_EMBEDDING_MODEL } from './openai-embedder.js';
export type { OpenAIEmbedderConfig } from './openai-embedder.js';
export {
  NullSemanticMatcher,
  EmbeddingSemanticMatcher,
  DEFAULT_SEMANTIC_THRESHOLD,
} from './semantic-matcher.js';
export type { SemanticMatcher, EmbeddingSemanticMatcherOptions } from './semantic-matcher.js';
export { createEmbedder, createSemanticMatcher } from './factory.js';
export type { SemanticSettings } from './factory.js';
