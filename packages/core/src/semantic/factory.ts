/**
 * @module semantic/factory
 * Build the semantic matcher described by configuration.
 */

import { createStructuredError } from '../errors.js';
import type { KnowledgeStore } from '../knowledge/knowledge-store.js';
import type { EventSink } from '../types.js';
import type { Embedder } from './embedder.js';
import { OpenAIEmbedder } from './openai-embedder.js';
import { EmbeddingSemanticMatcher, NullSemanticMatcher } from './semantic-matcher.js';
import type { SemanticMatcher } from './semantic-matcher.js';

export interface SemanticSettings {
  enabled: boolean;
  provider: 'openai';
  model: string;
  apiKeyEnv: string;
  threshold: number;
}

/** An embedder for `settings`, or null when disabled or the API key is absent. */
export function createEmbedder(settings: SemanticSettings): Embedder | null {
  if (!settings.enabled) return null;

  const apiKey = process.env[settings.apiKeyEnv];
  if (!apiKey) return null;
  return new OpenAIEmbedder({ apiKey, model: settings.model });
}

/**
 * Resolve the matcher: the embedding strategy when an embedder is given and
 * its first batch succeeds, the null strategy otherwise.
 */
export async function createSemanticMatcher(
  embedder: Embedder | null,
  store: KnowledgeStore,
  options: { threshold?: number; eventBus?: EventSink } = {},
): Promise<SemanticMatcher> {
  if (!embedder) {
    return new NullSemanticMatcher(
      createStructuredError('CAPABILITY_UNAVAILABLE', 'No embedding backend configured'),
    );
  }
  return EmbeddingSemanticMatcher.create(embedder, store, options);
}
