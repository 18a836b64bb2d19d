/**
 * @module semantic/semantic-matcher
 * Embedding-similarity fallback, as a capability strategy.
 *
 * Callers always hold a {@link SemanticMatcher}. When no embedding backend
 * is usable they get {@link NullSemanticMatcher}, whose `search` resolves
 * to `null`, and never need to check availability themselves.
 */

import { createStructuredError, errorMessage } from '../errors.js';
import type { StructuredError } from '../errors.js';
import type { KnowledgeStore } from '../knowledge/knowledge-store.js';
import { answerFor } from '../types.js';
import type { EventSink, Lang, ProblemRecord } from '../types.js';
import { cosineSimilarity } from './embedder.js';
import type { Embedder } from './embedder.js';

export const DEFAULT_SEMANTIC_THRESHOLD = 0.6;

export interface SemanticMatcher {
  readonly available: boolean;
  /** Why the capability is off; undefined when available. */
  readonly unavailableReason: StructuredError | undefined;
  search(query: string, lang: Lang, threshold?: number): Promise<string | null>;
}

// =====================================================================
// Null object
// =====================================================================

export class NullSemanticMatcher implements SemanticMatcher {
  readonly available = false;

  constructor(readonly unavailableReason: StructuredError | undefined = undefined) {}

  async search(): Promise<string | null> {
    return null;
  }
}

// =====================================================================
// Embedding-backed matcher
// =====================================================================

interface EmbeddedCorpus {
  version: number;
  records: readonly ProblemRecord[];
  vectors: number[][];
}

export interface EmbeddingSemanticMatcherOptions {
  threshold?: number;
  eventBus?: EventSink;
}

export class EmbeddingSemanticMatcher implements SemanticMatcher {
  readonly available = true;
  readonly unavailableReason = undefined;

  private corpus: EmbeddedCorpus;
  private refreshing: Promise<EmbeddedCorpus> | null = null;
  private readonly defaultThreshold: number;

  private constructor(
    private readonly embedder: Embedder,
    private readonly store: KnowledgeStore,
    corpus: EmbeddedCorpus,
    private readonly options: EmbeddingSemanticMatcherOptions,
  ) {
    this.corpus = corpus;
    this.defaultThreshold = options.threshold ?? DEFAULT_SEMANTIC_THRESHOLD;
  }

  /**
   * Embed every record's English answer once.
   *
   * If that first batch fails, the capability is reported unavailable and a
   * {@link NullSemanticMatcher} is returned instead.
   */
  static async create(
    embedder: Embedder,
    store: KnowledgeStore,
    options: EmbeddingSemanticMatcherOptions = {},
  ): Promise<SemanticMatcher> {
    try {
      const corpus = await embedCorpus(embedder, store);
      options.eventBus?.emit('semantic', {
        event: 'ready',
        data: { embedder: embedder.id(), records: corpus.records.length },
      });
      return new EmbeddingSemanticMatcher(embedder, store, corpus, options);
    } catch (err) {
      const reason = createStructuredError(
        'CAPABILITY_UNAVAILABLE',
        `Semantic search disabled: initial embedding with ${embedder.id()} failed: ${errorMessage(err)}`,
        { embedder: embedder.id() },
      );
      console.warn(`[semantic] ${reason.message}`);
      options.eventBus?.emit('semantic', { event: 'unavailable', data: reason });
      return new NullSemanticMatcher(reason);
    }
  }

  async search(query: string, lang: Lang, threshold: number = this.defaultThreshold): Promise<string | null> {
    if (!query.trim()) return null;

    try {
      const corpus = await this.currentCorpus();
      if (corpus.records.length === 0) return null;

      const [queryVector] = await this.embedder.embedTexts([query]);
      if (!queryVector) return null;

      let bestScore = -Infinity;
      let bestPosition = -1;
      corpus.vectors.forEach((vector, position) => {
        const score = cosineSimilarity(queryVector, vector);
        if (score > bestScore) {
          bestScore = score;
          bestPosition = position;
        }
      });

      const record = corpus.records[bestPosition];
      if (!record || bestScore < threshold) return null;
      this.options.eventBus?.emit('semantic', {
        event: 'hit',
        data: { recordId: record.id, score: bestScore },
      });
      return answerFor(record, lang);
    } catch (err) {
      console.warn(`[semantic] Search failed: ${errorMessage(err)}`);
      return null;
    }
  }

  /** The embedded corpus, re-embedded first if the store changed since. */
  private async currentCorpus(): Promise<EmbeddedCorpus> {
    if (this.corpus.version === this.store.version) return this.corpus;
    if (!this.refreshing) {
      this.refreshing = embedCorpus(this.embedder, this.store)
        .then((corpus) => {
          this.corpus = corpus;
          return corpus;
        })
        .finally(() => {
          this.refreshing = null;
        });
    }
    return this.refreshing;
  }
}

async function embedCorpus(embedder: Embedder, store: KnowledgeStore): Promise<EmbeddedCorpus> {
  const snapshot = store.snapshot();
  const texts = snapshot.records.map((r) => r.answers.en);
  const vectors = texts.length > 0 ? await embedder.embedTexts(texts) : [];
  if (vectors.length !== texts.length) {
    throw new Error(`Embedder returned ${vectors.length} vectors for ${texts.length} texts`);
  }
  return { version: snapshot.version, records: snapshot.records, vectors };
}
