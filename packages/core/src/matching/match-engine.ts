/**
 * @module matching/match-engine
 * MatchEngine — exact alias lookup, then fuzzy token-set matching, over the
 * current knowledge snapshot.
 *
 * Resolution order (first hit wins):
 * 1. The whole normalised query, then each word token, looked up verbatim in
 *    the language's alias index. Any exact hit returns with score 100.
 * 2. The best token-set score over every alias of the language. Only a
 *    strictly greater score replaces the current best, so ties go to the
 *    alias inserted first into the index.
 *
 * Results (misses included) are memoised per `(lang, threshold, query)` and
 * the whole cache is dropped synchronously on every store mutation.
 */

import type { KnowledgeStore } from '../knowledge/knowledge-store.js';
import { normalizeAlias } from '../knowledge/alias-index.js';
import type { KnowledgeSnapshot } from '../knowledge/types.js';
import { answerFor } from '../types.js';
import type { Lang } from '../types.js';
import { LRUCache } from './lru-cache.js';
import { tokenSetRatio, tokenize } from './similarity.js';

export interface MatchHit {
  answer: string;
  recordId: string;
  /** The alias (or token) that matched. */
  alias: string;
  /** 0–100; always 100 for exact hits. */
  score: number;
  exact: boolean;
}

export interface MatchEngineOptions {
  /** Minimum fuzzy score accepted when a call gives none. Default: 75. */
  minConfidence?: number;
  /** Memo capacity. Default: 500. */
  cacheSize?: number;
}

export const DEFAULT_MIN_CONFIDENCE = 75;
export const DEFAULT_MATCH_CACHE_SIZE = 500;

export class MatchEngine {
  private readonly cache: LRUCache<string, MatchHit | null>;
  private readonly defaultMinConfidence: number;
  private readonly unsubscribe: () => void;

  constructor(
    private readonly store: KnowledgeStore,
    options: MatchEngineOptions = {},
  ) {
    this.defaultMinConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    this.cache = new LRUCache(options.cacheSize ?? DEFAULT_MATCH_CACHE_SIZE);
    this.unsubscribe = store.onMutation(() => this.cache.clear());
  }

  get minConfidence(): number {
    return this.defaultMinConfidence;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /** Stop listening for store mutations. */
  dispose(): void {
    this.unsubscribe();
    this.cache.clear();
  }

  match(query: string, lang: Lang, minConfidence: number = this.defaultMinConfidence): MatchHit | null {
    const normalized = normalizeAlias(query);
    const key = `${lang}\u0000${minConfidence}\u0000${normalized}`;
    if (this.cache.has(key)) {
      return this.cache.get(key) ?? null;
    }

    const hit = normalized.length === 0
      ? null
      : resolve(this.store.snapshot(), normalized, lang, minConfidence);
    this.cache.set(key, hit);
    return hit;
  }
}

// =====================================================================
// Resolution
// =====================================================================

function resolve(
  snapshot: KnowledgeSnapshot,
  normalized: string,
  lang: Lang,
  minConfidence: number,
): MatchHit | null {
  const index = snapshot.index[lang];

  for (const candidate of [normalized, ...tokenize(normalized)]) {
    const position = index.get(candidate);
    if (position === undefined) continue;
    const record = snapshot.records[position];
    if (!record) continue;
    return { answer: answerFor(record, lang), recordId: record.id, alias: candidate, score: 100, exact: true };
  }

  let bestScore = -1;
  let bestAlias = '';
  let bestPosition = -1;
  for (const [alias, position] of index) {
    const score = tokenSetRatio(normalized, alias);
    if (score > bestScore) {
      bestScore = score;
      bestAlias = alias;
      bestPosition = position;
    }
  }

  const record = snapshot.records[bestPosition];
  if (!record || bestScore < minConfidence) return null;
  return { answer: answerFor(record, lang), recordId: record.id, alias: bestAlias, score: bestScore, exact: false };
}
