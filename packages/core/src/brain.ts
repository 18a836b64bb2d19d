/**
 * @module brain
 * Brain — the resolution cascade and the teach path.
 *
 * `solve` tries, in order and stopping at the first answer:
 * 1. Exact alias / fuzzy match over the knowledge base (`local`)
 * 2. Embedding similarity, when that capability is available (`semantic`)
 * 3. Live web search, when internet lookups are enabled (`internet`)
 * 4. The no-solution sentinel (`none`), only when internet is disabled
 *
 * Every call is recorded in the query history whatever the outcome.
 */

import type { DeskmateConfig } from './config-loader.js';
import { parseDuration } from './duration.js';
import { FormatError, errorMessage } from './errors.js';
import { QueryHistory } from './history.js';
import { KnowledgeStore } from './knowledge/knowledge-store.js';
import { openRepository } from './knowledge/repositories.js';
import type { KnowledgeRepository } from './knowledge/types.js';
import { detectLanguage } from './language.js';
import { MatchEngine } from './matching/match-engine.js';
import type { Embedder } from './semantic/embedder.js';
import { createEmbedder, createSemanticMatcher } from './semantic/factory.js';
import type { SemanticMatcher } from './semantic/semantic-matcher.js';
import type {
  AnswerSource,
  BrainStats,
  EventSink,
  Lang,
  ProblemRecord,
  QueryHistoryEntry,
  SolveResult,
} from './types.js';
import { UnmatchedLog } from './unmatched-log.js';
import { WebFallback, createBackend } from './web/web-fallback.js';
import type { FetchLike } from './web/web-fallback.js';

export const NO_SOLUTION = '❌ No solution found.';

export interface BrainComponents {
  store: KnowledgeStore;
  matcher: MatchEngine;
  semantic: SemanticMatcher;
  web: WebFallback;
  history: QueryHistory;
  internetEnabled: boolean;
  unmatchedLog?: UnmatchedLog;
  eventBus?: EventSink;
}

export class Brain {
  private readonly store: KnowledgeStore;
  private readonly matcher: MatchEngine;
  private readonly semantic: SemanticMatcher;
  private readonly web: WebFallback;
  private readonly queryHistory: QueryHistory;
  private readonly unmatchedLog?: UnmatchedLog;
  private readonly eventBus?: EventSink;
  private internetEnabled: boolean;

  constructor(components: BrainComponents) {
    this.store = components.store;
    this.matcher = components.matcher;
    this.semantic = components.semantic;
    this.web = components.web;
    this.queryHistory = components.history;
    this.unmatchedLog = components.unmatchedLog;
    this.eventBus = components.eventBus;
    this.internetEnabled = components.internetEnabled;
  }

  get knowledge(): KnowledgeStore {
    return this.store;
  }

  /**
   * Resolve `query` to an answer. Never rejects.
   *
   * @param minConfidence Fuzzy threshold for this call; the configured one when omitted
   */
  async solve(query: string, lang: Lang = 'en', minConfidence?: number): Promise<SolveResult> {
    this.queryHistory.record(query, lang);

    try {
      if (!query.trim()) {
        return this.finish(query, 'none', NO_SOLUTION);
      }

      const hit = this.matcher.match(query, lang, minConfidence);
      if (hit) {
        return this.finish(query, 'local', hit.answer, { recordId: hit.recordId, score: hit.score, exact: hit.exact });
      }

      const semanticAnswer = await this.semantic.search(query, lang);
      if (semanticAnswer !== null) {
        return this.finish(query, 'semantic', semanticAnswer);
      }

      await this.logUnmatched(query, lang);

      if (this.internetEnabled) {
        return this.finish(query, 'internet', await this.web.search(query, lang));
      }
      return this.finish(query, 'none', NO_SOLUTION);
    } catch (err) {
      console.warn(`[brain] solve failed for "${query}": ${errorMessage(err)}`);
      return this.finish(query, 'none', NO_SOLUTION, { error: errorMessage(err) });
    }
  }

  /**
   * Learn a new answer. The query becomes an alias in every supported
   * language; the Nepali answer defaults to the English one.
   *
   * @throws {FormatError} blank query or English answer
   * @throws {PersistenceError} the record was added in memory but not saved
   */
  async teach(query: string, answerEn: string, answerNp?: string): Promise<ProblemRecord> {
    const alias = query.trim();
    const en = answerEn.trim();
    if (!alias || !en) {
      throw new FormatError('teach needs a non-empty query and English answer', { query, answerEn });
    }

    const np = answerNp?.trim() || en;
    const record = await this.store.append({
      id: '',
      aliases: { en: [alias], np: [alias] },
      answers: { en, np },
      autoFix: false,
      learned: true,
    });
    this.eventBus?.emit('resolution', { event: 'taught', data: { recordId: record.id, query: alias } });
    return record;
  }

  /** Current component state. Reads only. */
  stats(): BrainStats {
    return {
      totalProblems: this.store.size,
      cacheSize: this.matcher.cacheSize,
      semanticEnabled: this.semantic.available,
      internetEnabled: this.internetEnabled,
      internetLookups: this.web.lookups,
      historySize: this.queryHistory.size,
    };
  }

  history(): readonly QueryHistoryEntry[] {
    return this.queryHistory.list();
  }

  detectLanguage(text: string): Lang {
    return detectLanguage(text);
  }

  setInternetEnabled(enabled: boolean): void {
    this.internetEnabled = enabled;
  }

  close(): void {
    this.matcher.dispose();
    this.store.close();
  }

  private finish(
    query: string,
    source: AnswerSource,
    answer: string,
    details: Record<string, unknown> = {},
  ): SolveResult {
    this.eventBus?.emit('resolution', { event: 'solved', data: { query, source, ...details } });
    return { source, answer };
  }

  private async logUnmatched(query: string, lang: Lang): Promise<void> {
    if (!this.unmatchedLog) return;
    try {
      await this.unmatchedLog.append(query, lang);
    } catch (err) {
      console.warn(`[brain] Could not record unmatched query in ${this.unmatchedLog.filePath}: ${errorMessage(err)}`);
    }
  }
}

// =====================================================================
// Factory
// =====================================================================

export interface BrainDependencies {
  /** Knowledge source; opened from `config.knowledge` when omitted. */
  repository?: KnowledgeRepository;
  /** Embedding backend; built from `config.semantic` when omitted, disabled when null. */
  embedder?: Embedder | null;
  fetch?: FetchLike;
  eventBus?: EventSink;
}

/**
 * Wire a Brain from configuration.
 *
 * @throws {NotFoundError} the knowledge base does not exist
 * @throws {FormatError} the knowledge base is not a list of records
 */
export async function createBrain(config: DeskmateConfig, deps: BrainDependencies = {}): Promise<Brain> {
  const { eventBus } = deps;
  const repository = deps.repository
    ?? openRepository(config.knowledge.path, { backend: config.knowledge.backend });

  let store: KnowledgeStore;
  try {
    store = await KnowledgeStore.load(repository, { eventBus });
  } catch (err) {
    repository.close();
    throw err;
  }

  const matcher = new MatchEngine(store, {
    minConfidence: config.knowledge.minConfidence,
    cacheSize: config.knowledge.cacheSize,
  });

  const embedder = deps.embedder === undefined ? createEmbedder(config.semantic) : deps.embedder;
  const semantic = await createSemanticMatcher(embedder, store, {
    threshold: config.semantic.threshold,
    eventBus,
  });

  const web = new WebFallback({
    backends: config.internet.backends.map(createBackend),
    timeout: parseDuration(config.internet.timeout),
    fetch: deps.fetch,
    eventBus,
  });

  return new Brain({
    store,
    matcher,
    semantic,
    web,
    history: new QueryHistory(config.history.limit),
    internetEnabled: config.internet.enabled,
    unmatchedLog: config.history.unmatchedLog ? new UnmatchedLog(config.history.unmatchedLog) : undefined,
    eventBus,
  });
}
