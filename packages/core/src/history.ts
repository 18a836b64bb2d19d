/**
 * @module history
 * Bounded, in-memory record of recent queries. Oldest entries drop first.
 */

import type { Lang, QueryHistoryEntry } from './types.js';

export const DEFAULT_HISTORY_LIMIT = 20;

export class QueryHistory {
  private entries: QueryHistoryEntry[] = [];
  private readonly limit: number;

  constructor(limit: number = DEFAULT_HISTORY_LIMIT, private readonly now: () => Date = () => new Date()) {
    this.limit = Math.max(1, Math.floor(limit));
  }

  record(query: string, lang: Lang): QueryHistoryEntry {
    const entry: QueryHistoryEntry = { timestamp: this.now().toISOString(), query, lang };
    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries = this.entries.slice(this.entries.length - this.limit);
    }
    return entry;
  }

  /** Oldest first. */
  list(): readonly QueryHistoryEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
