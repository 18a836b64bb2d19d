/**
 * @module unmatched-log
 * Append-only JSON-lines log of queries the knowledge base could not answer,
 * kept so an operator can teach the missing entries later.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { isErrnoException } from './knowledge/json-repository.js';
import type { Lang } from './types.js';

export interface UnmatchedEntry {
  timestamp: string;
  query: string;
  lang: Lang;
}

export class UnmatchedLog {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async append(query: string, lang: Lang, now: Date = new Date()): Promise<void> {
    const entry: UnmatchedEntry = { timestamp: now.toISOString(), query, lang };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
  }

  /** Every readable entry, oldest first. Missing file → empty. Corrupt lines are skipped. */
  async read(): Promise<UnmatchedEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const entries: UnmatchedEntry[] = [];
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isUnmatchedEntry(parsed)) entries.push(parsed);
      } catch {
        // Partial line from an interrupted write
      }
    }
    return entries;
  }
}

function isUnmatchedEntry(value: unknown): value is UnmatchedEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'timestamp' in value && typeof value.timestamp === 'string'
    && 'query' in value && typeof value.query === 'string'
    && 'lang' in value && (value.lang === 'en' || value.lang === 'np');
}
