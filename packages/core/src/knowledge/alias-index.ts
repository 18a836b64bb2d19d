/**
 * @module knowledge/alias-index
 * Build the per-language alias → record lookup.
 *
 * The index is always rebuilt from scratch, so it is a pure function of the
 * record list. On alias collision the later record wins; iteration order of
 * each map is the order in which an alias was first seen.
 */

import { SUPPORTED_LANGUAGES } from '../types.js';
import type { Lang, ProblemRecord } from '../types.js';
import type { LanguageIndex } from './types.js';

export function normalizeAlias(alias: string): string {
  return alias.trim().toLowerCase();
}

export function buildAliasIndex(records: readonly ProblemRecord[]): LanguageIndex {
  const maps: Record<Lang, Map<string, number>> = { en: new Map(), np: new Map() };

  records.forEach((record, position) => {
    for (const lang of SUPPORTED_LANGUAGES) {
      const target = maps[lang];
      for (const alias of record.aliases[lang]) {
        const key = normalizeAlias(alias);
        if (key.length === 0) continue;
        target.set(key, position);
      }
    }
  });

  return maps;
}
