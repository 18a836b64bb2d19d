/**
 * @module knowledge/codec
 * Conversion between the persisted record format and {@link ProblemRecord}.
 *
 * Persisted shape (one element of a JSON array):
 * `{ id, aliases, np_aliases?, en, np?, auto_fix?, learned? }`.
 * Fields outside that set are carried in `extra` and written back unchanged.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { FormatError } from '../errors.js';
import type { ProblemRecord } from '../types.js';
import type { DecodedKnowledge, SkippedRecord } from './types.js';

export const PersistedRecordSchema = z.object({
  id: z.string().min(1).optional(),
  aliases: z.array(z.string()).default([]),
  np_aliases: z.array(z.string()).default([]),
  en: z.string(),
  np: z.string().optional(),
  auto_fix: z.boolean().default(false),
  learned: z.boolean().default(false),
}).passthrough();

export interface PersistedRecord {
  id: string;
  aliases: string[];
  np_aliases: string[];
  en: string;
  np?: string;
  auto_fix: boolean;
  learned: boolean;
  [field: string]: unknown;
}

const KNOWN_FIELDS = new Set(['id', 'aliases', 'np_aliases', 'en', 'np', 'auto_fix', 'learned']);

/**
 * Derive a short content-based id: the first 8 hex chars of MD5(seed).
 * On collision with `taken`, the seed is salted with a counter until free.
 */
export function createRecordId(seed: string, taken: ReadonlySet<string>): string {
  let candidate = md5Prefix(seed);
  for (let salt = 1; taken.has(candidate); salt++) {
    candidate = md5Prefix(`${seed}#${salt}`);
  }
  return candidate;
}

function md5Prefix(text: string): string {
  return createHash('md5').update(text, 'utf-8').digest('hex').slice(0, 8);
}

/** True when at least one alias in some language has visible text. */
export function hasUsableAlias(record: Pick<ProblemRecord, 'aliases'>): boolean {
  return Object.values(record.aliases).some((list) => list.some((a) => a.trim().length > 0));
}

/**
 * Decode a parsed JSON payload into records.
 *
 * A payload that is not an array is a hard failure. Elements that fail
 * validation, or carry no usable alias, are skipped and reported.
 * Missing or duplicate ids are re-derived so ids stay unique.
 *
 * @throws {FormatError} If `payload` is not an array
 */
export function decodeRecords(payload: unknown, source: string): DecodedKnowledge {
  if (!Array.isArray(payload)) {
    throw new FormatError(`Knowledge base must be a JSON array of records: ${source}`, {
      source,
      receivedType: payload === null ? 'null' : typeof payload,
    });
  }

  const records: ProblemRecord[] = [];
  const skipped: SkippedRecord[] = [];
  const taken = new Set<string>();

  payload.forEach((element: unknown, position) => {
    const result = PersistedRecordSchema.safeParse(element);
    if (!result.success) {
      const reason = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`)
        .join('; ');
      skipped.push({ position, reason });
      return;
    }

    const parsed = result.data;
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (!KNOWN_FIELDS.has(key)) extra[key] = value;
    }

    const aliases = { en: parsed.aliases, np: parsed.np_aliases };
    if (!hasUsableAlias({ aliases })) {
      skipped.push({ position, reason: 'record has no non-empty alias' });
      return;
    }

    const seed = parsed.aliases[0] ?? parsed.np_aliases[0] ?? parsed.en;
    const id = parsed.id !== undefined && !taken.has(parsed.id)
      ? parsed.id
      : createRecordId(seed, taken);
    taken.add(id);

    const record: ProblemRecord = {
      id,
      aliases,
      answers: parsed.np === undefined ? { en: parsed.en } : { en: parsed.en, np: parsed.np },
      autoFix: parsed.auto_fix,
      learned: parsed.learned,
    };
    if (Object.keys(extra).length > 0) record.extra = extra;
    records.push(record);
  });

  return { records, skipped };
}

/** Encode a record into its persisted shape. */
export function encodeRecord(record: ProblemRecord): PersistedRecord {
  const persisted: PersistedRecord = {
    id: record.id,
    aliases: [...record.aliases.en],
    np_aliases: [...record.aliases.np],
    en: record.answers.en,
    auto_fix: record.autoFix,
    learned: record.learned,
  };
  if (record.answers.np !== undefined) persisted.np = record.answers.np;
  return { ...persisted, ...record.extra };
}
