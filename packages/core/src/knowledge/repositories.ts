/**
 * @module knowledge/repositories
 * Repository selection and bulk transfer between backends.
 */

import path from 'node:path';
import type { ProblemRecord } from '../types.js';
import { JsonFileRepository } from './json-repository.js';
import { SQLiteRepository } from './sqlite-repository.js';
import type { KnowledgeRepository, SkippedRecord } from './types.js';

export type KnowledgeBackend = 'json' | 'sqlite';

const SQLITE_EXTENSIONS = new Set(['.db', '.sqlite', '.sqlite3']);

/** Guess the backend from a file extension; anything unknown is JSON. */
export function inferBackend(filePath: string): KnowledgeBackend {
  return SQLITE_EXTENSIONS.has(path.extname(filePath).toLowerCase()) ? 'sqlite' : 'json';
}

export interface OpenRepositoryOptions {
  backend?: KnowledgeBackend;
  /** Create an empty SQLite database when the file is missing. */
  create?: boolean;
}

export function openRepository(filePath: string, options: OpenRepositoryOptions = {}): KnowledgeRepository {
  const backend = options.backend ?? inferBackend(filePath);
  if (backend === 'sqlite') {
    return SQLiteRepository.open(filePath, { create: options.create });
  }
  return new JsonFileRepository(filePath);
}

export interface ImportResult {
  imported: number;
  skipped: SkippedRecord[];
}

/**
 * Copy every decodable record from `from` into `to`, replacing what `to` held.
 * Records that fail to decode are reported, not copied.
 */
export async function importKnowledge(
  from: KnowledgeRepository,
  to: KnowledgeRepository,
): Promise<ImportResult> {
  const { records, skipped } = await from.load();
  const copy: ProblemRecord[] = records.map((record) => ({ ...record }));
  await to.save(copy);
  return { imported: copy.length, skipped };
}
