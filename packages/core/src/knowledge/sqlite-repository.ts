/**
 * @module knowledge/sqlite-repository
 * Knowledge base stored in a SQLite database via better-sqlite3.
 *
 * Alias lists and unrecognised fields are kept as JSON text columns; the
 * `position` column preserves record order, which the alias index relies on.
 * Rows the last `load` could not decode are kept through later saves.
 */

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { NotFoundError, errorMessage } from '../errors.js';
import type { ProblemRecord } from '../types.js';
import { hasUsableAlias } from './codec.js';
import { applyMigrations } from './migrations.js';
import type { DecodedKnowledge, KnowledgeRepository, SkippedRecord } from './types.js';

// =====================================================================
// Row validation
// =====================================================================

const ProblemRowSchema = z.object({
  id: z.string(),
  position: z.number(),
  aliases: z.string(),
  np_aliases: z.string(),
  answer_en: z.string(),
  answer_np: z.string().nullable(),
  auto_fix: z.number(),
  learned: z.number(),
  extra: z.string().nullable(),
});

type ProblemRow = z.infer<typeof ProblemRowSchema>;

const AliasListSchema = z.array(z.string());
const ExtraSchema = z.record(z.unknown());
const RawRowSchema = z.record(z.unknown());

type RowParams = Record<string, unknown>;

function toRowParams(record: ProblemRecord): RowParams {
  return {
    id: record.id,
    aliases: JSON.stringify(record.aliases.en),
    np_aliases: JSON.stringify(record.aliases.np),
    answer_en: record.answers.en,
    answer_np: record.answers.np ?? null,
    auto_fix: record.autoFix ? 1 : 0,
    learned: record.learned ? 1 : 0,
    extra: record.extra ? JSON.stringify(record.extra) : null,
  };
}

function mapProblemRow(row: ProblemRow): ProblemRecord {
  const record: ProblemRecord = {
    id: row.id,
    aliases: {
      en: AliasListSchema.parse(JSON.parse(row.aliases)),
      np: AliasListSchema.parse(JSON.parse(row.np_aliases)),
    },
    answers: row.answer_np === null
      ? { en: row.answer_en }
      : { en: row.answer_en, np: row.answer_np },
    autoFix: row.auto_fix === 1,
    learned: row.learned === 1,
  };
  if (row.extra !== null) {
    record.extra = ExtraSchema.parse(JSON.parse(row.extra));
  }
  return record;
}

// =====================================================================
// SQLiteRepository
// =====================================================================

export interface SQLiteOpenOptions {
  /** Create the database file when it does not exist yet. Default: false. */
  create?: boolean;
}

export class SQLiteRepository implements KnowledgeRepository {
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;
  /** Undecodable rows from the last load, by original position. */
  private unreadable: Array<{ position: number; row: RowParams }> = [];

  constructor(db: Database.Database, ownsDatabase = false) {
    this.db = db;
    this.ownsDatabase = ownsDatabase;
    applyMigrations(this.db);
  }

  /**
   * Open a database file.
   *
   * @throws {NotFoundError} If the file is missing and `create` is not set
   */
  static open(dbPath: string, options: SQLiteOpenOptions = {}): SQLiteRepository {
    const resolved = path.resolve(dbPath);
    if (!fs.existsSync(resolved)) {
      if (!options.create) {
        throw new NotFoundError(`Knowledge base not found: ${resolved}`, { path: resolved });
      }
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }

    const db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.pragma('busy_timeout = 5000');
    return new SQLiteRepository(db, true);
  }

  async load(): Promise<DecodedKnowledge> {
    const rows: unknown[] = this.db
      .prepare('SELECT id, position, aliases, np_aliases, answer_en, answer_np, auto_fix, learned, extra FROM problems ORDER BY position ASC')
      .all();

    const records: ProblemRecord[] = [];
    const skipped: SkippedRecord[] = [];
    const unreadable: Array<{ position: number; row: RowParams }> = [];
    const skip = (position: number, reason: string, raw: unknown): void => {
      skipped.push({ position, reason });
      const row = RawRowSchema.safeParse(raw);
      if (row.success) unreadable.push({ position, row: row.data });
    };

    rows.forEach((raw, position) => {
      const parsed = ProblemRowSchema.safeParse(raw);
      if (!parsed.success) {
        skip(position, parsed.error.issues.map((i) => i.message).join('; '), raw);
        return;
      }
      try {
        const record = mapProblemRow(parsed.data);
        if (!hasUsableAlias(record)) {
          skip(position, 'record has no non-empty alias', raw);
          return;
        }
        records.push(record);
      } catch (err) {
        skip(position, `corrupt JSON column: ${errorMessage(err)}`, raw);
      }
    });

    this.unreadable = unreadable;
    return { records, skipped };
  }

  async save(records: readonly ProblemRecord[]): Promise<void> {
    const insert = this.db.prepare(
      `INSERT INTO problems (id, position, aliases, np_aliases, answer_en, answer_np, auto_fix, learned, extra, updated_at)
       VALUES (@id, @position, @aliases, @np_aliases, @answer_en, @answer_np, @auto_fix, @learned, @extra, @updated_at)`,
    );
    const now = new Date().toISOString();

    const rows = records.map(toRowParams);
    for (const { position, row } of this.unreadable) {
      rows.splice(Math.min(position, rows.length), 0, row);
    }

    const replaceAll = this.db.transaction((items: readonly RowParams[]) => {
      this.db.prepare('DELETE FROM problems').run();
      items.forEach((row, position) => {
        insert.run({ ...row, position, updated_at: now });
      });
    });
    replaceAll(rows);
  }

  describe(): string {
    return `sqlite:${this.db.name}`;
  }

  close(): void {
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
    }
  }
}
