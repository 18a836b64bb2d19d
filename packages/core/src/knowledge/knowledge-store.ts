/**
 * @module knowledge/knowledge-store
 * KnowledgeStore — the in-memory record list, its alias index, and the
 * single-writer mutation path that keeps both in step with the repository.
 *
 * Readers take `snapshot()` and keep using it; a mutation builds the next
 * snapshot off to the side and swaps it in with one assignment, then tells
 * mutation listeners (the match cache) before persisting.
 */

import { FormatError, NotFoundError, PersistenceError, errorMessage } from '../errors.js';
import { Semaphore } from '../semaphore.js';
import { SUPPORTED_LANGUAGES } from '../types.js';
import type { EventSink, Lang, ProblemRecord } from '../types.js';
import { buildAliasIndex } from './alias-index.js';
import { createRecordId, hasUsableAlias } from './codec.js';
import type {
  KnowledgeMutation,
  KnowledgeRepository,
  KnowledgeSnapshot,
  MutationKind,
  RecordPatch,
} from './types.js';

export type MutationListener = (mutation: KnowledgeMutation) => void;

export interface KnowledgeStoreOptions {
  eventBus?: EventSink;
}

export class KnowledgeStore {
  private current: KnowledgeSnapshot;
  private readonly writer = new Semaphore(1);
  private readonly listeners = new Set<MutationListener>();

  private constructor(
    private readonly repository: KnowledgeRepository,
    records: ProblemRecord[],
    private readonly eventBus?: EventSink,
  ) {
    this.current = { records, index: buildAliasIndex(records), version: 0 };
  }

  /**
   * Load every record from `repository` and build the alias index.
   *
   * @throws {NotFoundError} the source is missing
   * @throws {FormatError} the payload is not a list of records
   */
  static async load(
    repository: KnowledgeRepository,
    options: KnowledgeStoreOptions = {},
  ): Promise<KnowledgeStore> {
    const { records, skipped } = await repository.load();

    for (const entry of skipped) {
      console.warn(
        `[knowledge] Skipped record #${entry.position} in ${repository.describe()}: ${entry.reason}`,
      );
    }

    options.eventBus?.emit('knowledge', {
      event: 'loaded',
      data: { source: repository.describe(), records: records.length, skipped: skipped.length },
    });

    return new KnowledgeStore(repository, records, options.eventBus);
  }

  // =====================================================================
  // Reads
  // =====================================================================

  snapshot(): KnowledgeSnapshot {
    return this.current;
  }

  records(): readonly ProblemRecord[] {
    return this.current.records;
  }

  get size(): number {
    return this.current.records.length;
  }

  get version(): number {
    return this.current.version;
  }

  find(id: string): ProblemRecord | undefined {
    return this.current.records.find((r) => r.id === id);
  }

  /** Case-insensitive substring search over aliases and answers. */
  search(text: string): ProblemRecord[] {
    const needle = text.trim().toLowerCase();
    if (!needle) return [...this.current.records];
    return this.current.records.filter((record) => {
      const haystack = [
        ...SUPPORTED_LANGUAGES.flatMap((lang) => record.aliases[lang]),
        ...Object.values(record.answers),
      ];
      return haystack.some((value) => value !== undefined && value.toLowerCase().includes(needle));
    });
  }

  onMutation(listener: MutationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // =====================================================================
  // Mutations
  // =====================================================================

  /**
   * Append a record, rebuild the index and persist.
   *
   * A record whose id is empty or already taken gets a fresh id derived
   * from its first alias.
   *
   * @throws {FormatError} the record has no usable alias
   * @throws {PersistenceError} the write failed; the record stays in memory
   */
  async append(record: ProblemRecord): Promise<ProblemRecord> {
    if (!hasUsableAlias(record)) {
      throw new FormatError('A knowledge record needs at least one non-empty alias', { id: record.id });
    }

    return this.writer.run(async () => {
      const taken = new Set(this.current.records.map((r) => r.id));
      const stored: ProblemRecord = record.id && !taken.has(record.id)
        ? record
        : { ...record, id: createRecordId(firstAlias(record), taken) };

      this.commit([...this.current.records, stored], 'append', stored.id);
      await this.persist('append', stored.id);
      return stored;
    });
  }

  /**
   * Edit a record in place.
   *
   * @throws {NotFoundError} no record has `id`
   * @throws {FormatError} the edit would leave no usable alias
   * @throws {PersistenceError} the write failed; the edit stays in memory
   */
  async update(id: string, patch: RecordPatch): Promise<ProblemRecord> {
    return this.writer.run(async () => {
      const position = this.positionOf(id);
      const existing = this.current.records[position];
      if (!existing) {
        throw new NotFoundError(`No knowledge record with id "${id}"`, { id });
      }

      const updated = applyPatch(existing, patch);
      if (!hasUsableAlias(updated)) {
        throw new FormatError('A knowledge record needs at least one non-empty alias', { id });
      }

      const next = [...this.current.records];
      next[position] = updated;
      this.commit(next, 'update', id);
      await this.persist('update', id);
      return updated;
    });
  }

  /**
   * Delete a record.
   *
   * @throws {NotFoundError} no record has `id`
   * @throws {PersistenceError} the write failed; the removal stays in memory
   */
  async remove(id: string): Promise<ProblemRecord> {
    return this.writer.run(async () => {
      const position = this.positionOf(id);
      const existing = this.current.records[position];
      if (!existing) {
        throw new NotFoundError(`No knowledge record with id "${id}"`, { id });
      }

      const next = this.current.records.filter((_, i) => i !== position);
      this.commit(next, 'remove', id);
      await this.persist('remove', id);
      return existing;
    });
  }

  close(): void {
    this.repository.close();
  }

  // =====================================================================
  // Internals
  // =====================================================================

  private positionOf(id: string): number {
    return this.current.records.findIndex((r) => r.id === id);
  }

  /** Swap in the next snapshot and notify listeners before anything else runs. */
  private commit(records: ProblemRecord[], kind: MutationKind, recordId: string): void {
    const version = this.current.version + 1;
    this.current = { records, index: buildAliasIndex(records), version };

    const mutation: KnowledgeMutation = { kind, recordId, version };
    for (const listener of this.listeners) {
      listener(mutation);
    }
    this.eventBus?.emit('knowledge', { event: kind, data: mutation });
  }

  private async persist(kind: MutationKind, recordId: string): Promise<void> {
    try {
      await this.repository.save(this.current.records);
    } catch (err) {
      this.eventBus?.emit('knowledge', {
        event: 'persist_failed',
        data: { kind, recordId, error: errorMessage(err) },
      });
      throw new PersistenceError(
        `Failed to persist ${kind} of record "${recordId}" to ${this.repository.describe()}: ${errorMessage(err)}`,
        { kind, recordId },
      );
    }
  }
}

// =====================================================================
// Helpers
// =====================================================================

function firstAlias(record: ProblemRecord): string {
  for (const lang of SUPPORTED_LANGUAGES) {
    const alias = record.aliases[lang].find((a) => a.trim().length > 0);
    if (alias !== undefined) return alias;
  }
  return record.answers.en;
}

function applyPatch(record: ProblemRecord, patch: RecordPatch): ProblemRecord {
  const aliases: Record<Lang, string[]> = { ...record.aliases };
  for (const lang of SUPPORTED_LANGUAGES) {
    const replacement = patch.aliases?.[lang];
    if (replacement) aliases[lang] = [...replacement];
  }

  const answers = { ...record.answers };
  if (patch.answers?.en !== undefined) answers.en = patch.answers.en;
  if (patch.answers?.np !== undefined) answers.np = patch.answers.np;

  return {
    ...record,
    aliases,
    answers,
    autoFix: patch.autoFix ?? record.autoFix,
  };
}
