/**
 * @module knowledge/types
 * Type definitions for the knowledge base subsystem.
 */

import type { Lang, ProblemRecord } from '../types.js';

/** Normalised alias → position in the record list, for one language. */
export type AliasIndex = ReadonlyMap<string, number>;

export type LanguageIndex = Readonly<Record<Lang, AliasIndex>>;

/** An immutable view of the store: records and the index built from them. */
export interface KnowledgeSnapshot {
  readonly records: readonly ProblemRecord[];
  readonly index: LanguageIndex;
  /** Increases by one on every mutation. */
  readonly version: number;
}

/** A persisted record that could not be decoded and was left out. */
export interface SkippedRecord {
  position: number;
  reason: string;
}

export interface DecodedKnowledge {
  records: ProblemRecord[];
  skipped: SkippedRecord[];
}

export type MutationKind = 'append' | 'update' | 'remove';

export interface KnowledgeMutation {
  kind: MutationKind;
  recordId: string;
  version: number;
}

/** Editable fields of a record. */
export interface RecordPatch {
  aliases?: Partial<Record<Lang, string[]>>;
  answers?: Partial<Record<Lang, string>>;
  autoFix?: boolean;
}

/** Persistence backend for the knowledge base. */
export interface KnowledgeRepository {
  /**
   * Read every record.
   * @throws {NotFoundError} the source does not exist
   * @throws {FormatError} the payload is not a list of records
   */
  load(): Promise<DecodedKnowledge>;
  /** Replace the persisted contents with `records`. */
  save(records: readonly ProblemRecord[]): Promise<void>;
  /** Human-readable location, used in logs. */
  describe(): string;
  close(): void;
}
