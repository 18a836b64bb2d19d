/**
 * @module knowledge
 * Knowledge base: records, alias index, persistence backends.
 */

export type {
  AliasIndex,
  LanguageIndex,
  KnowledgeSnapshot,
  SkippedRecord,
  DecodedKnowledge,
  MutationKind,
  KnowledgeMutation,
  RecordPatch,
  KnowledgeRepository,
} from './types.js';

export { PersistedRecordSchema, createRecordId, decodeRecords, encodeRecord, hasUsableAlias } from './codec.js';
export type { PersistedRecord } from './codec.js';
export { normalizeAlias, buildAliasIndex } from './alias-index.js';
export { JsonFileRepository } from './json-repository.js';
export { SQLiteRepository } from './sqlite-repository.js';
export type { SQLiteOpenOptions } from './sqlite-repository.js';
export { SCHEMA_VERSION, applyMigrations } from './migrations.js';
export { KnowledgeStore } from './knowledge-store.js';
export type { MutationListener, KnowledgeStoreOptions } from './knowledge-store.js';
export { inferBackend, openRepository, importKnowledge } from './repositories.js';
export type { KnowledgeBackend, OpenRepositoryOptions, ImportResult } from './repositories.js';
