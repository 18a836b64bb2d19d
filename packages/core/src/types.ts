/**
 * @module types
 * Shared type definitions for the Deskmate engine.
 */

// ==================== Languages ====================

/** Languages the knowledge base carries aliases and answers for. */
export const SUPPORTED_LANGUAGES = ['en', 'np'] as const;

export type Lang = (typeof SUPPORTED_LANGUAGES)[number];

export function isLang(value: string): value is Lang {
  return SUPPORTED_LANGUAGES.some((lang) => lang === value);
}

// ==================== Knowledge ====================

/** Answer text per language; `en` is always present and is the fallback. */
export type AnswerSet = { en: string } & Partial<Record<Exclude<Lang, 'en'>, string>>;

export interface ProblemRecord {
  id: string;
  aliases: Record<Lang, string[]>;
  answers: AnswerSet;
  autoFix: boolean;
  learned: boolean;
  /** Persisted fields this engine does not interpret, kept for lossless round-trips. */
  extra?: Record<string, unknown>;
}

/** Pick a record's answer in `lang`, falling back to English. */
export function answerFor(record: ProblemRecord, lang: Lang): string {
  if (lang === 'en') return record.answers.en;
  return record.answers[lang] ?? record.answers.en;
}

// ==================== Resolution ====================

export type AnswerSource = 'local' | 'semantic' | 'internet' | 'none';

export interface SolveResult {
  source: AnswerSource;
  answer: string;
}

export interface QueryHistoryEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  query: string;
  lang: Lang;
}

export interface BrainStats {
  totalProblems: number;
  cacheSize: number;
  semanticEnabled: boolean;
  internetEnabled: boolean;
  internetLookups: number;
  historySize: number;
}

// ==================== Health ====================

export type SignalKind = 'CPU' | 'MEMORY' | 'STORAGE' | 'NETWORK' | 'POWER';

export interface HealthSignal {
  kind: SignalKind;
  message: string;
  code: number;
}

export type AlertCallback = (message: string, code: number) => void;

// ==================== Event Bus ====================

export interface BusMessage {
  event: string;
  data: unknown;
}

export interface EventSink {
  emit(channel: string, message: BusMessage): void;
  subscribe(channel: string, handler: (msg: BusMessage) => void): () => void;
}
