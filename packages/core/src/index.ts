// @deskmate/core - resolution engine

// Types
export * from './types.js';

// Errors
export {
  ERROR_METADATA,
  createStructuredError,
  DeskmateError,
  NotFoundError,
  FormatError,
  PersistenceError,
  TimeoutError,
  errorMessage,
} from './errors.js';
export type { DeskmateErrorCode, ErrorCategory, ErrorSeverity, StructuredError } from './errors.js';

// Config Loader
export {
  loadConfig,
  defaultConfig,
  DeskmateConfigSchema,
  KnowledgeConfigSchema,
  HistoryConfigSchema,
  SemanticConfigSchema,
  InternetConfigSchema,
  MonitorConfigSchema,
  BackendConfigSchema,
  BUNDLED_KNOWLEDGE_PATH,
  CONFIG_FILE_NAMES,
} from './config-loader.js';
export type { DeskmateConfig } from './config-loader.js';

// Ambient utilities
export { EventBus, createEventBus } from './event-bus.js';
export { parseDuration } from './duration.js';
export { Semaphore } from './semaphore.js';

// Knowledge
export * from './knowledge/index.js';

// Matching
export * from './matching/index.js';

// Semantic search
export * from './semantic/index.js';

// Web fallback
export * from './web/index.js';

// History & language
export { QueryHistory, DEFAULT_HISTORY_LIMIT } from './history.js';
export { UnmatchedLog } from './unmatched-log.js';
export type { UnmatchedEntry } from './unmatched-log.js';
export { detectLanguage, devanagariRatio, NEPALI_KEYPHRASES } from './language.js';

// Brain
export { Brain, createBrain, NO_SOLUTION } from './brain.js';
export type { BrainComponents, BrainDependencies } from './brain.js';

// Monitor & healer
export * from './monitor/index.js';
