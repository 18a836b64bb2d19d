/**
 * @module errors
 * Structured error types, error code registry, and factory for the engine.
 *
 * Every failure the engine surfaces carries a machine-readable code so
 * front ends can decide what to tell the operator without parsing messages.
 */

// =====================================================================
// Error Code Union & Enums
// =====================================================================

/** All known Deskmate error codes. */
export type DeskmateErrorCode =
  | 'NOT_FOUND'
  | 'FORMAT_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'TIMEOUT'
  | 'CAPABILITY_UNAVAILABLE'
  | 'CONFIG_INVALID'
  | 'HEAL_FAILED';

/** Broad classification of error origin. */
export type ErrorCategory = 'knowledge' | 'network' | 'capability' | 'system';

/** Impact severity guiding how a caller reacts. */
export type ErrorSeverity = 'fatal' | 'recoverable' | 'warning';

/** Machine-readable error object. */
export interface StructuredError {
  code: DeskmateErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  details: Record<string, unknown>;
  suggestedActions: string[];
  timestamp: number;
}

// =====================================================================
// Error Metadata Registry
// =====================================================================

interface ErrorMetadataEntry {
  category: ErrorCategory;
  defaultSeverity: ErrorSeverity;
  suggestedActions: string[];
}

/** Default classification and recovery hints for every error code. */
export const ERROR_METADATA: ReadonlyMap<DeskmateErrorCode, ErrorMetadataEntry> = new Map<DeskmateErrorCode, ErrorMetadataEntry>([
  ['NOT_FOUND', {
    category: 'knowledge',
    defaultSeverity: 'fatal',
    suggestedActions: ['Check knowledge.path in deskmate.yaml', 'Create the knowledge base file', 'Run deskmate kb import'],
  }],
  ['FORMAT_ERROR', {
    category: 'knowledge',
    defaultSeverity: 'fatal',
    suggestedActions: ['Validate the knowledge base JSON', 'Make sure the top level is an array of records'],
  }],
  ['PERSISTENCE_ERROR', {
    category: 'knowledge',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Check write permissions on the knowledge base', 'Free disk space', 'Retry the teach operation'],
  }],
  ['TIMEOUT', {
    category: 'network',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Check the internet connection', 'Increase internet.timeout'],
  }],
  ['CAPABILITY_UNAVAILABLE', {
    category: 'capability',
    defaultSeverity: 'warning',
    suggestedActions: ['Set semantic.enabled and the embedding API key to turn semantic search on'],
  }],
  ['CONFIG_INVALID', {
    category: 'system',
    defaultSeverity: 'fatal',
    suggestedActions: ['Fix the listed fields in deskmate.yaml'],
  }],
  ['HEAL_FAILED', {
    category: 'system',
    defaultSeverity: 'warning',
    suggestedActions: ['Run the remediation manually', 'Check that the command is available and permitted'],
  }],
]);

// =====================================================================
// Factory Function
// =====================================================================

/**
 * Create a complete StructuredError from an error code.
 *
 * Resolves category and severity from the registry, with optional overrides.
 */
export function createStructuredError(
  code: DeskmateErrorCode,
  message: string,
  details: Record<string, unknown> = {},
  severityOverride?: ErrorSeverity,
): StructuredError {
  const metadata = ERROR_METADATA.get(code);
  if (!metadata) {
    return {
      code,
      category: 'system',
      severity: severityOverride ?? 'fatal',
      message,
      details,
      suggestedActions: [],
      timestamp: Date.now(),
    };
  }

  return {
    code,
    category: metadata.category,
    severity: severityOverride ?? metadata.defaultSeverity,
    message,
    details,
    suggestedActions: [...metadata.suggestedActions],
    timestamp: Date.now(),
  };
}

// =====================================================================
// Error Classes
// =====================================================================

/**
 * Error subclass wrapping a StructuredError for throw/catch patterns.
 */
export class DeskmateError extends Error {
  public readonly structuredError: StructuredError;

  constructor(
    code: DeskmateErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    severityOverride?: ErrorSeverity,
  ) {
    super(message);
    this.name = 'DeskmateError';
    this.structuredError = createStructuredError(code, message, details, severityOverride);
  }

  /** Serialize the structured error payload for JSON transport. */
  toJSON(): StructuredError {
    return this.structuredError;
  }

  get code(): DeskmateErrorCode {
    return this.structuredError.code;
  }

  get category(): ErrorCategory {
    return this.structuredError.category;
  }

  get severity(): ErrorSeverity {
    return this.structuredError.severity;
  }
}

/** The knowledge-base source (file, database, record id) does not exist. */
export class NotFoundError extends DeskmateError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}

/** Persisted data or caller input is malformed. */
export class FormatError extends DeskmateError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('FORMAT_ERROR', message, details);
    this.name = 'FormatError';
  }
}

/** Writing the knowledge base failed; the in-memory change is kept. */
export class PersistenceError extends DeskmateError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('PERSISTENCE_ERROR', message, details);
    this.name = 'PersistenceError';
  }
}

/** An outbound request exceeded its time budget. */
export class TimeoutError extends DeskmateError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('TIMEOUT', message, details);
    this.name = 'TimeoutError';
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
