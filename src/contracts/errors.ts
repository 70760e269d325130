/**
 * Error Code Registry
 *
 * Every stage reports through these canonical codes. Do not invent new codes
 * without adding them here first.
 *
 * @module contracts/errors
 */

import type { ErrorSeverity, GenerationWarning } from './types.js';

// =============================================================================
// ERROR CODE CONSTANTS
// =============================================================================

export const ERROR_CODES = {
  // =========================================================================
  // CONFIGURATION ERRORS (CONFIG_*)
  // =========================================================================

  /** Config file does not exist */
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  /** YAML syntax error or Zod validation failure */
  CONFIG_INVALID: 'CONFIG_INVALID',

  // =========================================================================
  // INTROSPECTION ERRORS
  // =========================================================================

  /** Connection or catalog query failed */
  INTROSPECTION_FAILED: 'INTROSPECTION_FAILED',
  /** Snapshot file missing, unparseable, or wrong shape */
  SNAPSHOT_INVALID: 'SNAPSHOT_INVALID',

  // =========================================================================
  // RESOLUTION ERRORS
  // =========================================================================

  /** Duplicate keys, column-count mismatch, unknown filter table */
  SCHEMA_CONSISTENCY: 'SCHEMA_CONSISTENCY',
  /** Identifiers still equal after deterministic suffixing */
  NAMING_COLLISION: 'NAMING_COLLISION',

  // =========================================================================
  // OUTPUT ERRORS
  // =========================================================================

  /** Failed to write an artifact file */
  OUTPUT_WRITE_FAILED: 'OUTPUT_WRITE_FAILED',

  // =========================================================================
  // WARNINGS
  // =========================================================================

  /** Native type missing from the mapping table */
  UNSUPPORTED_TYPE: 'UNSUPPORTED_TYPE',
  /** Junction heuristic inconclusive */
  RELATIONSHIP_AMBIGUOUS: 'RELATIONSHIP_AMBIGUOUS',
  /** FK target excluded or absent */
  DANGLING_REFERENCE: 'DANGLING_REFERENCE',
  /** Table has no primary key and is skipped */
  TABLE_WITHOUT_PRIMARY_KEY: 'TABLE_WITHOUT_PRIMARY_KEY',
  /** Relationship deferred to break a dependency cycle */
  CYCLE_DEFERRED: 'CYCLE_DEFERRED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type WarningCode =
  | typeof ERROR_CODES.UNSUPPORTED_TYPE
  | typeof ERROR_CODES.RELATIONSHIP_AMBIGUOUS
  | typeof ERROR_CODES.DANGLING_REFERENCE
  | typeof ERROR_CODES.TABLE_WITHOUT_PRIMARY_KEY
  | typeof ERROR_CODES.CYCLE_DEFERRED;

// =============================================================================
// ERROR CLASSES
// =============================================================================

/**
 * Base class of every fatal failure. Carries the same fields as a
 * GenerationWarning so the report can print both uniformly.
 */
export class GeneratorError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly recoverable: boolean;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    context?: Record<string, unknown>,
    severity: ErrorSeverity = 'fatal',
    recoverable = false
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.severity = severity;
    this.recoverable = recoverable;
    this.context = context;
  }
}

export class ConfigurationError extends GeneratorError {
  constructor(
    code: typeof ERROR_CODES.CONFIG_NOT_FOUND | typeof ERROR_CODES.CONFIG_INVALID,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(code, message, context);
  }
}

export class IntrospectionError extends GeneratorError {
  constructor(
    code: typeof ERROR_CODES.INTROSPECTION_FAILED | typeof ERROR_CODES.SNAPSHOT_INVALID,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(code, message, context);
  }
}

export class SchemaConsistencyError extends GeneratorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ERROR_CODES.SCHEMA_CONSISTENCY, message, context);
  }
}

/** Reported with both colliding originals */
export class NamingCollisionError extends GeneratorError {
  readonly originals: readonly [string, string];

  constructor(scope: string, name: string, first: string, second: string) {
    super(
      ERROR_CODES.NAMING_COLLISION,
      `${scope}: "${first}" and "${second}" both resolve to "${name}"`,
      { scope, name, originals: [first, second] }
    );
    this.originals = [first, second];
  }
}

/** Fatal for one artifact only; the run continues and exits non-zero */
export class OutputWriteError extends GeneratorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ERROR_CODES.OUTPUT_WRITE_FAILED, message, context, 'error', false);
  }
}

// =============================================================================
// ERROR CREATION HELPERS
// =============================================================================

/**
 * Create a recoverable GenerationWarning.
 */
export function createWarning(
  code: WarningCode,
  message: string,
  context?: Record<string, unknown>
): GenerationWarning {
  const warning: GenerationWarning = {
    code,
    message,
    severity: 'warning',
    recoverable: true,
  };
  if (context !== undefined) {
    warning.context = context;
  }
  return warning;
}

/**
 * Type guard to check if an error is a GeneratorError
 */
export function isGeneratorError(error: unknown): error is GeneratorError {
  return error instanceof GeneratorError;
}

/**
 * Convert an unknown thrown value to a GeneratorError
 */
export function toGeneratorError(error: unknown, defaultCode: ErrorCode): GeneratorError {
  if (isGeneratorError(error)) {
    return error;
  }

  const message =
    error instanceof Error
      ? error.message
      : typeof error === 'string'
        ? error
        : 'Unknown error';

  return new GeneratorError(defaultCode, message, {
    originalError: error instanceof Error ? error.stack : String(error),
  });
}
