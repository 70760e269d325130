/**
 * Schema Introspectors
 *
 * Unified Introspection Port over the supported sources. Currently supports
 * PostgreSQL, SQLite and snapshot files (JSON or YAML).
 */

import type { SchemaSnapshot } from '../contracts/types.js';
import { ERROR_CODES, IntrospectionError, isGeneratorError } from '../contracts/errors.js';
import { formatValidationErrors, validateSnapshot } from '../contracts/validators.js';
import type { ResolvedSource } from '../utils/config.js';
import { logger } from '../utils/logger.js';

/**
 * Read-only source of schema metadata. `introspect` is one atomic read:
 * it returns a complete snapshot or throws.
 */
export interface SchemaIntrospector {
  connect(): Promise<void>;
  introspect(): Promise<SchemaSnapshot>;
  disconnect(): Promise<void>;
}

// Introspector implementations
import { PostgresIntrospector } from './postgres.js';
import { SqliteIntrospector } from './sqlite.js';
import { SnapshotIntrospector } from './snapshot.js';

/**
 * Get schema introspector for the configured source
 */
export function getSchemaIntrospector(source: ResolvedSource): SchemaIntrospector {
  switch (source.type) {
    case 'postgres':
      return new PostgresIntrospector(source.connectionString, source.schema);
    case 'sqlite':
      return new SqliteIntrospector(source.path);
    case 'snapshot':
      return new SnapshotIntrospector(source.path);
  }
}

/**
 * Run one introspection cycle and validate the result. The connection is
 * released on every exit path.
 *
 * @throws IntrospectionError
 */
export async function readSchemaSnapshot(introspector: SchemaIntrospector): Promise<SchemaSnapshot> {
  let raw: SchemaSnapshot;
  try {
    await introspector.connect();
    try {
      raw = await introspector.introspect();
    } finally {
      await introspector.disconnect();
    }
  } catch (error) {
    if (isGeneratorError(error)) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new IntrospectionError(ERROR_CODES.INTROSPECTION_FAILED, `Introspection failed: ${message}`, {
      originalError: message,
    });
  }

  const result = validateSnapshot(raw);
  if (!result.success) {
    throw new IntrospectionError(
      ERROR_CODES.SNAPSHOT_INVALID,
      `Introspection returned an invalid snapshot: ${formatValidationErrors(result.errors)}`,
      { errors: result.errors }
    );
  }

  logger.debug('Schema introspected', { tables: result.data.tables.length });
  return result.data;
}
