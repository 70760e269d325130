/**
 * Validation Functions
 *
 * Shape validation for the Introspection Port boundary. Every introspector's
 * output passes through here before the Schema Model is built, so snapshot
 * files and live catalogs are held to one contract.
 *
 * @module contracts/validators
 */

import { z } from 'zod';
import type { SchemaSnapshot, ValidationResult, ValidationError } from './types.js';

// =============================================================================
// ZOD SCHEMAS
// =============================================================================

const nonNegativeInt = z.number().int().min(0);

/**
 * RawColumn schema. Optional numeric facets default to null so hand-written
 * snapshot files may omit them.
 */
const RawColumnSchema = z.object({
  name: z.string().min(1),
  nativeType: z.string().min(1),
  length: nonNegativeInt.nullable().default(null),
  precision: nonNegativeInt.nullable().default(null),
  scale: z.number().int().nullable().default(null),
  nullable: z.boolean().default(true),
  default: z.string().nullable().default(null),
  autoIncrement: z.boolean().default(false),
});

const RawConstraintSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['primary-key', 'unique', 'check', 'foreign-key']),
  columns: z.array(z.string().min(1)),
  referencedTable: z.string().min(1).optional(),
  referencedColumns: z.array(z.string().min(1)).optional(),
  definition: z.string().optional(),
});

const RawIndexSchema = z.object({
  name: z.string().min(1),
  columns: z.array(z.string().min(1)),
  unique: z.boolean().default(false),
  expression: z.boolean().default(false),
});

const RawTableSchema = z.object({
  name: z.string().min(1),
  columns: z.array(RawColumnSchema).min(1),
  constraints: z.array(RawConstraintSchema).default([]),
  indexes: z.array(RawIndexSchema).default([]),
});

export const SchemaSnapshotSchema = z.object({
  tables: z.array(RawTableSchema),
});

// =============================================================================
// VALIDATION FUNCTIONS
// =============================================================================

/**
 * Validate a SchemaSnapshot against the boundary contract.
 * Returns a ValidationResult with either the parsed snapshot or errors.
 */
export function validateSnapshot(snapshot: unknown): ValidationResult<SchemaSnapshot> {
  // Step 1: Zod schema validation
  const result = SchemaSnapshotSchema.safeParse(snapshot);

  if (!result.success) {
    const errors: ValidationError[] = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return { success: false, errors };
  }

  // Step 2: Foreign keys must name their target
  const semanticErrors: ValidationError[] = [];
  result.data.tables.forEach((table, tableIndex) => {
    table.constraints.forEach((constraint, constraintIndex) => {
      if (constraint.kind === 'foreign-key' && constraint.referencedTable === undefined) {
        semanticErrors.push({
          path: `tables.${tableIndex}.constraints.${constraintIndex}.referencedTable`,
          message: `Foreign key "${constraint.name}" on "${table.name}" has no referenced table`,
        });
      }
    });
  });

  if (semanticErrors.length > 0) {
    return { success: false, errors: semanticErrors };
  }

  return { success: true, data: result.data };
}

/**
 * Format validation errors as one line each, for error messages.
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join('; ');
}
