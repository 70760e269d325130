/**
 * Configuration Zod Schemas
 *
 * Zod validation schema for the generator config file (tablewright.yaml).
 * The config surface is read-only to the pipeline.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { ARTIFACT_KINDS } from '../contracts/types.js';

// =============================================================================
// SOURCE CONFIGURATION SCHEMAS
// =============================================================================

/**
 * Introspection source
 */
export const SourceConfigSchema = z.object({
  type: z.enum(['postgres', 'sqlite', 'snapshot']),

  // Postgres connection options (one required for postgres)
  connection_string_env: z.string().optional(),
  connection_string: z.string().optional(),
  schema: z.string().min(1).default('public'),

  // SQLite database file or snapshot file
  path: z.string().optional(),
}).refine(
  (data) => {
    if (data.type === 'postgres') {
      return !!(data.connection_string_env || data.connection_string);
    }
    return !!data.path;
  },
  {
    message: 'Postgres requires connection_string_env/connection_string, sqlite and snapshot require path',
  }
);

// =============================================================================
// GENERATION CONFIGURATION SCHEMAS
// =============================================================================

const RELATION_STYLE_ALIASES: Record<string, string> = {
  pk: 'key',
  nested: 'embedded',
};

/**
 * Relationship rendering style; `pk` and `nested` are accepted aliases
 */
export const RelationStyleSchema = z.preprocess(
  (value) => (typeof value === 'string' ? (RELATION_STYLE_ALIASES[value] ?? value) : value),
  z.enum(['key', 'link', 'embedded'])
);

/**
 * Metadata passed through verbatim to the API description
 */
export const ApiConfigSchema = z.object({
  title: z.string().min(1).optional(),
  version: z.string().min(1).default('1.0.0'),
  description: z.string().optional(),
  server_url: z.string().optional(),
});

const identifier = z.string().regex(/^[a-z][a-z0-9-_]*$/i, 'must start with a letter and contain only letters, digits, - and _');

/**
 * Full generator configuration (tablewright.yaml root)
 */
export const GeneratorConfigSchema = z.object({
  version: z.literal('1.0').optional(),
  source: SourceConfigSchema,
  output_dir: z.string().min(1).default('./generated'),
  project_name: identifier.default('generated-api'),
  app_name: identifier.default('api'),
  include_tables: z.array(z.string().min(1)).optional(),
  exclude_tables: z.array(z.string().min(1)).default([]),
  relation_style: RelationStyleSchema.default('key'),
  junction_housekeeping_columns: z.array(z.string().min(1)).default([]),
  artifacts: z.array(z.enum(ARTIFACT_KINDS)).min(1).default([...ARTIFACT_KINDS]),
  api: ApiConfigSchema.default({}),
});

// =============================================================================
// TYPE EXPORTS
// =============================================================================

export type SourceConfig = z.output<typeof SourceConfigSchema>;
export type ApiConfig = z.output<typeof ApiConfigSchema>;
export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>;
export type GeneratorConfig = z.output<typeof GeneratorConfigSchema>;

// =============================================================================
// VALIDATION HELPERS
// =============================================================================

/**
 * Parse and validate tablewright.yaml content.
 */
export function parseGeneratorConfig(content: unknown): GeneratorConfig {
  const result = GeneratorConfigSchema.safeParse(content);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid generator config: ${details}`);
  }
  return result.data;
}
