/**
 * Snapshot builders shared by the test suites
 */

import type { RawColumn, RawConstraint, RawIndex, RawTable, SchemaSnapshot } from '../src/contracts/types.js';
import { parseGeneratorConfig } from '../src/config/schema.js';
import type { GeneratorConfigInput } from '../src/config/schema.js';
import { buildGeneratorContext } from '../src/generators/index.js';
import type { GeneratorContext } from '../src/generators/index.js';
import { runPipeline } from '../src/pipeline/index.js';
import type { PipelineOptions, PipelineResult } from '../src/pipeline/index.js';

export function col(name: string, nativeType = 'integer', overrides: Partial<RawColumn> = {}): RawColumn {
  return {
    name,
    nativeType,
    length: null,
    precision: null,
    scale: null,
    nullable: false,
    default: null,
    autoIncrement: false,
    ...overrides,
  };
}

/** Auto-increment integer id column */
export const serial = (name = 'id'): RawColumn => col(name, 'integer', { autoIncrement: true });

export const pk = (table: string, ...columns: string[]): RawConstraint => ({
  name: `${table}_pkey`,
  kind: 'primary-key',
  columns,
});

export const fk = (table: string, columns: string[], referencedTable: string, referencedColumns: string[] = ['id']): RawConstraint => ({
  name: `${table}_${columns.join('_')}_fkey`,
  kind: 'foreign-key',
  columns,
  referencedTable,
  referencedColumns,
});

export const unique = (table: string, ...columns: string[]): RawConstraint => ({
  name: `${table}_${columns.join('_')}_key`,
  kind: 'unique',
  columns,
});

export function table(name: string, columns: RawColumn[], constraints: RawConstraint[] = [], indexes: RawIndex[] = []): RawTable {
  return { name, columns, constraints, indexes };
}

/** authors ← posts ⇄ tags (through post_tags) */
export function blogSnapshot(): SchemaSnapshot {
  return {
    tables: [
      table('authors', [
        serial(),
        col('name', 'character varying', { length: 120 }),
        col('email', 'character varying', { length: 255 }),
        col('bio', 'text', { nullable: true }),
      ], [pk('authors', 'id'), unique('authors', 'email')]),
      table('posts', [
        serial(),
        col('author_id'),
        col('title', 'character varying', { length: 200 }),
        col('slug', 'character varying', { length: 200 }),
        col('body', 'text'),
        col('published', 'boolean', { default: 'false' }),
        col('created_at', 'timestamp with time zone', { default: 'now()' }),
      ], [pk('posts', 'id'), unique('posts', 'slug'), fk('posts', ['author_id'], 'authors')]),
      table('tags', [
        serial(),
        col('label', 'character varying', { length: 32 }),
      ], [pk('tags', 'id')]),
      table('post_tags', [col('post_id'), col('tag_id')], [
        pk('post_tags', 'post_id', 'tag_id'),
        fk('post_tags', ['post_id'], 'posts'),
        fk('post_tags', ['tag_id'], 'tags'),
      ]),
    ],
  };
}

/** employees.manager_id → employees */
export function employeeSnapshot(): SchemaSnapshot {
  return {
    tables: [
      table('employees', [
        serial(),
        col('name', 'text'),
        col('manager_id', 'integer', { nullable: true }),
      ], [pk('employees', 'id'), fk('employees', ['manager_id'], 'employees')]),
    ],
  };
}

/** shipments with two foreign keys to addresses */
export function shipmentSnapshot(): SchemaSnapshot {
  return {
    tables: [
      table('addresses', [serial(), col('street', 'text')], [pk('addresses', 'id')]),
      table('shipments', [
        serial(),
        col('billing_address_id'),
        col('shipping_address_id'),
      ], [
        pk('shipments', 'id'),
        fk('shipments', ['billing_address_id'], 'addresses'),
        fk('shipments', ['shipping_address_id'], 'addresses'),
      ]),
    ],
  };
}

/** users following users through follows */
export function followSnapshot(): SchemaSnapshot {
  return {
    tables: [
      table('users', [serial(), col('handle', 'character varying', { length: 40 })], [pk('users', 'id')]),
      table('follows', [col('follower_id'), col('followee_id')], [
        pk('follows', 'follower_id', 'followee_id'),
        fk('follows', ['follower_id'], 'users'),
        fk('follows', ['followee_id'], 'users'),
      ]),
    ],
  };
}

/** departments.head_id → employees and employees.department_id → departments */
export function cycleSnapshot(): SchemaSnapshot {
  return {
    tables: [
      table('departments', [serial(), col('head_id')], [pk('departments', 'id'), fk('departments', ['head_id'], 'employees')]),
      table('employees', [serial(), col('department_id')], [pk('employees', 'id'), fk('employees', ['department_id'], 'departments')]),
    ],
  };
}

export function resolve(snapshot: SchemaSnapshot, options: PipelineOptions = {}): PipelineResult {
  return runPipeline(snapshot, options);
}

/** Generator context over a snapshot with defaults for every config option */
export function contextFor(snapshot: SchemaSnapshot, config: Partial<GeneratorConfigInput> = {}): GeneratorContext {
  const parsed = parseGeneratorConfig({ source: { type: 'snapshot', path: 'schema.json' }, ...config });
  const { model } = runPipeline(snapshot, {
    filters: { include: parsed.include_tables, exclude: parsed.exclude_tables },
    housekeepingColumns: parsed.junction_housekeeping_columns,
  });
  return buildGeneratorContext(model, parsed);
}
