/**
 * Type Mapper
 *
 * Table-driven mapping from native column types (PostgreSQL, MySQL and
 * SQLite spellings) to field specifications. The mapping is total: unknown
 * types become `opaque` string fields and raise UNSUPPORTED_TYPE.
 *
 * The table lives in data/native-types.json.
 *
 * @module pipeline/type-mapper
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { ApiType, Column, DefaultValue, FieldKind, FieldSpec, SchemaModel, TypeMapping } from '../contracts/types.js';
import { ERROR_CODES } from '../contracts/errors.js';
import type { Diagnostics } from '../utils/diagnostics.js';
import { deepFreeze } from '../utils/collections.js';

// =============================================================================
// MAPPING TABLE
// =============================================================================

export const FIELD_KINDS = [
  'integer', 'bigint', 'decimal', 'float', 'string', 'text', 'boolean', 'date',
  'datetime', 'time', 'interval', 'uuid', 'json', 'binary', 'inet', 'opaque',
] as const satisfies readonly FieldKind[];

const KindEntrySchema = z.object({
  canonical: z.string().nullable(),
  tsType: z.string(),
  apiType: z.enum(['integer', 'number', 'string', 'boolean', 'object']),
  apiFormat: z.string().optional(),
});

const MappingTableSchema = z.object({
  kinds: z.record(z.enum(FIELD_KINDS), KindEntrySchema),
  types: z.record(z.string(), z.enum(FIELD_KINDS)),
});

type KindEntry = z.infer<typeof KindEntrySchema>;

function loadMappingTable(): { kinds: ReadonlyMap<FieldKind, KindEntry>; types: ReadonlyMap<string, FieldKind> } {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../data/native-types.json', import.meta.url), 'utf-8'));
  const table = MappingTableSchema.parse(raw);
  const kinds = new Map<FieldKind, KindEntry>();
  for (const kind of FIELD_KINDS) {
    const entry = table.kinds[kind];
    if (!entry) {
      throw new Error(`native-types.json is missing kind "${kind}"`);
    }
    kinds.set(kind, entry);
  }
  return { kinds, types: new Map(Object.entries(table.types)) };
}

const MAPPING = loadMappingTable();

function kindEntry(kind: FieldKind): KindEntry {
  const entry = MAPPING.kinds.get(kind);
  if (!entry) {
    throw new Error(`No mapping entry for kind "${kind}"`);
  }
  return entry;
}

/** Every native type name the table recognizes */
export function knownNativeTypes(): string[] {
  return [...MAPPING.types.keys()];
}

/** Canonical native spelling of a kind; null for `opaque` */
export function canonicalNativeType(kind: FieldKind): string | null {
  return kindEntry(kind).canonical;
}

/** All native spellings mapping to a kind */
export function nativeTypesForKind(kind: FieldKind): string[] {
  return [...MAPPING.types].filter(([, k]) => k === kind).map(([name]) => name);
}

// =============================================================================
// NORMALIZATION
// =============================================================================

export interface NormalizedType {
  /** Lower-case base name without parameters or array suffix */
  base: string;
  /** Numeric parameters, e.g. [10, 2] for numeric(10,2) */
  params: number[];
  array: boolean;
}

export function normalizeNativeType(nativeType: string): NormalizedType {
  let text = nativeType.trim().toLowerCase();
  let array = false;
  while (text.endsWith('[]')) {
    array = true;
    text = text.slice(0, -2).trim();
  }

  const params: number[] = [];
  text = text.replace(/\(([^)]*)\)/g, (_match: string, inner: string) => {
    for (const part of inner.split(',')) {
      const trimmed = part.trim();
      if (/^\d+$/.test(trimmed)) params.push(Number(trimmed));
    }
    return ' ';
  });

  const base = text
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/ (unsigned|zerofill)$/, '');

  return { base, params, array };
}

// =============================================================================
// MAPPING
// =============================================================================

export type NativeColumn = Pick<Column, 'nativeType' | 'length' | 'precision' | 'scale' | 'nullable' | 'default' | 'autoIncrement'>;

export interface MappedType {
  spec: FieldSpec;
  /** False when the type fell back to `opaque` */
  supported: boolean;
}

const LENGTH_KINDS = new Set<FieldKind>(['string', 'binary']);
const PRECISION_KINDS = new Set<FieldKind>(['decimal', 'float', 'datetime', 'time']);

/**
 * Map one native type and its facets to a field specification. Facets
 * reported by the column win over parameters spelled in the type name.
 */
export function mapNativeType(column: NativeColumn): MappedType {
  const normalized = normalizeNativeType(column.nativeType);
  const known = MAPPING.types.get(normalized.base);
  const kind: FieldKind = known ?? 'opaque';
  const entry = kindEntry(kind);

  const [first, second] = normalized.params;
  const length = column.length ?? (LENGTH_KINDS.has(kind) ? (first ?? null) : null);
  const precision = column.precision ?? (PRECISION_KINDS.has(kind) ? (first ?? null) : null);
  const scale = column.scale ?? (kind === 'decimal' ? (second ?? null) : null);

  const apiType: ApiType = entry.apiType;
  const spec: FieldSpec = {
    kind,
    nativeType: column.nativeType,
    tsType: normalized.array ? `${wrapUnion(entry.tsType)}[]` : entry.tsType,
    apiType,
    ...(entry.apiFormat !== undefined ? { apiFormat: entry.apiFormat } : {}),
    array: normalized.array,
    length,
    precision,
    scale,
    nullable: column.nullable,
    autoIncrement: column.autoIncrement,
    default: parseDefault(column.default, kind, column.autoIncrement),
  };

  return { spec, supported: known !== undefined };
}

function wrapUnion(tsType: string): string {
  return tsType.includes('|') ? `(${tsType})` : tsType;
}

/**
 * Translate a raw SQL default. Only literal constants are reproduced; any
 * expression (function call, sequence, keyword) becomes a server default.
 */
export function parseDefault(raw: string | null, kind: FieldKind, autoIncrement: boolean): DefaultValue {
  if (autoIncrement) return { kind: 'server' };
  if (raw === null) return { kind: 'none' };

  let text = raw.trim();
  // Strip wrapping parentheses and trailing casts: ('a'::text)::varchar(10)
  for (;;) {
    const unwrapped = text.replace(/^\((.*)\)$/s, '$1').trim();
    const uncast = unwrapped.replace(/::[a-z_][a-z0-9_ ."]*(\(\d+(\s*,\s*\d+)?\))?(\[\])?$/i, '').trim();
    if (uncast === text) break;
    text = uncast;
  }

  if (/^null$/i.test(text)) {
    return { kind: 'constant', value: null };
  }

  if (/^(true|false)$/i.test(text)) {
    return { kind: 'constant', value: text.toLowerCase() === 'true' };
  }

  if (NUMERIC_LITERAL.test(text)) {
    // SQLite reports `DEFAULT 0` on a TEXT column unquoted
    return NUMERIC_KINDS.has(kind) || kind === 'boolean' ? numericDefault(text, kind) : { kind: 'constant', value: text };
  }

  const quoted = /^'((?:[^']|'')*)'$/s.exec(text);
  if (quoted) {
    const value = quoted[1].replace(/''/g, "'");
    if (kind === 'boolean' && /^(t|f|true|false)$/i.test(value)) {
      return { kind: 'constant', value: value.toLowerCase().startsWith('t') };
    }
    // PostgreSQL quotes negative numeric defaults: '-1'::integer
    if (NUMERIC_KINDS.has(kind) && NUMERIC_LITERAL.test(value)) {
      return numericDefault(value, kind);
    }
    return { kind: 'constant', value };
  }

  return { kind: 'server' };
}

const NUMERIC_LITERAL = /^[-+]?\d+(\.\d+)?([eE][-+]?\d+)?$/;
const NUMERIC_KINDS = new Set<FieldKind>(['integer', 'bigint', 'decimal', 'float']);

function numericDefault(text: string, kind: FieldKind): DefaultValue {
  if (kind === 'boolean' && (text === '0' || text === '1')) {
    return { kind: 'constant', value: text === '1' };
  }
  // Decimals and integers beyond 2^53 keep their exact text
  if (kind === 'decimal') {
    return { kind: 'constant', value: text };
  }
  const value = Number(text);
  return Number.isInteger(value) && !Number.isSafeInteger(value)
    ? { kind: 'constant', value: text }
    : { kind: 'constant', value };
}

/**
 * Map every column of the model. Keys are `${table}.${column}`.
 */
export function mapTypes(model: SchemaModel, diagnostics: Diagnostics): TypeMapping {
  const mapping = new Map<string, FieldSpec>();
  for (const table of model.tables.values()) {
    for (const column of table.columns) {
      const { spec, supported } = mapNativeType(column);
      if (!supported) {
        diagnostics.warn(
          ERROR_CODES.UNSUPPORTED_TYPE,
          `Column "${table.name}.${column.name}" has unsupported type "${column.nativeType}"; generated as an opaque string`,
          { table: table.name, column: column.name, nativeType: column.nativeType }
        );
      }
      mapping.set(fieldKey(table.name, column.name), spec);
    }
  }
  return deepFreeze(mapping);
}

export function fieldKey(table: string, column: string): string {
  return `${table}.${column}`;
}
