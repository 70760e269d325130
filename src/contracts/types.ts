/**
 * Contract Types - Interface Definitions
 *
 * Type-level contract between the pipeline stages: what the Introspection
 * Port hands over, what each resolution stage produces, and the frozen
 * resolved model every generator reads.
 *
 * @module contracts/types
 */

// =============================================================================
// COMMON TYPES
// =============================================================================

/** SHA-256 hash string (64 hex characters) */
export type ContentHash = string;

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Error severity level */
export type ErrorSeverity = 'warning' | 'error' | 'fatal';

/** How relationship fields are rendered by the artifact generators */
export type RelationStyle = 'key' | 'link' | 'embedded';

/** Categories of generated output, in report order */
export const ARTIFACT_KINDS = [
  'entities',
  'transformers',
  'handlers',
  'routes',
  'admin',
  'openapi',
  'tests',
] as const;

/** One category of generated output */
export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

/**
 * Recoverable issue surfaced in the end-of-run report.
 * Same shape as a fatal error minus the throw.
 */
export interface GenerationWarning {
  /** Machine-readable code from ERROR_CODES */
  code: string;
  /** Human-readable message naming the offending table/column */
  message: string;
  severity: 'warning';
  context?: Record<string, unknown>;
  recoverable: true;
}

export interface ValidationError {
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

// =============================================================================
// INTROSPECTION PORT OUTPUT
// =============================================================================

export interface RawColumn {
  name: string;
  /** Native type as reported by the database, e.g. "character varying" */
  nativeType: string;
  /** Character length for string types */
  length: number | null;
  precision: number | null;
  scale: number | null;
  nullable: boolean;
  /** Default as raw SQL text, null when absent */
  default: string | null;
  autoIncrement: boolean;
}

export type ConstraintKind = 'primary-key' | 'unique' | 'check' | 'foreign-key';

export interface RawConstraint {
  name: string;
  kind: ConstraintKind;
  /** Ordered column list */
  columns: string[];
  /** Foreign keys only */
  referencedTable?: string;
  /** Foreign keys only; defaults to the referenced table's primary key */
  referencedColumns?: string[];
  /** Check constraints only */
  definition?: string;
}

export interface RawIndex {
  name: string;
  columns: string[];
  unique: boolean;
  /** True when the index covers an expression rather than plain columns */
  expression: boolean;
}

export interface RawTable {
  name: string;
  columns: RawColumn[];
  constraints: RawConstraint[];
  indexes: RawIndex[];
}

/**
 * Complete result of one atomic introspection read.
 * Producer: SchemaIntrospector
 * Consumer: buildSchemaModel
 */
export interface SchemaSnapshot {
  tables: RawTable[];
}

// =============================================================================
// SCHEMA MODEL
// =============================================================================

export type Column = Readonly<RawColumn>;

export interface Constraint {
  readonly name: string;
  readonly kind: ConstraintKind;
  readonly columns: readonly string[];
  readonly referencedTable?: string;
  readonly referencedColumns?: readonly string[];
  readonly definition?: string;
}

export interface Index {
  readonly name: string;
  readonly columns: readonly string[];
  readonly unique: boolean;
  readonly expression: boolean;
}

export interface Table {
  readonly name: string;
  readonly columns: readonly Column[];
  readonly constraints: readonly Constraint[];
  readonly indexes: readonly Index[];
  /** Columns of the single primary-key constraint */
  readonly primaryKey: readonly string[];
}

/** Immutable-after-build schema; tables iterate in name order */
export interface SchemaModel {
  readonly tables: ReadonlyMap<string, Table>;
}

// =============================================================================
// RELATIONSHIPS
// =============================================================================

export type RelationshipKind = 'many-to-one' | 'one-to-one' | 'many-to-many';

export interface JunctionInfo {
  readonly table: string;
  /** Junction columns referencing the source table */
  readonly sourceColumns: readonly string[];
  /** Source-table columns they reference */
  readonly sourceReferencedColumns: readonly string[];
  /** Junction columns referencing the target table */
  readonly targetColumns: readonly string[];
  /** Target-table columns they reference */
  readonly targetReferencedColumns: readonly string[];
}

export interface RelationshipInfo {
  /** Deterministic identity: kind, source, owning columns and target */
  readonly id: string;
  readonly kind: RelationshipKind;
  readonly selfReferential: boolean;
  readonly sourceTable: string;
  readonly targetTable: string;
  /**
   * Columns carrying the link. For many-to-one / one-to-one these live on the
   * source table; for many-to-many they are the junction columns pointing at
   * the source.
   */
  readonly owningColumns: readonly string[];
  /** Referenced columns on the target table (many-to-many: junction target-side refs) */
  readonly targetColumns: readonly string[];
  /** True when any owning column accepts NULL */
  readonly nullable: boolean;
  readonly constraintName: string;
  /** Resolution order, lower resolves first */
  readonly priority: number;
  /** Reverse-accessor identity on the target side */
  readonly reverseKey: string;
  readonly junction?: JunctionInfo;
}

export interface RelationshipResolution {
  /** Sorted by priority */
  readonly relationships: readonly RelationshipInfo[];
  /** Tables collapsed into many-to-many relationships */
  readonly junctionTables: ReadonlySet<string>;
}

// =============================================================================
// TYPE MAPPING
// =============================================================================

export type FieldKind =
  | 'integer'
  | 'bigint'
  | 'decimal'
  | 'float'
  | 'string'
  | 'text'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'time'
  | 'interval'
  | 'uuid'
  | 'json'
  | 'binary'
  | 'inet'
  | 'opaque';

export type ApiType = 'integer' | 'number' | 'string' | 'boolean' | 'object';

export type DefaultValue =
  | { kind: 'none' }
  | { kind: 'constant'; value: string | number | boolean | null }
  | { kind: 'server' };

export interface FieldSpec {
  readonly kind: FieldKind;
  readonly nativeType: string;
  /** TypeScript type used in generated code */
  readonly tsType: string;
  /** API description type (element type when `array` is set) */
  readonly apiType: ApiType;
  readonly apiFormat?: string;
  /** Column holds an array of `kind` values */
  readonly array: boolean;
  readonly length: number | null;
  readonly precision: number | null;
  readonly scale: number | null;
  readonly nullable: boolean;
  readonly autoIncrement: boolean;
  readonly default: DefaultValue;
}

/** Keyed by `${table}.${column}` */
export type TypeMapping = ReadonlyMap<string, FieldSpec>;

// =============================================================================
// NAMING
// =============================================================================

export interface EntityNames {
  readonly entityName: string;
  /** kebab-case, used for file names */
  readonly fileName: string;
  /** Collection route path, e.g. "/blog-posts" */
  readonly routePath: string;
  /** column name → field name */
  readonly fields: ReadonlyMap<string, string>;
  /** relationship id → accessor on the source side */
  readonly forwardAccessors: ReadonlyMap<string, string>;
  /** relationship id → accessor on the target side */
  readonly reverseAccessors: ReadonlyMap<string, string>;
}

/** Keyed by table name; junction tables are absent */
export type NameAssignment = ReadonlyMap<string, EntityNames>;

// =============================================================================
// DEPENDENCY ORDER
// =============================================================================

export interface DependencyOrder {
  /** Table names, referenced before referencing */
  readonly order: readonly string[];
  /** Relationship ids deferred to break cycles */
  readonly deferred: ReadonlySet<string>;
}

// =============================================================================
// RESOLVED MODEL
// =============================================================================

export interface EntityField {
  readonly name: string;
  readonly column: string;
  readonly spec: FieldSpec;
  /** Effective nullability, widened for deferred relationships */
  readonly nullable: boolean;
  readonly primaryKey: boolean;
  readonly unique: boolean;
  /** Assigned by the database (auto-increment or server default on a key) */
  readonly readOnly: boolean;
  /** Relationship id when this field is an owning column */
  readonly relationshipId?: string;
}

export interface EntityRelation {
  readonly accessor: string;
  readonly relationshipId: string;
  readonly kind: RelationshipKind;
  /** forward: declared on the owning side; reverse: synthesized on the target */
  readonly direction: 'forward' | 'reverse';
  readonly cardinality: 'one' | 'many';
  readonly targetEntity: string;
  readonly targetTable: string;
  readonly nullable: boolean;
  readonly deferred: boolean;
  readonly selfReferential: boolean;
  /** Fields on this entity carrying the link (forward to-one only) */
  readonly localFields: readonly string[];
  /** Fields on the target entity the link points at or from */
  readonly remoteFields: readonly string[];
  readonly junction?: {
    readonly table: string;
    /** Junction columns pointing at this entity */
    readonly localColumns: readonly string[];
    /** Junction columns pointing at the target entity */
    readonly remoteColumns: readonly string[];
  };
}

export interface EntityModel {
  readonly table: string;
  readonly name: string;
  readonly fileName: string;
  readonly routePath: string;
  /** Field names of the primary key, in key order */
  readonly primaryKey: readonly string[];
  readonly fields: readonly EntityField[];
  readonly relations: readonly EntityRelation[];
  /** Single-field unique lookups (non-key) */
  readonly uniqueLookups: readonly string[];
  /** Multi-field unique constraints, field names */
  readonly uniqueTogether: readonly (readonly string[])[];
}

/** Frozen output of the pipeline, consumed by every generator */
export interface ResolvedModel {
  /** Dependency order */
  readonly entities: readonly EntityModel[];
  readonly relationships: readonly RelationshipInfo[];
  readonly junctionTables: readonly string[];
  readonly deferred: readonly string[];
}
