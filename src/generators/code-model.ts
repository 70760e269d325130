/**
 * Structured intermediate representation of generated output.
 *
 * Generators build these trees from the resolved model; renderers turn them
 * into text. Nothing in here knows about entities or relationships.
 *
 * @module generators/code-model
 */

// =============================================================================
// TYPES
// =============================================================================

export type TypeRef =
  | { kind: 'named'; name: string; args?: TypeRef[] }
  | { kind: 'array'; element: TypeRef }
  | { kind: 'tuple'; elements: TypeRef[] }
  | { kind: 'union'; members: TypeRef[] }
  | { kind: 'string-literal'; value: string }
  | { kind: 'object'; members: PropertySignature[] }
  | { kind: 'typeof'; name: string }
  | { kind: 'keyof'; target: TypeRef }
  | { kind: 'intersection'; members: TypeRef[] }
  | { kind: 'indexed'; object: TypeRef; index: string }
  | { kind: 'function'; params: Param[]; returns: TypeRef };

export interface PropertySignature {
  name: string;
  type: TypeRef;
  optional?: boolean;
  readonly?: boolean;
  doc?: string;
}

// =============================================================================
// EXPRESSIONS AND STATEMENTS
// =============================================================================

export type Expr =
  | { kind: 'literal'; value: string | number | boolean | null }
  | { kind: 'ref'; name: string }
  | { kind: 'member'; object: Expr; property: string; optional?: boolean }
  | { kind: 'index'; object: Expr; index: Expr }
  | { kind: 'call'; callee: Expr; args: Expr[]; typeArgs?: TypeRef[] }
  | { kind: 'new'; callee: Expr; args: Expr[] }
  | { kind: 'object'; entries: ObjectEntry[] }
  | { kind: 'array'; items: Expr[] }
  | { kind: 'arrow'; params: Param[]; returns?: TypeRef; body: Expr | Stmt[]; async?: boolean }
  | { kind: 'await'; value: Expr }
  | { kind: 'unary'; op: '!' | '-' | 'typeof'; value: Expr }
  | { kind: 'binary'; op: string; left: Expr; right: Expr }
  | { kind: 'conditional'; test: Expr; then: Expr; otherwise: Expr }
  | { kind: 'template'; parts: (string | Expr)[] }
  | { kind: 'spread'; value: Expr }
  | { kind: 'regex'; pattern: string; flags?: string }
  | { kind: 'as-const'; value: Expr }
  | { kind: 'satisfies'; value: Expr; type: TypeRef };

export type ObjectEntry =
  | { kind: 'property'; key: string; value: Expr }
  | { kind: 'shorthand'; name: string }
  | { kind: 'spread'; value: Expr };

export interface Param {
  name: string;
  type?: TypeRef;
  optional?: boolean;
}

export type Stmt =
  | { kind: 'const'; name: string; type?: TypeRef; value: Expr }
  | { kind: 'return'; value?: Expr }
  | { kind: 'expr'; value: Expr }
  | { kind: 'if'; test: Expr; then: Stmt[]; otherwise?: Stmt[] }
  | { kind: 'throw'; value: Expr }
  | { kind: 'blank' };

// =============================================================================
// DECLARATIONS AND UNITS
// =============================================================================

export type Declaration =
  | { kind: 'interface'; name: string; exported: boolean; members: PropertySignature[]; typeParams?: string[]; doc?: string }
  | { kind: 'type-alias'; name: string; exported: boolean; type: TypeRef; typeParams?: string[]; doc?: string }
  | { kind: 'const'; name: string; exported: boolean; type?: TypeRef; value: Expr; doc?: string }
  | {
      kind: 'function';
      name: string;
      exported: boolean;
      async?: boolean;
      typeParams?: string[];
      params: Param[];
      returns?: TypeRef;
      body: Stmt[];
      doc?: string;
    }
  | { kind: 'statement'; statement: Stmt }
  | { kind: 'export-from'; from: string; names?: string[]; typeOnly?: boolean };

export interface ImportSpec {
  from: string;
  names?: string[];
  defaultName?: string;
  typeOnly?: boolean;
}

/** One TypeScript source file */
export interface ModuleUnit {
  kind: 'module';
  /** Path relative to the output root */
  path: string;
  header?: string;
  imports: ImportSpec[];
  declarations: Declaration[];
}

export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | { [key: string]: DocumentValue };

/** One structured data document (API description, manifest) */
export interface DocumentUnit {
  kind: 'document';
  path: string;
  format: 'yaml' | 'json';
  content: DocumentValue;
}

export type OutputUnit = ModuleUnit | DocumentUnit;

// =============================================================================
// BUILDERS
// =============================================================================

/** Terse constructors for code-model nodes */
export const t = {
  named: (name: string, ...args: TypeRef[]): TypeRef => (args.length > 0 ? { kind: 'named', name, args } : { kind: 'named', name }),
  array: (element: TypeRef): TypeRef => ({ kind: 'array', element }),
  tuple: (elements: TypeRef[]): TypeRef => ({ kind: 'tuple', elements }),
  union: (...members: TypeRef[]): TypeRef => ({ kind: 'union', members }),
  nullable: (type: TypeRef): TypeRef => ({ kind: 'union', members: [type, { kind: 'named', name: 'null' }] }),
  lit: (value: string): TypeRef => ({ kind: 'string-literal', value }),
  object: (members: PropertySignature[]): TypeRef => ({ kind: 'object', members }),
  typeOf: (name: string): TypeRef => ({ kind: 'typeof', name }),
  keyOf: (target: TypeRef): TypeRef => ({ kind: 'keyof', target }),
  and: (...members: TypeRef[]): TypeRef => ({ kind: 'intersection', members }),
  indexed: (object: TypeRef, index: string): TypeRef => ({ kind: 'indexed', object, index }),
  fn: (params: Param[], returns: TypeRef): TypeRef => ({ kind: 'function', params, returns }),
};

export const e = {
  lit: (value: string | number | boolean | null): Expr => ({ kind: 'literal', value }),
  ref: (name: string): Expr => ({ kind: 'ref', name }),
  member: (object: Expr, property: string): Expr => ({ kind: 'member', object, property }),
  /** `a.b.c` from a dotted path */
  path: (dotted: string): Expr => {
    const [head, ...rest] = dotted.split('.');
    return rest.reduce<Expr>((object, property) => ({ kind: 'member', object, property }), { kind: 'ref', name: head });
  },
  index: (object: Expr, index: Expr): Expr => ({ kind: 'index', object, index }),
  call: (callee: Expr | string, ...args: Expr[]): Expr => ({
    kind: 'call',
    callee: typeof callee === 'string' ? e.path(callee) : callee,
    args,
  }),
  /** Method chain: chain(z, ['string'], ['max', lit(5)]) → z.string().max(5) */
  chain: (start: Expr, ...links: [string, ...Expr[]][]): Expr =>
    links.reduce<Expr>(
      (object, [method, ...args]) => ({ kind: 'call', callee: { kind: 'member', object, property: method }, args }),
      start
    ),
  newOf: (callee: string, ...args: Expr[]): Expr => ({ kind: 'new', callee: e.path(callee), args }),
  object: (entries: ObjectEntry[]): Expr => ({ kind: 'object', entries }),
  props: (record: [string, Expr][]): Expr => ({
    kind: 'object',
    entries: record.map(([key, value]) => ({ kind: 'property', key, value })),
  }),
  array: (items: Expr[]): Expr => ({ kind: 'array', items }),
  arrow: (params: Param[], body: Expr | Stmt[], options: { async?: boolean; returns?: TypeRef } = {}): Expr => ({
    kind: 'arrow',
    params,
    body,
    ...options,
  }),
  await: (value: Expr): Expr => ({ kind: 'await', value }),
  not: (value: Expr): Expr => ({ kind: 'unary', op: '!', value }),
  binary: (left: Expr, op: string, right: Expr): Expr => ({ kind: 'binary', op, left, right }),
  cond: (test: Expr, then: Expr, otherwise: Expr): Expr => ({ kind: 'conditional', test, then, otherwise }),
  template: (...parts: (string | Expr)[]): Expr => ({ kind: 'template', parts }),
  regex: (pattern: string, flags?: string): Expr => (flags ? { kind: 'regex', pattern, flags } : { kind: 'regex', pattern }),
  asConst: (value: Expr): Expr => ({ kind: 'as-const', value }),
  satisfies: (value: Expr, type: TypeRef): Expr => ({ kind: 'satisfies', value, type }),
};

export const s = {
  const: (name: string, value: Expr, type?: TypeRef): Stmt => (type ? { kind: 'const', name, value, type } : { kind: 'const', name, value }),
  return: (value?: Expr): Stmt => (value ? { kind: 'return', value } : { kind: 'return' }),
  expr: (value: Expr): Stmt => ({ kind: 'expr', value }),
  if: (test: Expr, then: Stmt[], otherwise?: Stmt[]): Stmt => (otherwise ? { kind: 'if', test, then, otherwise } : { kind: 'if', test, then }),
  throw: (value: Expr): Stmt => ({ kind: 'throw', value }),
  blank: (): Stmt => ({ kind: 'blank' }),
};

export function param(name: string, type?: TypeRef, optional = false): Param {
  const result: Param = { name };
  if (type) result.type = type;
  if (optional) result.optional = true;
  return result;
}

export function prop(name: string, type: TypeRef, options: Omit<PropertySignature, 'name' | 'type'> = {}): PropertySignature {
  return { name, type, ...options };
}

/** Expression literal for plain data */
export function fromData(value: DocumentValue): Expr {
  if (Array.isArray(value)) return e.array(value.map(fromData));
  if (value !== null && typeof value === 'object') {
    return e.props(Object.entries(value).map(([key, entry]): [string, Expr] => [key, fromData(entry)]));
  }
  return e.lit(value);
}
