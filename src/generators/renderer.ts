/**
 * Output renderers
 *
 * Turn code-model units into text. Rendering is a pure function of the unit:
 * no timestamps, no environment, fixed indentation and quoting.
 *
 * @module generators/renderer
 */

import yaml from 'js-yaml';
import type {
  Declaration,
  DocumentUnit,
  Expr,
  ImportSpec,
  ModuleUnit,
  ObjectEntry,
  OutputUnit,
  Param,
  PropertySignature,
  Stmt,
  TypeRef,
} from './code-model.js';

const INDENT = '  ';
const INLINE_LIMIT = 80;
const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const LOGICAL_OPERATORS = new Set(['&&', '||']);
const COMPARISON_OPERATORS = new Set(['===', '!==', '<', '>', '<=', '>=']);

/** Single-quoted TypeScript string literal */
export function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
  return `'${escaped}'`;
}

function propertyKey(key: string): string {
  return IDENTIFIER.test(key) ? key : quote(key);
}

function renderDoc(doc: string | undefined, indent: string): string[] {
  if (!doc) return [];
  const lines = doc.split('\n');
  if (lines.length === 1) return [`${indent}/** ${doc} */`];
  return [`${indent}/**`, ...lines.map((line) => (line ? `${indent} * ${line}` : `${indent} *`)), `${indent} */`];
}

// =============================================================================
// TYPESCRIPT
// =============================================================================

export class TypeScriptRenderer {
  render(unit: ModuleUnit): string {
    const sections: string[] = [];
    if (unit.header) sections.push(unit.header.split('\n').map((line) => `// ${line}`).join('\n'));
    if (unit.imports.length > 0) sections.push(unit.imports.map((spec) => this.renderImport(spec)).join('\n'));
    for (const declaration of unit.declarations) {
      sections.push(this.renderDeclaration(declaration));
    }
    return `${sections.join('\n\n')}\n`;
  }

  private renderImport(spec: ImportSpec): string {
    const keyword = spec.typeOnly ? 'import type' : 'import';
    const parts: string[] = [];
    if (spec.defaultName) parts.push(spec.defaultName);
    if (spec.names && spec.names.length > 0) parts.push(`{ ${spec.names.join(', ')} }`);
    return `${keyword} ${parts.join(', ')} from ${quote(spec.from)};`;
  }

  renderDeclaration(declaration: Declaration): string {
    const exported = 'exported' in declaration && declaration.exported ? 'export ' : '';
    switch (declaration.kind) {
      case 'interface': {
        const lines = renderDoc(declaration.doc, '');
        const typeParams = this.typeParams(declaration.typeParams);
        if (declaration.members.length === 0) {
          lines.push(`${exported}interface ${declaration.name}${typeParams} {}`);
          return lines.join('\n');
        }
        lines.push(`${exported}interface ${declaration.name}${typeParams} {`);
        for (const member of declaration.members) {
          lines.push(...this.renderMember(member, INDENT));
        }
        lines.push('}');
        return lines.join('\n');
      }
      case 'type-alias':
        return [
          ...renderDoc(declaration.doc, ''),
          `${exported}type ${declaration.name}${this.typeParams(declaration.typeParams)} = ${this.renderType(declaration.type, '')};`,
        ].join('\n');
      case 'const': {
        const annotation = declaration.type ? `: ${this.renderType(declaration.type, '')}` : '';
        return [
          ...renderDoc(declaration.doc, ''),
          `${exported}const ${declaration.name}${annotation} = ${this.renderExpr(declaration.value, '')};`,
        ].join('\n');
      }
      case 'function': {
        const asyncKeyword = declaration.async ? 'async ' : '';
        const returns = declaration.returns ? `: ${this.renderType(declaration.returns, '')}` : '';
        return [
          ...renderDoc(declaration.doc, ''),
          `${exported}${asyncKeyword}function ${declaration.name}${this.typeParams(declaration.typeParams)}(${this.renderParams(declaration.params)})${returns} {`,
          ...this.renderBlock(declaration.body, INDENT),
          '}',
        ].join('\n');
      }
      case 'statement':
        return this.renderStmt(declaration.statement, '').join('\n');
      case 'export-from': {
        const keyword = declaration.typeOnly ? 'export type' : 'export';
        const names = declaration.names ? `{ ${declaration.names.join(', ')} }` : '*';
        return `${keyword} ${names} from ${quote(declaration.from)};`;
      }
    }
  }

  private typeParams(params: string[] | undefined): string {
    return params && params.length > 0 ? `<${params.join(', ')}>` : '';
  }

  private renderMember(member: PropertySignature, indent: string): string[] {
    const readonly = member.readonly ? 'readonly ' : '';
    const optional = member.optional ? '?' : '';
    return [
      ...renderDoc(member.doc, indent),
      `${indent}${readonly}${propertyKey(member.name)}${optional}: ${this.renderType(member.type, indent)};`,
    ];
  }

  renderType(type: TypeRef, indent: string): string {
    switch (type.kind) {
      case 'named':
        return type.args && type.args.length > 0
          ? `${type.name}<${type.args.map((arg) => this.renderType(arg, indent)).join(', ')}>`
          : type.name;
      case 'array': {
        const element = this.renderType(type.element, indent);
        return ['union', 'intersection', 'function', 'keyof'].includes(type.element.kind) ? `(${element})[]` : `${element}[]`;
      }
      case 'tuple':
        return `[${type.elements.map((element) => this.renderType(element, indent)).join(', ')}]`;
      case 'union':
        return type.members.map((member) => this.renderType(member, indent)).join(' | ');
      case 'string-literal':
        return quote(type.value);
      case 'typeof':
        return `typeof ${type.name}`;
      case 'keyof':
        return `keyof ${this.renderType(type.target, indent)}`;
      case 'intersection':
        return type.members.map((member) => this.renderType(member, indent)).join(' & ');
      case 'indexed':
        return `${this.renderType(type.object, indent)}[${quote(type.index)}]`;
      case 'function':
        return `(${this.renderParams(type.params)}) => ${this.renderType(type.returns, indent)}`;
      case 'object': {
        if (type.members.length === 0) return '{}';
        const inline = `{ ${type.members
          .map((m) => `${m.readonly ? 'readonly ' : ''}${propertyKey(m.name)}${m.optional ? '?' : ''}: ${this.renderType(m.type, indent)}`)
          .join('; ')} }`;
        if (inline.length + indent.length <= INLINE_LIMIT && !inline.includes('\n')) return inline;
        const inner = indent + INDENT;
        return ['{', ...type.members.flatMap((m) => this.renderMember(m, inner)), `${indent}}`].join('\n');
      }
    }
  }

  private renderParams(params: readonly Param[]): string {
    return params
      .map((p) => `${p.name}${p.optional ? '?' : ''}${p.type ? `: ${this.renderType(p.type, '')}` : ''}`)
      .join(', ');
  }

  // ===========================================================================
  // EXPRESSIONS
  // ===========================================================================

  renderExpr(expr: Expr, indent: string): string {
    switch (expr.kind) {
      case 'literal':
        if (typeof expr.value === 'string') return quote(expr.value);
        return String(expr.value);
      case 'ref':
        return expr.name;
      case 'member': {
        const object = this.operand(expr.object, indent);
        if (IDENTIFIER.test(expr.property)) return `${object}${expr.optional ? '?.' : '.'}${expr.property}`;
        return `${object}${expr.optional ? '?.' : ''}[${quote(expr.property)}]`;
      }
      case 'index':
        return `${this.operand(expr.object, indent)}[${this.renderExpr(expr.index, indent)}]`;
      case 'call': {
        const typeArgs = expr.typeArgs && expr.typeArgs.length > 0
          ? `<${expr.typeArgs.map((arg) => this.renderType(arg, indent)).join(', ')}>`
          : '';
        return `${this.operand(expr.callee, indent)}${typeArgs}(${expr.args.map((arg) => this.renderExpr(arg, indent)).join(', ')})`;
      }
      case 'new':
        return `new ${this.operand(expr.callee, indent)}(${expr.args.map((arg) => this.renderExpr(arg, indent)).join(', ')})`;
      case 'object':
        return this.renderObject(expr.entries, indent);
      case 'array': {
        if (expr.items.length === 0) return '[]';
        const items = expr.items.map((item) => this.renderExpr(item, indent + INDENT));
        const inline = `[${items.join(', ')}]`;
        if (!inline.includes('\n') && inline.length + indent.length <= INLINE_LIMIT) return inline;
        return ['[', ...items.map((item) => `${indent}${INDENT}${item},`), `${indent}]`].join('\n');
      }
      case 'arrow': {
        const head = `${expr.async ? 'async ' : ''}(${this.renderParams(expr.params)})${expr.returns ? `: ${this.renderType(expr.returns, indent)}` : ''} =>`;
        if (Array.isArray(expr.body)) {
          if (expr.body.length === 0) return `${head} {}`;
          return [`${head} {`, ...this.renderBlock(expr.body, indent + INDENT), `${indent}}`].join('\n');
        }
        const body = this.renderExpr(expr.body, indent);
        return expr.body.kind === 'object' ? `${head} (${body})` : `${head} ${body}`;
      }
      case 'await':
        return `await ${this.operand(expr.value, indent)}`;
      case 'unary':
        return expr.op === 'typeof' ? `typeof ${this.operand(expr.value, indent)}` : `${expr.op}${this.operand(expr.value, indent)}`;
      case 'binary':
        return `${this.binaryOperand(expr.left, expr.op, indent)} ${expr.op} ${this.binaryOperand(expr.right, expr.op, indent)}`;
      case 'conditional':
        return `${this.branch(expr.test, indent)} ? ${this.branch(expr.then, indent)} : ${this.branch(expr.otherwise, indent)}`;
      case 'template':
        return `\`${expr.parts
          .map((part) =>
            typeof part === 'string'
              ? part.replace(/\\/g, '\\\\').replace(/`/g, '\\`').replace(/\$\{/g, '\\${')
              : `\${${this.renderExpr(part, indent)}}`
          )
          .join('')}\``;
      case 'spread':
        return `...${this.operand(expr.value, indent)}`;
      case 'regex':
        return `/${expr.pattern}/${expr.flags ?? ''}`;
      case 'as-const':
        return `${this.renderExpr(expr.value, indent)} as const`;
      case 'satisfies':
        return `${this.renderExpr(expr.value, indent)} satisfies ${this.renderType(expr.type, indent)}`;
    }
  }

  /** Render a sub-expression, parenthesized where precedence would change its meaning */
  private operand(expr: Expr, indent: string): string {
    const rendered = this.renderExpr(expr, indent);
    switch (expr.kind) {
      case 'binary':
      case 'conditional':
      case 'arrow':
      case 'await':
      case 'as-const':
      case 'satisfies':
        return `(${rendered})`;
      default:
        return rendered;
    }
  }

  /** Comparisons inside `&&` and `||` stay bare */
  private binaryOperand(expr: Expr, parentOp: string, indent: string): string {
    if (expr.kind === 'binary' && LOGICAL_OPERATORS.has(parentOp) && COMPARISON_OPERATORS.has(expr.op)) {
      return this.renderExpr(expr, indent);
    }
    return this.operand(expr, indent);
  }

  /** Part of a conditional; only nested conditionals and arrows are parenthesized */
  private branch(expr: Expr, indent: string): string {
    const rendered = this.renderExpr(expr, indent);
    return expr.kind === 'conditional' || expr.kind === 'arrow' ? `(${rendered})` : rendered;
  }

  private renderObject(entries: readonly ObjectEntry[], indent: string): string {
    if (entries.length === 0) return '{}';
    const inner = indent + INDENT;
    const rendered = entries.map((entry) => {
      switch (entry.kind) {
        case 'property':
          return `${propertyKey(entry.key)}: ${this.renderExpr(entry.value, inner)}`;
        case 'shorthand':
          return entry.name;
        case 'spread':
          return `...${this.operand(entry.value, inner)}`;
      }
    });
    const inline = `{ ${rendered.join(', ')} }`;
    if (!inline.includes('\n') && inline.length + indent.length <= INLINE_LIMIT) return inline;
    return ['{', ...rendered.map((line) => `${inner}${line},`), `${indent}}`].join('\n');
  }

  // ===========================================================================
  // STATEMENTS
  // ===========================================================================

  private renderBlock(body: readonly Stmt[], indent: string): string[] {
    return body.flatMap((stmt) => this.renderStmt(stmt, indent));
  }

  private renderStmt(stmt: Stmt, indent: string): string[] {
    switch (stmt.kind) {
      case 'const': {
        const annotation = stmt.type ? `: ${this.renderType(stmt.type, indent)}` : '';
        return [`${indent}const ${stmt.name}${annotation} = ${this.renderExpr(stmt.value, indent)};`];
      }
      case 'return':
        return [stmt.value ? `${indent}return ${this.renderExpr(stmt.value, indent)};` : `${indent}return;`];
      case 'expr':
        return [`${indent}${this.renderExpr(stmt.value, indent)};`];
      case 'throw':
        return [`${indent}throw ${this.renderExpr(stmt.value, indent)};`];
      case 'blank':
        return [''];
      case 'if': {
        const lines = [`${indent}if (${this.renderExpr(stmt.test, indent)}) {`, ...this.renderBlock(stmt.then, indent + INDENT)];
        if (stmt.otherwise && stmt.otherwise.length > 0) {
          lines.push(`${indent}} else {`, ...this.renderBlock(stmt.otherwise, indent + INDENT));
        }
        lines.push(`${indent}}`);
        return lines;
      }
    }
  }
}

// =============================================================================
// DOCUMENTS
// =============================================================================

export class DocumentRenderer {
  render(unit: DocumentUnit): string {
    if (unit.format === 'json') {
      return `${JSON.stringify(unit.content, null, 2)}\n`;
    }
    return yaml.dump(unit.content, { sortKeys: false, lineWidth: -1, noRefs: true });
  }
}

const typescript = new TypeScriptRenderer();
const documents = new DocumentRenderer();

/** Render any output unit with the renderer for its kind */
export function renderUnit(unit: OutputUnit): string {
  return unit.kind === 'module' ? typescript.render(unit) : documents.render(unit);
}
