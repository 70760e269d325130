/**
 * Naming Resolver
 *
 * Assigns collision-free identifiers to entities, fields and relationship
 * accessors. Every name is a pure function of schema names; collisions are
 * resolved with suffixes derived from owning columns, never from counters, so
 * the result does not depend on traversal order.
 *
 * @module pipeline/naming
 */

import { readFileSync } from 'fs';
import pluralize from 'pluralize';
import { z } from 'zod';
import type {
  EntityNames,
  NameAssignment,
  RelationshipInfo,
  RelationshipResolution,
  SchemaModel,
} from '../contracts/types.js';
import { NamingCollisionError } from '../contracts/errors.js';
import { compareStrings, deepFreeze } from '../utils/collections.js';

// =============================================================================
// RESERVED WORDS
// =============================================================================

const ReservedWordsSchema = z.object({
  keywords: z.array(z.string()),
  globals: z.array(z.string()),
  /** Appended to an entity name for the types generated beside it */
  derivedSuffixes: z.array(z.string()),
});

const RESERVED = ReservedWordsSchema.parse(
  JSON.parse(readFileSync(new URL('../../data/reserved-words.json', import.meta.url), 'utf-8'))
);
const KEYWORDS = new Set(RESERVED.keywords);
const GLOBALS = new Set(RESERVED.globals);
export const DERIVED_TYPE_SUFFIXES: readonly string[] = RESERVED.derivedSuffixes;

// =============================================================================
// CASE TRANSFORMS
// =============================================================================

/**
 * Split an identifier into lower-case words on separators and case
 * boundaries: "billing_address_id", "billingAddressID" and "BillingAddressId"
 * all give ["billing", "address", "id"].
 */
export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter((w) => w.length > 0)
    .map((w) => w.toLowerCase());
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function pascalCase(words: readonly string[]): string {
  return words.map(capitalize).join('');
}

export function camelCase(words: readonly string[]): string {
  const [first = '', ...rest] = words;
  return first + rest.map(capitalize).join('');
}

export function kebabCase(words: readonly string[]): string {
  return words.join('-');
}

/** Singularize the last word only: "order_items" → ["order", "item"] */
export function singularWords(words: readonly string[]): string[] {
  if (words.length === 0) return [];
  return [...words.slice(0, -1), pluralize.singular(words[words.length - 1])];
}

export function pluralWords(words: readonly string[]): string[] {
  if (words.length === 0) return [];
  return [...words.slice(0, -1), pluralize.plural(words[words.length - 1])];
}

/** Owning-column words with a trailing "id" removed: billing_address_id → billing, address */
function strippedColumnWords(columns: readonly string[]): string[] {
  return columns.flatMap((column) => {
    const words = splitWords(column);
    return words.length > 1 && words[words.length - 1] === 'id' ? words.slice(0, -1) : words;
  });
}

/** Make an identifier safe: leading digit gets "_", reserved words get a trailing "_" */
function safeIdentifier(name: string): string {
  const base = /^[0-9]/.test(name) ? `_${name}` : name;
  return KEYWORDS.has(base) ? `${base}_` : base;
}

// =============================================================================
// ENTITY NAMES
// =============================================================================

interface EntityIdentity {
  entityName: string;
  fileName: string;
  routePath: string;
}

function entityIdentity(words: readonly string[]): EntityIdentity {
  let entityName = pascalCase(words);
  if (/^[0-9]/.test(entityName)) entityName = `_${entityName}`;
  if (GLOBALS.has(entityName) || KEYWORDS.has(entityName)) entityName = `${entityName}Entity`;
  const nameWords = splitWords(entityName);
  return {
    entityName,
    fileName: kebabCase(nameWords),
    routePath: `/${kebabCase(pluralWords(nameWords))}`,
  };
}

/**
 * Entity identities for every non-junction table. Tables whose singular
 * names coincide fall back to their unsingularized names.
 */
function resolveEntityIdentities(tables: readonly string[]): Map<string, EntityIdentity> {
  const singular = new Map<string, EntityIdentity>();
  const counts = new Map<string, number>();
  for (const table of tables) {
    const identity = entityIdentity(singularWords(splitWords(table)));
    singular.set(table, identity);
    counts.set(identity.entityName, (counts.get(identity.entityName) ?? 0) + 1);
  }

  const result = new Map<string, EntityIdentity>();
  const byName = new Map<string, string>();
  const byRoute = new Map<string, string>();
  const byTypeName = new Map<string, string>();
  for (const table of tables) {
    const candidate = singular.get(table);
    if (!candidate) continue;
    const identity = (counts.get(candidate.entityName) ?? 0) > 1 ? entityIdentity(splitWords(table)) : candidate;

    const nameOwner = byName.get(identity.entityName.toLowerCase());
    if (nameOwner !== undefined) {
      throw new NamingCollisionError('entity name', identity.entityName, nameOwner, table);
    }
    const routeOwner = byRoute.get(identity.routePath);
    if (routeOwner !== undefined) {
      throw new NamingCollisionError('route path', identity.routePath, routeOwner, table);
    }
    for (const typeName of [identity.entityName, ...DERIVED_TYPE_SUFFIXES.map((suffix) => `${identity.entityName}${suffix}`)]) {
      const typeOwner = byTypeName.get(typeName);
      if (typeOwner !== undefined) {
        throw new NamingCollisionError('type name', typeName, typeOwner, table);
      }
      byTypeName.set(typeName, table);
    }
    byName.set(identity.entityName.toLowerCase(), table);
    byRoute.set(identity.routePath, table);
    result.set(table, identity);
  }
  return result;
}

// =============================================================================
// ACCESSOR CLAIMS
// =============================================================================

interface AccessorClaim {
  relationshipId: string;
  side: 'forward' | 'reverse';
  base: string;
  suffix: string;
  /** Suffix applied unconditionally */
  forceSuffix: boolean;
  /** Describes the claim in collision errors */
  origin: string;
}

/**
 * Claim one class of accessors against the names already taken in the
 * entity. Any base shared within the class or already taken gets the
 * deterministic suffix for every member of its group.
 */
function claimAccessors(
  entityTable: string,
  claims: readonly AccessorClaim[],
  taken: Map<string, string>,
  forward: Map<string, string>,
  reverse: Map<string, string>
): void {
  const baseCounts = new Map<string, number>();
  for (const claim of claims) {
    baseCounts.set(claim.base, (baseCounts.get(claim.base) ?? 0) + 1);
  }

  const ordered = [...claims].sort((a, b) => compareStrings(a.relationshipId, b.relationshipId) || compareStrings(a.side, b.side));
  for (const claim of ordered) {
    const plain = safeIdentifier(claim.base);
    const needsSuffix = claim.forceSuffix || (baseCounts.get(claim.base) ?? 0) > 1 || taken.has(plain);
    const name = needsSuffix ? safeIdentifier(`${claim.base}${claim.suffix}`) : plain;
    const owner = taken.get(name);
    if (owner !== undefined) {
      throw new NamingCollisionError(`accessor on "${entityTable}"`, name, owner, claim.origin);
    }
    taken.set(name, claim.origin);
    (claim.side === 'forward' ? forward : reverse).set(claim.relationshipId, name);
  }
}

function describeRelationship(rel: RelationshipInfo): string {
  const via = rel.junction ? ` via ${rel.junction.table}` : '';
  return `${rel.sourceTable}(${rel.owningColumns.join(', ')}) -> ${rel.targetTable}${via}`;
}

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Assign names for every entity. Claim order within an entity: fields,
 * forward to-one accessors, many-to-many accessors, reverse accessors.
 *
 * @throws NamingCollisionError with both colliding originals
 */
export function resolveNames(model: SchemaModel, resolution: RelationshipResolution): NameAssignment {
  const tables = [...model.tables.keys()].filter((t) => !resolution.junctionTables.has(t));
  const identities = resolveEntityIdentities(tables);

  const entityWords = (table: string): string[] => {
    const identity = identities.get(table);
    return identity ? splitWords(identity.entityName) : splitWords(table);
  };

  const assignment = new Map<string, EntityNames>();

  for (const tableName of tables) {
    const table = model.tables.get(tableName);
    const identity = identities.get(tableName);
    if (!table || !identity) continue;

    // Fields
    const fields = new Map<string, string>();
    const taken = new Map<string, string>();
    for (const column of table.columns) {
      const name = safeIdentifier(camelCase(splitWords(column.name)) || column.name);
      const owner = taken.get(name);
      if (owner !== undefined) {
        throw new NamingCollisionError(`field on "${tableName}"`, name, owner, `${tableName}.${column.name}`);
      }
      taken.set(name, `${tableName}.${column.name}`);
      fields.set(column.name, name);
    }

    const forward = new Map<string, string>();
    const reverse = new Map<string, string>();

    // Forward to-one accessors
    const forwardClaims = resolution.relationships
      .filter((rel) => rel.kind !== 'many-to-many' && rel.sourceTable === tableName)
      .map((rel): AccessorClaim => {
        const stripped = strippedColumnWords(rel.owningColumns);
        // "author_id" gives "author"; composite keys and bare names like "id" use the target entity
        const hasIdSuffix = rel.owningColumns.length === 1 && stripped.length < splitWords(rel.owningColumns[0]).length;
        const baseWords = hasIdSuffix ? stripped : singularWords(entityWords(rel.targetTable));
        return {
          relationshipId: rel.id,
          side: 'forward',
          base: camelCase(baseWords),
          suffix: `Via${pascalCase(stripped)}`,
          forceSuffix: false,
          origin: describeRelationship(rel),
        };
      });
    claimAccessors(tableName, forwardClaims, taken, forward, reverse);

    // Many-to-many accessors, one per side this entity sits on
    const manyClaims: AccessorClaim[] = [];
    for (const rel of resolution.relationships) {
      if (rel.kind !== 'many-to-many' || !rel.junction) continue;
      const junction = rel.junction;
      if (rel.sourceTable === tableName) {
        manyClaims.push({
          relationshipId: rel.id,
          side: 'forward',
          base: camelCase(pluralWords(entityWords(rel.targetTable))),
          suffix: rel.selfReferential
            ? `By${pascalCase(strippedColumnWords(junction.targetColumns))}`
            : `Via${pascalCase(splitWords(junction.table))}`,
          forceSuffix: rel.selfReferential,
          origin: describeRelationship(rel),
        });
      }
      if (rel.targetTable === tableName) {
        manyClaims.push({
          relationshipId: rel.id,
          side: 'reverse',
          base: camelCase(pluralWords(entityWords(rel.sourceTable))),
          suffix: rel.selfReferential
            ? `By${pascalCase(strippedColumnWords(junction.sourceColumns))}`
            : `Via${pascalCase(splitWords(junction.table))}`,
          forceSuffix: rel.selfReferential,
          origin: `${describeRelationship(rel)} (reverse)`,
        });
      }
    }
    claimAccessors(tableName, manyClaims, taken, forward, reverse);

    // Reverse accessors on the target side
    const reverseClaims = resolution.relationships
      .filter((rel) => rel.kind !== 'many-to-many' && rel.targetTable === tableName)
      .map((rel): AccessorClaim => {
        const sourceWords = entityWords(rel.sourceTable);
        return {
          relationshipId: rel.id,
          side: 'reverse',
          base: camelCase(rel.kind === 'one-to-one' ? singularWords(sourceWords) : pluralWords(sourceWords)),
          suffix: `By${pascalCase(strippedColumnWords(rel.owningColumns))}`,
          forceSuffix: rel.selfReferential,
          origin: `${describeRelationship(rel)} (reverse)`,
        };
      });
    claimAccessors(tableName, reverseClaims, taken, forward, reverse);

    assignment.set(tableName, {
      entityName: identity.entityName,
      fileName: identity.fileName,
      routePath: identity.routePath,
      fields,
      forwardAccessors: forward,
      reverseAccessors: reverse,
    });
  }

  return deepFreeze(assignment);
}
