/**
 * Dependency Orderer
 *
 * Topologically sorts entities so that every referenced entity precedes the
 * entities referencing it. Uses Kahn's algorithm with a name-ordered ready
 * set; when no entity is ready the remaining graph holds a cycle, and the
 * cycle edge resolved latest (highest priority number) is deferred.
 *
 * @module pipeline/dependency-order
 */

import type { DependencyOrder, RelationshipInfo } from '../contracts/types.js';
import { ERROR_CODES } from '../contracts/errors.js';
import type { Diagnostics } from '../utils/diagnostics.js';
import { compareStrings, deepFreeze } from '../utils/collections.js';

/**
 * Order entity tables. Self-referential and many-to-many relationships
 * impose no ordering.
 */
export function orderDependencies(
  tables: readonly string[],
  relationships: readonly RelationshipInfo[],
  diagnostics: Diagnostics
): DependencyOrder {
  const nodes = [...tables].sort(compareStrings);
  const known = new Set(nodes);

  // Outgoing edges not yet satisfied, per referencing table
  const pending = new Map<string, Map<string, RelationshipInfo>>();
  // Edges pointing at each referenced table
  const dependents = new Map<string, RelationshipInfo[]>();
  for (const node of nodes) {
    pending.set(node, new Map());
    dependents.set(node, []);
  }

  for (const rel of relationships) {
    if (rel.kind === 'many-to-many' || rel.selfReferential) continue;
    if (!known.has(rel.sourceTable) || !known.has(rel.targetTable)) continue;
    pending.get(rel.sourceTable)?.set(rel.id, rel);
    dependents.get(rel.targetTable)?.push(rel);
  }

  const order: string[] = [];
  const emitted = new Set<string>();
  const deferred = new Set<string>();

  while (order.length < nodes.length) {
    const next = nodes.find((node) => !emitted.has(node) && pending.get(node)?.size === 0);

    if (next !== undefined) {
      order.push(next);
      emitted.add(next);
      for (const rel of dependents.get(next) ?? []) {
        pending.get(rel.sourceTable)?.delete(rel.id);
      }
      continue;
    }

    // No node is ready: break one cycle
    const remaining = nodes.filter((node) => !emitted.has(node));
    const cycle = findCycle(remaining, pending);
    const candidates: RelationshipInfo[] = [];
    for (let i = 0; i < cycle.length - 1; i++) {
      for (const rel of pending.get(cycle[i])?.values() ?? []) {
        if (rel.targetTable === cycle[i + 1]) candidates.push(rel);
      }
    }
    const victim = candidates.reduce((latest, rel) => (rel.priority > latest.priority ? rel : latest));

    deferred.add(victim.id);
    pending.get(victim.sourceTable)?.delete(victim.id);
    diagnostics.warn(
      ERROR_CODES.CYCLE_DEFERRED,
      `Dependency cycle ${cycle.join(' -> ')} broken by deferring ${victim.sourceTable}(${victim.owningColumns.join(', ')}) -> ${victim.targetTable}; the reference is generated as nullable`,
      { cycle, relationship: victim.id }
    );
  }

  return deepFreeze({ order, deferred });
}

/**
 * Find a cycle among the remaining nodes. Every remaining node has at least
 * one pending edge to another remaining node, so a cycle always exists.
 */
function findCycle(remaining: readonly string[], pending: ReadonlyMap<string, ReadonlyMap<string, RelationshipInfo>>): string[] {
  const visited = new Set<string>();
  const path: string[] = [];

  const neighbours = (id: string): string[] =>
    [...new Set([...(pending.get(id)?.values() ?? [])].map((rel) => rel.targetTable))].sort(compareStrings);

  function dfs(id: string): string[] | null {
    if (path.includes(id)) {
      const cycleStart = path.indexOf(id);
      return [...path.slice(cycleStart), id];
    }
    if (visited.has(id)) return null;

    visited.add(id);
    path.push(id);

    for (const neighbor of neighbours(id)) {
      const cycle = dfs(neighbor);
      if (cycle) return cycle;
    }

    path.pop();
    return null;
  }

  for (const node of remaining) {
    const cycle = dfs(node);
    if (cycle) return cycle;
  }

  throw new Error(`No cycle found among ${remaining.join(', ')}`);
}
