/**
 * Hash Utilities
 *
 * Content hashes for the generation manifest and schema change detection.
 *
 * @module utils/hash
 */

import { createHash } from 'crypto';
import type { ContentHash, SchemaSnapshot } from '../contracts/types.js';
import { byName } from './collections.js';

/**
 * Compute SHA-256 hash of content.
 * Returns a 64-character hex string.
 */
export function computeHash(content: string | Buffer): ContentHash {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Compute deterministic schema hash for change detection.
 * Tables, columns and constraints are sorted so snapshot order does not matter.
 */
export function computeSchemaHash(snapshot: SchemaSnapshot): ContentHash {
  const hashInput = [...snapshot.tables].sort(byName).map((table) => ({
    name: table.name,
    columns: [...table.columns]
      .sort(byName)
      .map((col) => `${col.name}:${col.nativeType}:${col.nullable}:${col.default ?? ''}`),
    constraints: [...table.constraints]
      .sort(byName)
      .map((c) => `${c.kind}:${c.columns.join(',')}->${c.referencedTable ?? ''}`),
  }));

  return computeHash(JSON.stringify(hashInput));
}
