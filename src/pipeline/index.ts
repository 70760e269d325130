/**
 * Resolution pipeline
 *
 * Snapshot → Schema Model → {relationships, types} → names → order → model.
 * Every stage is synchronous and returns a new frozen structure.
 *
 * @module pipeline
 */

import type { GenerationWarning, ResolvedModel, SchemaSnapshot } from '../contracts/types.js';
import { Diagnostics } from '../utils/diagnostics.js';
import { logger } from '../utils/logger.js';
import { buildSchemaModel } from './schema-model.js';
import type { TableFilters } from './schema-model.js';
import { resolveRelationships } from './relationships.js';
import { mapTypes } from './type-mapper.js';
import { resolveNames } from './naming.js';
import { orderDependencies } from './dependency-order.js';
import { assembleModel } from './entity-model.js';

export interface PipelineOptions {
  filters?: TableFilters;
  housekeepingColumns?: readonly string[];
}

export interface PipelineResult {
  model: ResolvedModel;
  warnings: readonly GenerationWarning[];
}

/**
 * Resolve a snapshot into the model the generators consume. Fatal problems
 * throw a GeneratorError subclass; recoverable ones are returned as warnings.
 */
export function runPipeline(snapshot: SchemaSnapshot, options: PipelineOptions = {}, diagnostics = new Diagnostics()): PipelineResult {
  const schema = buildSchemaModel(snapshot, options.filters ?? {}, diagnostics);
  logger.debug('Schema model built', { tables: schema.tables.size });

  const resolution = resolveRelationships(schema, { housekeepingColumns: options.housekeepingColumns }, diagnostics);
  const types = mapTypes(schema, diagnostics);
  logger.debug('Relationships resolved', {
    relationships: resolution.relationships.length,
    junctions: [...resolution.junctionTables],
  });

  const names = resolveNames(schema, resolution);
  const order = orderDependencies([...names.keys()], resolution.relationships, diagnostics);
  logger.debug('Dependency order computed', { order: order.order, deferred: [...order.deferred] });

  const model = assembleModel({ schema, resolution, types, names, order });
  return { model, warnings: diagnostics.warnings };
}

export { buildSchemaModel, uniqueKeysOf } from './schema-model.js';
export type { TableFilters } from './schema-model.js';
export { resolveRelationships } from './relationships.js';
export { mapTypes, mapNativeType, canonicalNativeType, nativeTypesForKind, knownNativeTypes } from './type-mapper.js';
export { resolveNames } from './naming.js';
export { orderDependencies } from './dependency-order.js';
export { assembleModel } from './entity-model.js';
