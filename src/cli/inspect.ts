/**
 * Inspect CLI Command
 *
 * Runs introspection and resolution without writing anything, then prints
 * the resolved model: entities in dependency order, their fields and
 * relations, junction tables and deferred relationships.
 *
 * @module cli/inspect
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { EntityRelation, GenerationWarning, ResolvedModel } from '../contracts/types.js';
import { isGeneratorError } from '../contracts/errors.js';
import { getSchemaIntrospector, readSchemaSnapshot } from '../connectors/index.js';
import { runPipeline } from '../pipeline/index.js';
import type { PipelineResult } from '../pipeline/index.js';
import { loadGeneratorConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { pipelineOptions } from './generate.js';
import { formatFatal } from './report.js';

function describeRelation(relation: EntityRelation): string {
  const arrow = relation.direction === 'forward' ? '→' : '←';
  const flags = [
    relation.kind,
    relation.nullable ? 'nullable' : null,
    relation.deferred ? 'deferred' : null,
    relation.junction ? `via ${relation.junction.table}` : null,
  ].filter((flag): flag is string => flag !== null);
  return `${relation.accessor} ${arrow} ${relation.targetEntity} (${flags.join(', ')})`;
}

/** Summary lines of a resolved model */
export function formatModelSummary(model: ResolvedModel, warnings: readonly GenerationWarning[]): string[] {
  const lines: string[] = [chalk.bold('=== Resolved Model ===')];
  lines.push(`  Entities:       ${model.entities.length}`);
  lines.push(`  Relationships:  ${model.relationships.length}`);
  lines.push(`  Junctions:      ${model.junctionTables.length > 0 ? model.junctionTables.join(', ') : '-'}`);
  lines.push(`  Deferred:       ${model.deferred.length > 0 ? model.deferred.join(', ') : '-'}`);

  model.entities.forEach((entity, index) => {
    lines.push('');
    lines.push(`  ${index + 1}. ${chalk.cyan(entity.name)} (${entity.table}) ${chalk.dim(entity.routePath)}`);
    lines.push(`     key: ${entity.primaryKey.join(', ')}`);
    lines.push(`     fields: ${entity.fields.map((field) => `${field.name}: ${field.spec.kind}${field.nullable ? '?' : ''}`).join(', ')}`);
    for (const relation of entity.relations) {
      lines.push(`     ${describeRelation(relation)}`);
    }
  });

  if (warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow(`Warnings (${warnings.length}):`));
    for (const warning of warnings) lines.push(`  ${chalk.yellow('⚠')} ${warning.code}: ${warning.message}`);
  }
  return lines;
}

/**
 * Load, introspect and resolve without writing output.
 */
export async function inspectSchema(configPath: string): Promise<PipelineResult> {
  const resolved = await loadGeneratorConfig(configPath);
  const snapshot = await readSchemaSnapshot(getSchemaIntrospector(resolved.source));
  return runPipeline(snapshot, pipelineOptions(resolved.config));
}

/**
 * Create the inspect command.
 */
export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Resolve the schema and print the model without writing files')
    .requiredOption('--config <path>', 'Path to tablewright.yaml config file')
    .option('--json', 'Print the resolved model as JSON')
    .action(async (options: { config: string; json?: boolean }) => {
      try {
        const { model, warnings } = await inspectSchema(options.config);
        if (options.json) {
          console.log(JSON.stringify({ model, warnings }, null, 2));
        } else {
          for (const line of formatModelSummary(model, warnings)) console.log(line);
        }
      } catch (error) {
        if (!isGeneratorError(error)) throw error;
        logger.error('Inspection failed', error);
        console.error(formatFatal(error));
        process.exitCode = 1;
      }
    });
}
