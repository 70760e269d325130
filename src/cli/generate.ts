/**
 * Generate CLI Command
 *
 * Introspects the configured source, resolves the model and writes every
 * configured artifact kind under the output directory.
 * Usage: tablewright generate --config tablewright.yaml
 *
 * @module cli/generate
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ARTIFACT_KINDS } from '../contracts/types.js';
import type { ArtifactKind, SchemaSnapshot } from '../contracts/types.js';
import { ERROR_CODES, isGeneratorError, toGeneratorError } from '../contracts/errors.js';
import { getSchemaIntrospector, readSchemaSnapshot } from '../connectors/index.js';
import { buildGeneratorContext, GENERATORS, renderUnit } from '../generators/index.js';
import { runPipeline } from '../pipeline/index.js';
import type { PipelineOptions } from '../pipeline/index.js';
import type { GeneratorConfig } from '../config/schema.js';
import { loadGeneratorConfig } from '../utils/config.js';
import type { ResolvedConfig } from '../utils/config.js';
import { compareStrings } from '../utils/collections.js';
import { FileWriter } from '../utils/file-writer.js';
import { computeHash, computeSchemaHash } from '../utils/hash.js';
import { logger } from '../utils/logger.js';
import { formatFatal, printReport } from './report.js';
import type { ArtifactOutcome, GenerationSummary } from './report.js';

export const MANIFEST_FILE = '.tablewright-manifest.json';

interface RenderedFile {
  path: string;
  content: string;
}

interface RenderedArtifact {
  kind: ArtifactKind;
  files: RenderedFile[];
}

/**
 * Relative path → SHA-256 of every written file, plus the schema hash.
 * Holds no timestamps so that regenerating an unchanged schema is a no-op.
 */
export interface GenerationManifest {
  schemaHash: string;
  files: Record<string, string>;
}

export interface GenerationResult {
  summary: GenerationSummary;
  manifest: GenerationManifest;
  /** True when any artifact failed to write */
  failed: boolean;
}

// =============================================================================
// GENERATION
// =============================================================================

export function pipelineOptions(config: GeneratorConfig): PipelineOptions {
  return {
    filters: { include: config.include_tables, exclude: config.exclude_tables },
    housekeepingColumns: config.junction_housekeeping_columns,
  };
}

/**
 * Resolve the snapshot and write every configured artifact. Artifacts are
 * written concurrently; a failed artifact is reported without stopping the
 * others.
 *
 * @throws GeneratorError when resolution fails or the manifest cannot be written
 */
export async function generateFromSnapshot(resolved: ResolvedConfig, snapshot: SchemaSnapshot): Promise<GenerationResult> {
  const { config, outputDir } = resolved;
  const { model, warnings } = runPipeline(snapshot, pipelineOptions(config));

  const context = buildGeneratorContext(model, config);
  const kinds = ARTIFACT_KINDS.filter((kind) => config.artifacts.includes(kind));
  const rendered: RenderedArtifact[] = kinds.map((kind) => ({
    kind,
    files: GENERATORS[kind].generate(context).map((unit) => ({ path: unit.path, content: renderUnit(unit) })),
  }));

  logger.info('Writing artifacts', { outputDir, kinds, entities: model.entities.length });
  const settled = await Promise.allSettled(rendered.map((artifact) => writeArtifact(outputDir, artifact)));

  const artifacts: ArtifactOutcome[] = [];
  const files: Record<string, string> = {};
  settled.forEach((result, index) => {
    const artifact = rendered[index];
    const outcome: ArtifactOutcome = { kind: artifact.kind, files: artifact.files.map((file) => file.path) };
    if (result.status === 'rejected') {
      outcome.error = toGeneratorError(result.reason, ERROR_CODES.OUTPUT_WRITE_FAILED);
    } else {
      for (const file of artifact.files) files[file.path] = computeHash(file.content);
    }
    artifacts.push(outcome);
  });

  const manifest: GenerationManifest = {
    schemaHash: computeSchemaHash(snapshot),
    files: Object.fromEntries(Object.entries(files).sort(([a], [b]) => compareStrings(a, b))),
  };
  await FileWriter.writeFileAtomic(
    FileWriter.resolveInside(outputDir, MANIFEST_FILE),
    `${JSON.stringify(manifest, null, 2)}\n`
  );

  return {
    summary: { outputDir, entities: model.entities.length, artifacts, warnings },
    manifest,
    failed: artifacts.some((artifact) => artifact.error !== undefined),
  };
}

async function writeArtifact(outputDir: string, artifact: RenderedArtifact): Promise<void> {
  await Promise.all(
    artifact.files.map((file) => FileWriter.writeFileAtomic(FileWriter.resolveInside(outputDir, file.path), file.content))
  );
  logger.debug('Artifact written', { kind: artifact.kind, files: artifact.files.length });
}

/**
 * Full run: load config, introspect, generate, report.
 *
 * @returns process exit code
 */
export async function runGenerate(configPath: string): Promise<number> {
  try {
    const resolved = await loadGeneratorConfig(configPath);
    const snapshot = await readSchemaSnapshot(getSchemaIntrospector(resolved.source));
    const result = await generateFromSnapshot(resolved, snapshot);
    printReport(result.summary);
    return result.failed ? 1 : 0;
  } catch (error) {
    if (!isGeneratorError(error)) throw error;
    logger.error('Generation failed', error);
    console.error(formatFatal(error));
    return 1;
  }
}

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Introspect the schema and write the generated service')
    .requiredOption('--config <path>', 'Path to tablewright.yaml config file')
    .action(async (options: { config: string }) => {
      const startTime = Date.now();
      const exitCode = await runGenerate(options.config);
      console.log(chalk.dim(`Completed in ${((Date.now() - startTime) / 1000).toFixed(1)}s`));
      process.exitCode = exitCode;
    });
}
