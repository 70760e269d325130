/**
 * Integration tests for generation into an output directory
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createGenerateCommand, generateFromSnapshot, MANIFEST_FILE } from '../../src/cli/generate.js';
import { createInspectCommand } from '../../src/cli/inspect.js';
import { parseGeneratorConfig } from '../../src/config/schema.js';
import type { GeneratorConfigInput } from '../../src/config/schema.js';
import type { ResolvedConfig } from '../../src/utils/config.js';
import { computeHash, computeSchemaHash } from '../../src/utils/hash.js';
import { blogSnapshot } from '../fixtures.js';

describe('generateFromSnapshot', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tablewright-generate-'));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  function resolvedConfig(overrides: Partial<GeneratorConfigInput> = {}): ResolvedConfig {
    const source = { type: 'snapshot' as const, path: path.join(outputDir, 'schema.yaml') };
    return {
      config: parseGeneratorConfig({ source, ...overrides }),
      configPath: path.join(outputDir, 'tablewright.yaml'),
      outputDir,
      source,
    };
  }

  it('writes every artifact and a manifest of their hashes', async () => {
    const result = await generateFromSnapshot(resolvedConfig(), blogSnapshot());

    expect(result.failed).toBe(false);
    expect(result.summary.entities).toBe(3);
    expect(result.summary.artifacts.map((artifact) => artifact.kind)).toEqual([
      'entities', 'transformers', 'handlers', 'routes', 'admin', 'openapi', 'tests',
    ]);

    const post = await fs.readFile(path.join(outputDir, 'src/entities/post.ts'), 'utf8');
    expect(result.manifest.files['src/entities/post.ts']).toBe(computeHash(post));
    expect(result.manifest.schemaHash).toBe(computeSchemaHash(blogSnapshot()));

    const written: unknown = JSON.parse(await fs.readFile(path.join(outputDir, MANIFEST_FILE), 'utf8'));
    expect(written).toEqual(result.manifest);
    expect(Object.keys(result.manifest.files)).toEqual(
      result.summary.artifacts.flatMap((artifact) => artifact.files).sort()
    );
  });

  it('writes only the configured artifact kinds', async () => {
    const result = await generateFromSnapshot(resolvedConfig({ artifacts: ['routes', 'openapi'] }), blogSnapshot());

    expect(Object.keys(result.manifest.files)).toEqual(['openapi.yaml', 'src/routes.ts']);
    expect((await fs.readdir(outputDir)).sort()).toEqual([MANIFEST_FILE, 'openapi.yaml', 'src']);
  });

  it('produces an identical manifest when regenerating', async () => {
    const first = await generateFromSnapshot(resolvedConfig(), blogSnapshot());
    const second = await generateFromSnapshot(resolvedConfig(), blogSnapshot());
    expect(second.manifest).toEqual(first.manifest);
  });

  it('reports a failed artifact without stopping the others', async () => {
    await fs.mkdir(path.join(outputDir, 'openapi.yaml'));

    const result = await generateFromSnapshot(resolvedConfig({ artifacts: ['routes', 'openapi'] }), blogSnapshot());

    expect(result.failed).toBe(true);
    expect(result.summary.artifacts.map((artifact) => [artifact.kind, artifact.error?.code ?? null])).toEqual([
      ['routes', null],
      ['openapi', 'OUTPUT_WRITE_FAILED'],
    ]);
    expect(Object.keys(result.manifest.files)).toEqual(['src/routes.ts']);
  });
});

describe('command options', () => {
  it.each([
    ['generate', createGenerateCommand],
    ['inspect', createInspectCommand],
  ])('%s requires a config path', async (_name, create) => {
    const command = create().exitOverride().configureOutput({ writeErr: () => undefined });

    await expect(command.parseAsync([], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
  });
});
