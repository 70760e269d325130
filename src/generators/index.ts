/**
 * Artifact generators
 *
 * Registry of every generator by artifact kind, and the context builder
 * that turns configuration into the read-only inputs they share.
 *
 * @module generators
 */

import type { ArtifactKind, ResolvedModel } from '../contracts/types.js';
import type { GeneratorConfig } from '../config/schema.js';
import { adminGenerator } from './admin.js';
import { entitiesGenerator } from './entities.js';
import { handlersGenerator } from './handlers.js';
import { openApiGenerator } from './openapi.js';
import { routesGenerator } from './routes.js';
import { testScaffoldGenerator } from './test-scaffold.js';
import { transformersGenerator } from './transformers.js';
import type { ArtifactGenerator, GeneratorContext } from './types.js';

export const GENERATORS: Readonly<Record<ArtifactKind, ArtifactGenerator>> = {
  entities: entitiesGenerator,
  transformers: transformersGenerator,
  handlers: handlersGenerator,
  routes: routesGenerator,
  admin: adminGenerator,
  openapi: openApiGenerator,
  tests: testScaffoldGenerator,
};

/**
 * Build the shared generator context. The API title falls back to
 * "<project_name> API".
 */
export function buildGeneratorContext(model: ResolvedModel, config: GeneratorConfig): GeneratorContext {
  const { api } = config;
  return {
    model,
    relationStyle: config.relation_style,
    projectName: config.project_name,
    appName: config.app_name,
    api: {
      title: api.title ?? `${config.project_name} API`,
      version: api.version,
      ...(api.description !== undefined ? { description: api.description } : {}),
      ...(api.server_url !== undefined ? { serverUrl: api.server_url } : {}),
    },
  };
}

export { renderUnit, TypeScriptRenderer, DocumentRenderer } from './renderer.js';
export { buildOpenApiDocument } from './openapi.js';
export type { ArtifactGenerator, GeneratorContext, ApiMetadata } from './types.js';
export type { OutputUnit, ModuleUnit, DocumentUnit } from './code-model.js';
