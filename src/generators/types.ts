/**
 * Type definitions for artifact generators
 *
 * Every generator is a pure function from the resolved model and a context
 * to output units. Generators never see each other's output.
 */

import type { ArtifactKind, RelationStyle, ResolvedModel } from '../contracts/types.js';
import type { OutputUnit } from './code-model.js';

/**
 * API description metadata passed through from configuration
 */
export interface ApiMetadata {
  /** Document title */
  title: string;
  version: string;
  description?: string;
  /** Base server URL */
  serverUrl?: string;
}

/**
 * Read-only inputs shared by every generator
 */
export interface GeneratorContext {
  /** Frozen output of the resolution pipeline */
  model: ResolvedModel;
  /** How relationship fields are rendered */
  relationStyle: RelationStyle;
  /** Name of the generated project */
  projectName: string;
  /** Name of the generated application, used in route prefixes and titles */
  appName: string;
  api: ApiMetadata;
}

/**
 * Generator for one artifact kind
 */
export interface ArtifactGenerator {
  readonly kind: ArtifactKind;
  generate(context: GeneratorContext): OutputUnit[];
}

/** First line(s) of every generated TypeScript module */
export const GENERATED_HEADER = 'Generated by tablewright. Do not edit by hand.';
