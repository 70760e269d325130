/**
 * Configuration Management
 *
 * Loads tablewright.yaml, substitutes environment variables, validates it and
 * resolves relative paths against the config file's directory.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { logger } from './logger.js';
import { parseGeneratorConfig } from '../config/schema.js';
import type { GeneratorConfig } from '../config/schema.js';
import { ConfigurationError, ERROR_CODES } from '../contracts/errors.js';

export type ResolvedSource =
  | { type: 'postgres'; connectionString: string; schema: string }
  | { type: 'sqlite'; path: string }
  | { type: 'snapshot'; path: string };

export interface ResolvedConfig {
  config: GeneratorConfig;
  configPath: string;
  /** Absolute output root */
  outputDir: string;
  source: ResolvedSource;
}

/**
 * Load, validate and resolve the generator config.
 *
 * @throws ConfigurationError CONFIG_NOT_FOUND / CONFIG_INVALID
 */
export async function loadGeneratorConfig(configPath: string): Promise<ResolvedConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      ERROR_CODES.CONFIG_NOT_FOUND,
      `Config file not found: ${absolutePath}`,
      { configPath: absolutePath, originalError: error instanceof Error ? error.message : String(error) }
    );
  }

  let config: GeneratorConfig;
  try {
    config = parseGeneratorConfig(parseYaml(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(ERROR_CODES.CONFIG_INVALID, message, { configPath: absolutePath });
  }

  const configDir = path.dirname(absolutePath);
  logger.debug('Loaded generator config', { configPath: absolutePath, source: config.source.type });

  return {
    config,
    configPath: absolutePath,
    outputDir: path.resolve(configDir, config.output_dir),
    source: resolveSource(config, configDir),
  };
}

/**
 * Resolve the source block to a connection string or an absolute file path
 */
export function resolveSource(config: GeneratorConfig, configDir: string): ResolvedSource {
  const source = config.source;

  if (source.type === 'postgres') {
    let connectionString: string | undefined;
    if (source.connection_string_env) {
      connectionString = process.env[source.connection_string_env];
      if (!connectionString) {
        throw new ConfigurationError(
          ERROR_CODES.CONFIG_INVALID,
          `Environment variable ${source.connection_string_env} not found for postgres source`,
          { env: source.connection_string_env }
        );
      }
    } else {
      connectionString = source.connection_string;
    }
    if (!connectionString) {
      throw new ConfigurationError(ERROR_CODES.CONFIG_INVALID, 'No connection configuration found for postgres source');
    }
    return { type: 'postgres', connectionString, schema: source.schema };
  }

  if (!source.path) {
    throw new ConfigurationError(ERROR_CODES.CONFIG_INVALID, `${source.type} source requires path`);
  }
  return { type: source.type, path: path.resolve(configDir, source.path) };
}

/**
 * Substitute environment variables in a string.
 * Supports ${VAR_NAME} syntax.
 */
export function substituteEnvVars(content: string): string {
  return content.replace(/\$\{([^}]+)\}/g, (match: string, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      logger.warn(`Environment variable ${varName} is not set`);
      return match; // Keep original if not set
    }
    return value;
  });
}

/**
 * Parse YAML content with environment variable substitution
 */
function parseYaml(content: string): unknown {
  try {
    return yaml.load(substituteEnvVars(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse YAML: ${message}`);
  }
}
