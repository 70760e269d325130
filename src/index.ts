#!/usr/bin/env node

/**
 * Tablewright
 *
 * Main entry point. Introspects a relational schema and generates a typed
 * CRUD service from it: entities, transformers, handlers, routes, admin
 * descriptors, an OpenAPI document and test scaffolds.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from './utils/logger.js';
import { createGenerateCommand } from './cli/generate.js';
import { createInspectCommand } from './cli/inspect.js';

const program = new Command();

program
  .name('tablewright')
  .description('Generate a typed CRUD service from an existing relational schema')
  .version('0.1.0')
  .option('--verbose', 'Enable debug logging')
  .option('--no-color', 'Disable colored output')
  .hook('preAction', (command) => {
    const options = command.opts<{ verbose?: boolean; color: boolean }>();
    if (options.verbose) logger.setLevel('debug');
    if (!options.color) chalk.level = 0;
  });

program.addCommand(createGenerateCommand());
program.addCommand(createInspectCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed', error);
  process.exit(1);
});
