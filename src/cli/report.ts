/**
 * Run Report
 *
 * Human-readable end-of-run output: files written per artifact kind,
 * failed artifacts, and every collected warning grouped by code.
 *
 * @module cli/report
 */

import chalk from 'chalk';
import type { ArtifactKind, GenerationWarning } from '../contracts/types.js';
import type { GeneratorError } from '../contracts/errors.js';
import { compareStrings } from '../utils/collections.js';

export interface ArtifactOutcome {
  kind: ArtifactKind;
  /** Relative paths, in generation order */
  files: string[];
  /** Set when at least one file of this artifact failed to write */
  error?: GeneratorError;
}

export interface GenerationSummary {
  outputDir: string;
  entities: number;
  artifacts: ArtifactOutcome[];
  warnings: readonly GenerationWarning[];
}

/** Report lines, colorized with the current chalk level */
export function formatReport(summary: GenerationSummary): string[] {
  const lines: string[] = [];
  lines.push(chalk.bold('=== Generation Report ==='));
  lines.push(`  Output:    ${summary.outputDir}`);
  lines.push(`  Entities:  ${summary.entities}`);
  lines.push('');

  for (const artifact of summary.artifacts) {
    if (artifact.error) {
      lines.push(`  ${chalk.red('✗')} ${artifact.kind}: ${artifact.error.message}`);
    } else {
      const noun = artifact.files.length === 1 ? 'file' : 'files';
      lines.push(`  ${chalk.green('✓')} ${artifact.kind}: ${artifact.files.length} ${noun}`);
    }
  }

  if (summary.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow(`Warnings (${summary.warnings.length}):`));
    for (const [code, warnings] of groupByCode(summary.warnings)) {
      lines.push(`  ${chalk.yellow('⚠')} ${code}`);
      for (const warning of warnings) {
        lines.push(`    - ${warning.message}`);
      }
    }
  }

  return lines;
}

export function printReport(summary: GenerationSummary, write: (line: string) => void = (line) => console.log(line)): void {
  for (const line of formatReport(summary)) write(line);
}

/** One line for an error that stopped the run */
export function formatFatal(error: GeneratorError): string {
  return chalk.red(`✗ ${error.code}: ${error.message}`);
}

function groupByCode(warnings: readonly GenerationWarning[]): [string, GenerationWarning[]][] {
  const groups = new Map<string, GenerationWarning[]>();
  for (const warning of warnings) {
    const group = groups.get(warning.code);
    if (group) group.push(warning);
    else groups.set(warning.code, [warning]);
  }
  return [...groups.entries()].sort(([a], [b]) => compareStrings(a, b));
}
