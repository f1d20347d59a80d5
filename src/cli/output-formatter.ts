/**
 * CLI Output Formatter
 *
 * Presentation layer: styles CliOutput with chalk and reports a CliResult.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`✗ ${output.message}`) : chalk.green(`✓ ${output.message}`));

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('Pending:'));
    output.warnings.forEach((warning) => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('Next:'));
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  return formatOutput(result.output, result.kind === 'failure');
}

/**
 * Print the result; a failure then ends the process with its status.
 * A success returns so pending writes can flush.
 */
export function reportResult(result: CliResult, terminator: ProcessTerminator): void {
  const formatted = formatResult(result);
  if (result.kind === 'success') {
    console.log(formatted);
    return;
  }
  console.error(formatted);
  terminator.terminate(result.status);
}

/**
 * Progress line emitted by a running step (e.g. a toss result).
 */
export function formatStepLine(line: string): string {
  return chalk.blue(line);
}
