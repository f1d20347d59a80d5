#!/usr/bin/env node
/**
 * resumable CLI - Composition Root
 *
 * Wires dependencies for each command and reports the CliResult, ending the
 * process with its exit status. No business logic lives here; commands are in
 * src/cli/commands/*.ts.
 */

import 'reflect-metadata';
import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';

import { initializeContainer } from './di/container.js';
import { DI } from './di/tokens.js';
import type { DependencyContainer } from 'tsyringe';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import type { ValidatedConfig } from './config/app-config.js';
import { formatAppError } from './errors/formatter.js';
import { Err } from './errors/factories.js';
import type { ResolvedCheckpointPath } from './infra/local/checkpoint-location/index.js';
import { asCheckpointPath, currentProgramPath } from './infra/local/checkpoint-location/index.js';
import { createCoinTossRuntime } from './cli/coin-toss-runtime.js';
import { failure } from './cli/types/cli-result.js';
import { formatOutput, formatStepLine, reportResult } from './cli/output-formatter.js';
import { executeRunCommand, executeStatusCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// BOOTSTRAP
// ═══════════════════════════════════════════════════════════════════════════

loadDotenv();

function bootContainer(): DependencyContainer {
  const result = initializeContainer({
    runtimeMode: { kind: 'cli' },
    env: process.env,
    programPath: currentProgramPath(process.argv, process.execPath),
  });

  if (result.isErr()) {
    // No container yet, so no injected terminator.
    console.error(formatOutput({ message: formatAppError(result.error) }, true));
    return new NodeProcessTerminator().terminate(2);
  }

  return result.value;
}

function resolveCheckpointPath(c: DependencyContainer, override: string | undefined): ResolvedCheckpointPath {
  if (override !== undefined) return { path: asCheckpointPath(override), source: { kind: 'option' } };
  return c.resolve<ValidatedConfig>(DI.Config.App).checkpoint;
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('resumable')
  .description('Run step machines that resume at the failed step after a crash')
  .version('0.1.0');

program
  .command('coin')
  .description('Toss two coins that must land on the same side; resumes at the second toss after a mismatch')
  .option('-c, --checkpoint <path>', 'Checkpoint file (default: RESUMABLE_CHECKPOINT_PATH or <program>.json)')
  .option('-d, --drop-error', 'Acknowledge the previous failure and retry the failed step')
  .action(async (options: { checkpoint?: string; dropError?: boolean }) => {
    const c = bootContainer();
    const terminator = c.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    const checkpoint = resolveCheckpointPath(c, options.checkpoint);

    const runtime = createCoinTossRuntime(c, checkpoint.path, (line) => console.log(formatStepLine(line)));

    const result = await executeRunCommand(
      { engine: runtime.engine, location: runtime.store.location, completedMessage: 'Coins match' },
      { dropError: options.dropError }
    );

    reportResult(result, terminator);
  });

program
  .command('status')
  .description('Show where the coin-toss machine stands without running it')
  .option('-c, --checkpoint <path>', 'Checkpoint file (default: RESUMABLE_CHECKPOINT_PATH or <program>.json)')
  .action(async (options: { checkpoint?: string }) => {
    const c = bootContainer();
    const terminator = c.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    const checkpoint = resolveCheckpointPath(c, options.checkpoint);

    const runtime = createCoinTossRuntime(c, checkpoint.path, () => undefined);

    const result = await executeStatusCommand({
      location: runtime.store.location,
      source: checkpoint.source,
      load: () => runtime.store.load(),
      describe: (state) => runtime.machine.describe(state),
    });

    reportResult(result, terminator);
  });

try {
  await program.parseAsync(process.argv);
} catch (e) {
  reportResult(failure({ message: formatAppError(Err.unexpected('Command crashed', e)) }), new NodeProcessTerminator());
}
