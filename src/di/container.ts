import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { NodeRandomEntropy } from '../infra/local/random-entropy/index.js';

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
  /** Path of the running program; drives the default checkpoint location. */
  readonly programPath?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  // Tests may inject a config before initialization; never overwrite it.
  if (!container.isRegistered(DI.Config.App)) {
    const configResult = loadConfig({
      env: options.env ?? process.env,
      programPath: options.programPath ?? process.argv[1] ?? process.execPath,
    });
    if (configResult.isErr()) return err(configResult.error);

    container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  }

  const config = container.resolve<ValidatedConfig>(DI.Config.App);
  container.register(DI.Config.LogLevel, { useValue: config.logging.level });
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but must not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });

  // Tests override these with in-memory fakes, so only register when missing.
  if (!container.isRegistered(DI.Infra.FileSystem)) {
    container.register<FileSystemPort>(DI.Infra.FileSystem, { useValue: new NodeFileSystem() });
  }
  if (!container.isRegistered(DI.Infra.RandomEntropy)) {
    container.register<RandomEntropyPort>(DI.Infra.RandomEntropy, { useValue: new NodeRandomEntropy() });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wire the container. Idempotent; an invalid environment is returned as data.
 */
export function initializeContainer(
  options: ContainerInitOptions = {}
): Result<DependencyContainer, ConfigInvalidError> {
  if (initialized) return ok(container);

  const configured = registerConfig(options);
  if (configured.isErr()) return err(configured.error);

  registerRuntime(options);
  registerServices();

  initialized = true;
  return ok(container);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
