// Engine
export * from './durable-core/index.js';

// Ports
export type { CheckpointStorePort, CheckpointStoreError } from './ports/checkpoint-store.port.js';
export type { FileSystemPort, FsError } from './ports/fs.port.js';
export type { RandomEntropyPort } from './ports/random-entropy.port.js';

// Local adapters
export { JsonFileCheckpointStore } from './infra/local/json-checkpoint-store/index.js';
export { NodeFileSystem } from './infra/local/fs/index.js';
export { NodeRandomEntropy } from './infra/local/random-entropy/index.js';
export type {
  CheckpointPath,
  CheckpointPathSource,
  ResolvedCheckpointPath,
} from './infra/local/checkpoint-location/index.js';
export {
  asCheckpointPath,
  currentProgramPath,
  deriveDefaultCheckpointPath,
  describeCheckpointSource,
} from './infra/local/checkpoint-location/index.js';

// Example machine
export * from './machines/coin-toss/index.js';

// Configuration and wiring
export type { AppConfig, ValidatedConfig, LoadConfigOptions } from './config/app-config.js';
export { loadConfig } from './config/app-config.js';
export { initializeContainer, resetContainer, container } from './di/container.js';
export { DI } from './di/tokens.js';

// Logging
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
export { PinoLoggerFactory, createBootstrapLogger } from './core/logging/index.js';
