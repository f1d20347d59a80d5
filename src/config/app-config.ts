/**
 * Application configuration - parse, don't validate.
 *
 * - Zod validates the environment at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';
import { LOG_LEVELS } from '../core/logging/types.js';
import type { ResolvedCheckpointPath } from '../infra/local/checkpoint-location/index.js';
import { asCheckpointPath, deriveDefaultCheckpointPath } from '../infra/local/checkpoint-location/index.js';

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  /** Checkpoint location before any `--checkpoint` override; `status` reports its source. */
  readonly checkpoint: ResolvedCheckpointPath;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  /** Path of the running program; the default checkpoint location derives from it. */
  readonly programPath: string;
}

// =============================================================================
// Schema
// =============================================================================

const EnvSchema = z.object({
  RESUMABLE_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? undefined : v.toLowerCase()))
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  RESUMABLE_CHECKPOINT_PATH: z.string().min(1, 'RESUMABLE_CHECKPOINT_PATH cannot be empty').optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data, options.programPath)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, programPath: string): AppConfig {
  const configuredPath = env.RESUMABLE_CHECKPOINT_PATH;

  return {
    logging: { level: env.RESUMABLE_LOG_LEVEL },
    checkpoint:
      configuredPath !== undefined
        ? { path: asCheckpointPath(configuredPath), source: { kind: 'env' } }
        : { path: deriveDefaultCheckpointPath(programPath), source: { kind: 'derived', programPath } },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
