/**
 * Registry Configuration
 * Resolves caller-supplied options over the defaults
 */

import { createConsoleLogger } from '../logging/console-logger';
import { createArgumentError, type ArgumentError } from '../core/errors';
import { logLevelSchema } from '../schemas/registry-options.schema';
import { validateRegistryOptions } from '../schemas/validators';
import { err, ok, type Result } from '../types/result';
import type { Logger, LogLevel } from '../types/logger';

/** How a second definition with an existing long name is handled */
export type DuplicatePolicy = 'reject' | 'shadow';

/** When validators run */
export type ValidationMode = 'lazy' | 'eager';

/**
 * Fully resolved registry configuration
 */
export interface EffectiveRegistryOptions {
  /** Used by help output when no program name is passed */
  programName: string;
  duplicatePolicy: DuplicatePolicy;
  validation: ValidationMode;
  logLevel: LogLevel;
  logger: Logger;
}

export const DEFAULT_REGISTRY_OPTIONS: Omit<EffectiveRegistryOptions, 'logger'> = {
  programName: 'program',
  duplicatePolicy: 'reject',
  validation: 'lazy',
  logLevel: 'warn',
};

/** Environment variable read by `resolveLogLevelFromEnv` */
export const LOG_LEVEL_ENV_VAR = 'ARGSPEC_LOG_LEVEL';

/**
 * Resolve registry options. Input is untrusted and checked by the schema, so
 * it is taken as `unknown`.
 * An injected logger is used as-is; otherwise a console logger at `logLevel`
 * is created.
 */
export function resolveRegistryOptions(
  input: unknown = {}
): Result<EffectiveRegistryOptions, ArgumentError> {
  const validation = validateRegistryOptions(input);
  if (!validation.success || !validation.data) {
    const details = (validation.errors ?? []).join('; ');
    return err(createArgumentError('INVALID_DEFINITION', `Invalid registry options: ${details}`));
  }

  const options = validation.data;
  const logLevel = options.logLevel ?? DEFAULT_REGISTRY_OPTIONS.logLevel;

  return ok({
    programName: options.programName ?? DEFAULT_REGISTRY_OPTIONS.programName,
    duplicatePolicy: options.duplicatePolicy ?? DEFAULT_REGISTRY_OPTIONS.duplicatePolicy,
    validation: options.validation ?? DEFAULT_REGISTRY_OPTIONS.validation,
    logLevel,
    logger: options.logger ?? createConsoleLogger({ minLevel: logLevel, includeTimestamp: false }),
  });
}

/**
 * Read the log level from the environment, falling back to `fallback` when
 * unset or unrecognised
 */
export function resolveLogLevelFromEnv(
  env: Record<string, string | undefined>,
  fallback: LogLevel = DEFAULT_REGISTRY_OPTIONS.logLevel
): LogLevel {
  const raw = env[LOG_LEVEL_ENV_VAR];
  if (raw === undefined) {
    return fallback;
  }
  const parsed = logLevelSchema.safeParse(raw.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}
