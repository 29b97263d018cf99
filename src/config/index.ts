/**
 * Configuration module
 */

export {
  DEFAULT_REGISTRY_OPTIONS,
  LOG_LEVEL_ENV_VAR,
  resolveRegistryOptions,
  resolveLogLevelFromEnv,
} from './registry-options';
export type { DuplicatePolicy, EffectiveRegistryOptions, ValidationMode } from './registry-options';
