export { definitionInputSchema } from './definition.schema';
export type { DefinitionInput, NormalizedDefinitionInput } from './definition.schema';
export { registryOptionsSchema, logLevelSchema } from './registry-options.schema';
export type { RegistryOptions } from './registry-options.schema';
export { validateDefinitionInput, validateRegistryOptions } from './validators';
export type { ValidationResult } from './validators';
