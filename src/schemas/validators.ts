/**
 * Schema Validation with Zod
 * Runtime validation for registration input and registry options
 */

import type { ZodError } from 'zod';
import { definitionInputSchema, type NormalizedDefinitionInput } from './definition.schema';
import { registryOptionsSchema, type RegistryOptions } from './registry-options.schema';

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate an argument definition and apply its defaults
 */
export function validateDefinitionInput(data: unknown): ValidationResult<NormalizedDefinitionInput> {
  const result = definitionInputSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Validate registry options
 */
export function validateRegistryOptions(data: unknown): ValidationResult<RegistryOptions> {
  const result = registryOptionsSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}
