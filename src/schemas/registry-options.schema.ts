/**
 * Registry Options Schema
 */

import { z } from 'zod';
import type { Logger } from '../types/logger';

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'event' in value &&
    typeof value.event === 'function' &&
    'warn' in value &&
    typeof value.warn === 'function'
  );
}

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const registryOptionsSchema = z
  .object({
    programName: z.string().min(1, 'Program name cannot be empty').optional(),
    duplicatePolicy: z.enum(['reject', 'shadow']).optional(),
    validation: z.enum(['lazy', 'eager']).optional(),
    logLevel: logLevelSchema.optional(),
    logger: z.custom<Logger>(isLogger, 'Logger must implement the Logger interface').optional(),
  })
  .strict();

export type RegistryOptions = z.input<typeof registryOptionsSchema>;
