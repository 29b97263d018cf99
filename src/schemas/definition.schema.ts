/**
 * Definition Schema
 * Shape of the input accepted when registering an argument
 */

import { z } from 'zod';
import { INT32_MAX, INT32_MIN } from '../core/argument-types';

const shortNameSchema = z
  .string()
  .min(2, 'Short name must have at least one character after the dash')
  .startsWith('-', 'Short name must start with "-"')
  .nullish()
  .transform((value) => value ?? undefined);

const longNameSchema = z
  .string({
    required_error: 'Long name is required',
    invalid_type_error: 'Long name must be a string',
  })
  .min(1, 'Long name is required')
  .startsWith('-', 'Long name must start with "-"');

const commonFields = {
  shortName: shortNameSchema,
  longName: longNameSchema,
  description: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
};

const flagDefinitionSchema = z.object({
  ...commonFields,
  type: z.literal('flag'),
  // Accepted for symmetry; a flag is never required
  required: z
    .boolean()
    .optional()
    .transform(() => false),
  defaultValue: z.boolean().default(false),
});

const stringDefinitionSchema = z.object({
  ...commonFields,
  type: z.literal('string'),
  required: z.boolean().default(false),
  defaultValue: z.string().nullable().default(null),
});

const intDefinitionSchema = z.object({
  ...commonFields,
  type: z.literal('int'),
  required: z.boolean().default(false),
  defaultValue: z
    .number()
    .int('Int default must be an integer')
    .min(INT32_MIN, 'Int default must fit in 32 bits')
    .max(INT32_MAX, 'Int default must fit in 32 bits')
    .default(0),
});

const floatDefinitionSchema = z.object({
  ...commonFields,
  type: z.literal('float'),
  required: z.boolean().default(false),
  defaultValue: z.number().default(0),
});

export const definitionInputSchema = z.discriminatedUnion('type', [
  flagDefinitionSchema,
  stringDefinitionSchema,
  intDefinitionSchema,
  floatDefinitionSchema,
]);

/** What callers pass to `ArgumentRegistry.add` */
export type DefinitionInput = z.input<typeof definitionInputSchema>;

/** Registration input with defaults applied */
export type NormalizedDefinitionInput = z.output<typeof definitionInputSchema>;
