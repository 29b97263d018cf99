/**
 * Tests for Schema Validators
 */

import { describe, it, expect } from 'vitest';
import { validateDefinitionInput, validateRegistryOptions } from './validators';

describe('validateDefinitionInput', () => {
  it('should apply defaults to a minimal int definition', () => {
    const result = validateDefinitionInput({ type: 'int', longName: '--count' });
    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      type: 'int',
      shortName: undefined,
      longName: '--count',
      description: '',
      required: false,
      defaultValue: 0,
    });
  });

  it('should turn a null short name into undefined', () => {
    const result = validateDefinitionInput({ type: 'flag', shortName: null, longName: '--verbose' });
    expect(result.success).toBe(true);
    expect(result.data?.shortName).toBeUndefined();
  });

  it('should never mark a flag as required', () => {
    const result = validateDefinitionInput({ type: 'flag', longName: '--force', required: true });
    expect(result.data?.required).toBe(false);
  });

  it('should default a string to null', () => {
    const result = validateDefinitionInput({ type: 'string', longName: '--input', required: true });
    expect(result.data).toMatchObject({ required: true, defaultValue: null });
  });

  it('should require a long name', () => {
    const result = validateDefinitionInput({ type: 'int' });
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['longName: Long name is required']);
  });

  it('should reject an empty long name', () => {
    const result = validateDefinitionInput({ type: 'string', longName: '' });
    expect(result.success).toBe(false);
    expect(result.errors).toContain('longName: Long name is required');
    expect(result.errors).toContain('longName: Long name must start with "-"');
  });

  it('should reject a long name without a dash', () => {
    const result = validateDefinitionInput({ type: 'flag', longName: 'verbose' });
    expect(result.errors).toEqual(['longName: Long name must start with "-"']);
  });

  it('should reject a bare dash as a short name', () => {
    const result = validateDefinitionInput({ type: 'flag', shortName: '-', longName: '--verbose' });
    expect(result.errors).toEqual([
      'shortName: Short name must have at least one character after the dash',
    ]);
  });

  it('should reject an int default outside 32 bits', () => {
    const result = validateDefinitionInput({
      type: 'int',
      longName: '--count',
      defaultValue: 2 ** 31,
    });
    expect(result.errors).toEqual(['defaultValue: Int default must fit in 32 bits']);
  });

  it('should accept a fractional float default', () => {
    const result = validateDefinitionInput({
      type: 'float',
      longName: '--ratio',
      defaultValue: 0.25,
    });
    expect(result.data?.defaultValue).toBe(0.25);
  });

  it('should reject an unknown type', () => {
    const result = validateDefinitionInput({ type: 'date', longName: '--when' });
    expect(result.success).toBe(false);
    expect(result.errors).toHaveLength(1);
  });

  it('should reject non-object input', () => {
    expect(validateDefinitionInput('--verbose').success).toBe(false);
    expect(validateDefinitionInput(null).success).toBe(false);
  });
});

describe('validateRegistryOptions', () => {
  it('should accept an empty object', () => {
    const result = validateRegistryOptions({});
    expect(result.success).toBe(true);
    expect(result.data).toEqual({});
  });

  it('should reject an empty program name', () => {
    const result = validateRegistryOptions({ programName: '' });
    expect(result.errors).toEqual(['programName: Program name cannot be empty']);
  });

  it('should reject an unknown log level', () => {
    const result = validateRegistryOptions({ logLevel: 'trace' });
    expect(result.success).toBe(false);
    expect(result.errors?.[0].startsWith('logLevel: ')).toBe(true);
  });
});
