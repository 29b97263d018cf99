/**
 * Lazy validation helpers
 */

import type {
  ArgumentType,
  ArgumentValidator,
  ArgumentValue,
  ValidationState,
  ValidationVerdict,
} from './argument-types';

export const PENDING: ValidationState = { status: 'pending' };
export const VALID: ValidationState = { status: 'valid' };

/** Reason recorded when a validator fails without giving one */
export const DEFAULT_REJECTION_MESSAGE = 'value rejected by validator';

function invalid(message: string): ValidationState {
  return { status: 'invalid', message };
}

function verdictToState(verdict: ValidationVerdict): ValidationState {
  if (typeof verdict === 'boolean') {
    return verdict ? VALID : invalid(DEFAULT_REJECTION_MESSAGE);
  }
  if (verdict.valid) {
    return VALID;
  }
  return invalid(verdict.message || DEFAULT_REJECTION_MESSAGE);
}

/**
 * Run a validator once and turn its verdict into a memoizable state.
 * A validator that throws counts as a rejection carrying the thrown message.
 */
export function runValidator(
  validator: ArgumentValidator | undefined,
  value: ArgumentValue,
  type: ArgumentType
): ValidationState {
  if (!validator) {
    return VALID;
  }
  try {
    return verdictToState(validator(value, type));
  } catch (error) {
    return invalid(error instanceof Error ? error.message : String(error));
  }
}
