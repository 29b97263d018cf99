/**
 * Validators used by the example program
 */

import type { ArgumentValidator } from '../core/argument-types';

/**
 * Count must be an int between 1 and 100
 */
export const validateCount: ArgumentValidator = (value) => {
  if (value.type !== 'int') {
    return false;
  }
  if (value.value < 1 || value.value > 100) {
    return { valid: false, message: `Count must be between 1 and 100, got ${value.value}` };
  }
  return true;
};

/**
 * Threshold must be a float between 0.0 and 1.0
 */
export const validateThreshold: ArgumentValidator = (value) => {
  if (value.type !== 'float') {
    return false;
  }
  if (!(value.value >= 0 && value.value <= 1)) {
    return {
      valid: false,
      message: `Threshold must be between 0.0 and 1.0, got ${value.value.toFixed(2)}`,
    };
  }
  return true;
};

/**
 * Output path must end in .txt
 */
export const validateOutputFile: ArgumentValidator = (value) => {
  if (value.type !== 'string' || value.value === null) {
    return false;
  }
  if (!value.value.endsWith('.txt') || value.value.length < 4) {
    return {
      valid: false,
      message: `Output file must have .txt extension, got '${value.value}'`,
    };
  }
  return true;
};
