/**
 * Argument Errors
 *
 * Error codes and constructors for registration, parsing and retrieval
 */

import { ExitCode } from '../types/exit-codes';

export type ArgumentErrorCode =
  | 'INVALID_DEFINITION'
  | 'DUPLICATE_DEFINITION'
  | 'ALLOCATION_FAILURE'
  | 'NOT_FOUND'
  | 'UNKNOWN_ARGUMENT'
  | 'MISSING_VALUE'
  | 'MISSING_REQUIRED'
  | 'VALIDATOR_REJECTED'
  | 'TYPE_MISMATCH'
  | 'NOT_PARSED'
  | 'DISPOSED';

export interface ArgumentError {
  code: ArgumentErrorCode;
  /** Advisory text suitable for printing before exiting */
  message: string;
  /** Offending token or long name */
  argument?: string;
  cause?: Error;
}

export function createArgumentError(
  code: ArgumentErrorCode,
  message: string,
  argument?: string,
  cause?: Error
): ArgumentError {
  const error: ArgumentError = { code, message };
  if (argument !== undefined) error.argument = argument;
  if (cause !== undefined) error.cause = cause;
  return error;
}

/** Codes a parse call can fail with */
const PARSE_ERROR_CODES: readonly ArgumentErrorCode[] = [
  'UNKNOWN_ARGUMENT',
  'MISSING_VALUE',
  'MISSING_REQUIRED',
];

export function isParseError(error: ArgumentError): boolean {
  return PARSE_ERROR_CODES.includes(error.code);
}

/**
 * Map an argument error to the exit code a program should use for it
 */
export function exitCodeForError(error: ArgumentError): ExitCode {
  if (isParseError(error)) {
    return ExitCode.USAGE_ERROR;
  }
  if (error.code === 'VALIDATOR_REJECTED') {
    return ExitCode.VALIDATION_ERROR;
  }
  return ExitCode.UNEXPECTED_ERROR;
}

/**
 * Thrown where a Result cannot be returned (constructors)
 */
export class ArgumentException extends Error {
  readonly code: ArgumentErrorCode;
  readonly argument?: string;

  constructor(error: ArgumentError) {
    super(error.message, error.cause ? { cause: error.cause } : undefined);
    this.name = 'ArgumentException';
    this.code = error.code;
    this.argument = error.argument;
  }
}
