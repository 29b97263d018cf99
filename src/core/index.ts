/**
 * Core Module
 *
 * Argument registry, value model and errors
 */

export { ArgumentRegistry } from './argument-registry';
export type {
  ArgumentType,
  ValuedArgumentType,
  ArgumentValue,
  FlagValue,
  StringValue,
  IntValue,
  FloatValue,
  ValueOf,
  ArgumentDefinition,
  ArgumentValidator,
  ValidationVerdict,
  ValidationState,
  ParsedResult,
  ParseOutcome,
  PositionalArguments,
} from './argument-types';
export {
  INT32_MIN,
  INT32_MAX,
  flagValue,
  stringValue,
  intValue,
  floatValue,
} from './argument-types';
export { decodeInt, decodeFloat, decodeValue } from './decode';
export type { ArgumentError, ArgumentErrorCode } from './errors';
export {
  ArgumentException,
  createArgumentError,
  exitCodeForError,
  isParseError,
} from './errors';
export { runValidator, DEFAULT_REJECTION_MESSAGE } from './validation';
