/**
 * Argument Types
 *
 * Definitions, tagged values and per-parse results
 */

/** Kinds of argument the registry understands */
export type ArgumentType = 'flag' | 'string' | 'int' | 'float';

/** Argument types that consume the following token as their value */
export type ValuedArgumentType = Exclude<ArgumentType, 'flag'>;

export interface FlagValue {
  readonly type: 'flag';
  readonly value: boolean;
}

export interface StringValue {
  readonly type: 'string';
  /** null when a string argument has no default and was not supplied */
  readonly value: string | null;
}

export interface IntValue {
  readonly type: 'int';
  /** Always a 32-bit signed integer */
  readonly value: number;
}

export interface FloatValue {
  readonly type: 'float';
  /** Always representable as a 32-bit float */
  readonly value: number;
}

/** A value tagged with the argument type it belongs to */
export type ArgumentValue = FlagValue | StringValue | IntValue | FloatValue;

/** The payload type for a given argument type */
export type ValueOf<T extends ArgumentType> = Extract<ArgumentValue, { type: T }>['value'];

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

export function flagValue(value: boolean): FlagValue {
  return { type: 'flag', value };
}

export function stringValue(value: string | null): StringValue {
  return { type: 'string', value };
}

/**
 * Tag an integer, truncating and clamping it to the 32-bit signed range
 */
export function intValue(value: number): IntValue {
  if (Number.isNaN(value)) {
    return { type: 'int', value: 0 };
  }
  const clamped = Math.min(INT32_MAX, Math.max(INT32_MIN, Math.trunc(value)));
  // | 0 also turns -0 into 0
  return { type: 'int', value: clamped | 0 };
}

/**
 * Tag a float, rounding it to single precision
 */
export function floatValue(value: number): FloatValue {
  return { type: 'float', value: Math.fround(value) };
}

/**
 * What a validator returns: a bare pass/fail, or a verdict carrying a reason
 */
export type ValidationVerdict = boolean | { valid: true } | { valid: false; message?: string };

/**
 * Caller-supplied check run against a parsed value on first access.
 * The declared type is passed alongside the value; a validator written for one
 * type should reject values of any other.
 */
export type ArgumentValidator = (value: ArgumentValue, type: ArgumentType) => ValidationVerdict;

/** A declared, named, typed argument. Frozen once registered. */
export interface ArgumentDefinition {
  /** Short form, e.g. "-v" */
  readonly shortName?: string;
  /** Long form, e.g. "--verbose"; the canonical key */
  readonly longName: string;
  /** Help text */
  readonly description: string;
  readonly type: ArgumentType;
  /** Always false for flags */
  readonly required: boolean;
  readonly defaultValue: ArgumentValue;
  readonly validator?: ArgumentValidator;
}

/** Memoized outcome of lazy validation */
export type ValidationState =
  | { readonly status: 'pending' }
  | { readonly status: 'valid' }
  | { readonly status: 'invalid'; readonly message: string };

/** Per-definition state produced by a parse call */
export interface ParsedResult {
  definition: ArgumentDefinition;
  value: ArgumentValue;
  /** Whether the user supplied the option explicitly */
  isSet: boolean;
  validation: ValidationState;
}

/** What a successful parse reports back */
export interface ParseOutcome {
  /** Non-option tokens, in order */
  positional: string[];
  /** Long names of the options that were supplied, in first-seen order */
  explicit: string[];
}

/** Positional arguments with their count */
export interface PositionalArguments {
  values: readonly string[];
  count: number;
}
