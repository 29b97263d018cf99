/**
 * Argument Registry
 *
 * Owns the definition table, parses argv against it and serves the results
 * through typed accessors. Validators run lazily on first access.
 */

import {
  ArgumentDefinition,
  ArgumentType,
  ArgumentValidator,
  ArgumentValue,
  ParseOutcome,
  ParsedResult,
  PositionalArguments,
  ValidationState,
  ValueOf,
  flagValue,
  floatValue,
  intValue,
  stringValue,
} from './argument-types';
import { decodeValue } from './decode';
import { ArgumentError, ArgumentException, createArgumentError } from './errors';
import { PENDING, VALID, runValidator } from './validation';
import { resolveRegistryOptions, type EffectiveRegistryOptions } from '../config/registry-options';
import type { DefinitionInput, NormalizedDefinitionInput } from '../schemas/definition.schema';
import type { RegistryOptions } from '../schemas/registry-options.schema';
import { validateDefinitionInput } from '../schemas/validators';
import type { Logger } from '../types/logger';
import { Result, err, isErr, isOk, ok, unwrapOr } from '../types/result';

// ============================================================================
// Helpers
// ============================================================================

function toDefinition(input: NormalizedDefinitionInput): ArgumentDefinition {
  const base = {
    shortName: input.shortName,
    longName: input.longName,
    description: input.description,
    required: input.required,
  };

  switch (input.type) {
    case 'flag':
      return { ...base, type: 'flag', defaultValue: flagValue(input.defaultValue) };
    case 'string':
      return { ...base, type: 'string', defaultValue: stringValue(input.defaultValue) };
    case 'int':
      return { ...base, type: 'int', defaultValue: intValue(input.defaultValue) };
    case 'float':
      return { ...base, type: 'float', defaultValue: floatValue(input.defaultValue) };
  }
}

function disposedError(): ArgumentError {
  return createArgumentError('DISPOSED', 'Argument registry has been disposed');
}

// ============================================================================
// Registry
// ============================================================================

export class ArgumentRegistry {
  private definitionTable: ArgumentDefinition[] = [];
  /** Index-aligned with the definitions that existed at the last parse */
  private results: ParsedResult[] | null = null;
  private positionals: string[] = [];
  private disposed = false;
  private readonly options: EffectiveRegistryOptions;
  private readonly logger: Logger;

  /**
   * @throws ArgumentException when the options are invalid
   */
  constructor(options: RegistryOptions = {}) {
    const resolved = resolveRegistryOptions(options);
    if (isErr(resolved)) {
      throw new ArgumentException(resolved.error);
    }
    this.options = resolved.value;
    this.logger = resolved.value.logger;
  }

  get programName(): string {
    return this.options.programName;
  }

  /** Registered definitions in registration order */
  get definitions(): readonly ArgumentDefinition[] {
    return [...this.definitionTable];
  }

  // --------------------------------------------------------------------------
  // Registration
  // --------------------------------------------------------------------------

  /**
   * Register an argument from an options object
   */
  add(input: DefinitionInput): Result<ArgumentDefinition, ArgumentError> {
    if (this.disposed) {
      return err(disposedError());
    }

    const validation = validateDefinitionInput(input);
    if (!validation.success || !validation.data) {
      const longName = typeof input.longName === 'string' ? input.longName : undefined;
      const details = (validation.errors ?? []).join('; ');
      return this.reject(
        createArgumentError('INVALID_DEFINITION', `Invalid definition: ${details}`, longName)
      );
    }

    const normalized = validation.data;
    if (
      this.options.duplicatePolicy === 'reject' &&
      this.indexOfLongName(normalized.longName) !== -1
    ) {
      return this.reject(
        createArgumentError(
          'DUPLICATE_DEFINITION',
          `Argument already registered: ${normalized.longName}`,
          normalized.longName
        )
      );
    }

    const definition: ArgumentDefinition = Object.freeze(toDefinition(normalized));
    try {
      this.definitionTable.push(definition);
    } catch (error) {
      if (error instanceof RangeError) {
        return this.reject(
          createArgumentError(
            'ALLOCATION_FAILURE',
            `Could not grow the definition table for ${definition.longName}`,
            definition.longName,
            error
          )
        );
      }
      throw error;
    }

    this.logger.event('definition_added', `Registered ${definition.longName}`, {
      argument: definition.longName,
      type: definition.type,
    });
    return ok(definition);
  }

  /**
   * Register a boolean flag. Flags are never required.
   */
  addFlag(
    shortName: string | null | undefined,
    longName: string,
    description: string,
    defaultValue = false
  ): Result<ArgumentDefinition, ArgumentError> {
    return this.add({ type: 'flag', shortName, longName, description, defaultValue });
  }

  addString(
    shortName: string | null | undefined,
    longName: string,
    description: string,
    required = false,
    defaultValue: string | null = null
  ): Result<ArgumentDefinition, ArgumentError> {
    return this.add({ type: 'string', shortName, longName, description, required, defaultValue });
  }

  addInt(
    shortName: string | null | undefined,
    longName: string,
    description: string,
    required = false,
    defaultValue = 0
  ): Result<ArgumentDefinition, ArgumentError> {
    return this.add({ type: 'int', shortName, longName, description, required, defaultValue });
  }

  addFloat(
    shortName: string | null | undefined,
    longName: string,
    description: string,
    required = false,
    defaultValue = 0
  ): Result<ArgumentDefinition, ArgumentError> {
    return this.add({ type: 'float', shortName, longName, description, required, defaultValue });
  }

  /**
   * Attach a validator to the definition with this exact long name.
   * Any memoized outcome for that argument is discarded.
   */
  setValidator(
    longName: string,
    validator: ArgumentValidator
  ): Result<ArgumentDefinition, ArgumentError> {
    if (this.disposed) {
      return err(disposedError());
    }

    const index = this.indexOfLongName(longName);
    if (index === -1) {
      return err(
        createArgumentError('NOT_FOUND', `No argument registered as ${longName}`, longName)
      );
    }

    const updated: ArgumentDefinition = Object.freeze({
      ...this.definitionTable[index],
      validator,
    });
    this.definitionTable[index] = updated;

    const result = this.results?.[index];
    if (result) {
      result.definition = updated;
      result.validation = PENDING;
      if (this.options.validation === 'eager') {
        this.validate(result);
      }
    }

    this.logger.event('validator_attached', `Validator attached to ${longName}`, {
      argument: longName,
    });
    return ok(updated);
  }

  // --------------------------------------------------------------------------
  // Parsing
  // --------------------------------------------------------------------------

  /**
   * Parse an argv-style vector. Index 0 is the program name and is skipped.
   *
   * The first error stops the pass. Options already applied stay applied, so a
   * failed registry should be discarded rather than read.
   */
  parse(argv: readonly string[]): Result<ParseOutcome, ArgumentError> {
    if (this.disposed) {
      return err(disposedError());
    }

    const results: ParsedResult[] = this.definitionTable.map((definition) => ({
      definition,
      value: definition.defaultValue,
      isSet: false,
      validation: PENDING,
    }));
    this.results = results;
    this.positionals = [];
    const explicit: string[] = [];

    this.logger.event('parse_started', `Parsing ${Math.max(argv.length - 1, 0)} token(s)`, {
      program: this.options.programName,
    });

    for (let i = 1; i < argv.length; i++) {
      const token = argv[i];

      if (!token.startsWith('-')) {
        this.positionals.push(token);
        this.logger.event('positional_captured', `Positional argument ${token}`, {
          token,
          index: i,
        });
        continue;
      }

      const index = this.indexOfToken(token);
      if (index === -1) {
        return this.failParse(
          createArgumentError('UNKNOWN_ARGUMENT', `Unknown argument: ${token}`, token),
          i
        );
      }

      const result = results[index];
      const { definition } = result;

      if (definition.type === 'flag') {
        result.value = flagValue(true);
      } else {
        if (i + 1 >= argv.length) {
          return this.failParse(
            createArgumentError('MISSING_VALUE', `Missing value for argument: ${token}`, token),
            i
          );
        }
        i++;
        result.value = decodeValue(definition.type, argv[i]);
      }

      if (!result.isSet) {
        explicit.push(definition.longName);
      }
      result.isSet = true;

      this.logger.event('option_matched', `Matched ${token} as ${definition.longName}`, {
        argument: definition.longName,
        token,
        index: i,
      });
    }

    const missing = results.find((result) => result.definition.required && !result.isSet);
    if (missing) {
      const { longName } = missing.definition;
      return this.failParse(
        createArgumentError('MISSING_REQUIRED', `Required argument missing: ${longName}`, longName)
      );
    }

    if (this.options.validation === 'eager') {
      for (const result of results) {
        this.validate(result);
      }
    }

    this.logger.event(
      'parse_completed',
      `Parsed ${explicit.length} option(s) and ${this.positionals.length} positional(s)`,
      { program: this.options.programName }
    );
    return ok({ positional: [...this.positionals], explicit });
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  /**
   * Get the validated value of an argument, or why it is unavailable
   */
  get(longName: string): Result<ArgumentValue, ArgumentError> {
    const lookup = this.lookupResult(longName);
    if (isErr(lookup)) {
      return lookup;
    }

    const result = lookup.value;
    const state = this.validate(result);
    if (state.status === 'invalid') {
      return err(
        createArgumentError(
          'VALIDATOR_REJECTED',
          `Validation error for ${longName}: ${state.message}`,
          longName
        )
      );
    }
    return ok(result.value);
  }

  /**
   * Like `get`, but also fails with TYPE_MISMATCH when the argument is not of
   * the requested type
   */
  getTyped(longName: string, type: 'flag'): Result<ValueOf<'flag'>, ArgumentError>;
  getTyped(longName: string, type: 'string'): Result<ValueOf<'string'>, ArgumentError>;
  getTyped(longName: string, type: 'int' | 'float'): Result<number, ArgumentError>;
  getTyped(longName: string, type: ArgumentType): Result<ArgumentValue['value'], ArgumentError> {
    const value = this.get(longName);
    if (isErr(value)) {
      return value;
    }

    const current = value.value;
    if (current.type !== type) {
      return err(
        createArgumentError(
          'TYPE_MISMATCH',
          `${longName} is of type ${current.type}, not ${type}`,
          longName
        )
      );
    }
    return ok(current.value);
  }

  /**
   * Flag value, or false when absent, invalid or not a flag
   */
  getFlag(longName: string): boolean {
    return unwrapOr(this.getTyped(longName, 'flag'), false);
  }

  /**
   * String value, or null when absent, invalid or not a string
   */
  getString(longName: string): string | null {
    return unwrapOr(this.getTyped(longName, 'string'), null);
  }

  /**
   * Int value. A rejected value falls back to the definition's default; any
   * other failure gives 0.
   */
  getInt(longName: string): number {
    const result = this.getTyped(longName, 'int');
    if (isOk(result)) {
      return result.value;
    }
    const fallback = this.rejectedDefault(longName, result.error);
    return fallback?.type === 'int' ? fallback.value : 0;
  }

  /**
   * Float value. A rejected value falls back to the definition's default; any
   * other failure gives 0.
   */
  getFloat(longName: string): number {
    const result = this.getTyped(longName, 'float');
    if (isOk(result)) {
      return result.value;
    }
    const fallback = this.rejectedDefault(longName, result.error);
    return fallback?.type === 'float' ? fallback.value : 0;
  }

  /**
   * Whether the user supplied the option. Does not run validation.
   */
  isSet(longName: string): boolean {
    if (this.disposed) {
      return false;
    }
    return this.results?.[this.indexOfLongName(longName)]?.isSet ?? false;
  }

  /**
   * The validator's message for a rejected argument, or null
   */
  getValidationError(longName: string): string | null {
    const lookup = this.lookupResult(longName);
    if (isErr(lookup)) {
      return null;
    }
    const state = this.validate(lookup.value);
    return state.status === 'invalid' ? state.message : null;
  }

  /**
   * Find a definition by its short or long name
   */
  getDefinition(name: string): ArgumentDefinition | undefined {
    const index = this.indexOfToken(name);
    return index === -1 ? undefined : this.definitionTable[index];
  }

  getPositional(): PositionalArguments {
    return { values: [...this.positionals], count: this.positionals.length };
  }

  // --------------------------------------------------------------------------
  // Teardown
  // --------------------------------------------------------------------------

  /**
   * Release definitions, results and positionals. Idempotent.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.definitionTable = [];
    this.results = null;
    this.positionals = [];
    this.disposed = true;
    this.logger.event('disposed', 'Argument registry disposed', {
      program: this.options.programName,
    });
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private indexOfLongName(longName: string): number {
    return this.definitionTable.findIndex((definition) => definition.longName === longName);
  }

  private indexOfToken(token: string): number {
    return this.definitionTable.findIndex(
      (definition) => definition.longName === token || definition.shortName === token
    );
  }

  private lookupResult(longName: string): Result<ParsedResult, ArgumentError> {
    if (this.disposed) {
      return err(disposedError());
    }

    const index = this.indexOfLongName(longName);
    if (index === -1) {
      return err(
        createArgumentError('NOT_FOUND', `No argument registered as ${longName}`, longName)
      );
    }

    const result = this.results?.[index];
    if (!result) {
      return err(
        createArgumentError('NOT_PARSED', `${longName} has not been parsed yet`, longName)
      );
    }
    return ok(result);
  }

  /**
   * Run the validator for a result once and memoize the outcome
   */
  private validate(result: ParsedResult): ValidationState {
    if (result.validation.status !== 'pending') {
      return result.validation;
    }

    const { definition } = result;
    const state = runValidator(definition.validator, result.value, definition.type);
    result.validation = state;

    if (state.status === 'invalid') {
      this.logger.event(
        'validation_failed',
        `Validation error for ${definition.longName}: ${state.message}`,
        { argument: definition.longName }
      );
    } else if (definition.validator && state === VALID) {
      this.logger.event('validation_passed', `${definition.longName} passed validation`, {
        argument: definition.longName,
      });
    }
    return state;
  }

  private rejectedDefault(longName: string, error: ArgumentError): ArgumentValue | undefined {
    if (error.code !== 'VALIDATOR_REJECTED') {
      return undefined;
    }
    const index = this.indexOfLongName(longName);
    return index === -1 ? undefined : this.definitionTable[index].defaultValue;
  }

  private reject(error: ArgumentError): Result<never, ArgumentError> {
    this.logger.event('definition_rejected', error.message, { argument: error.argument });
    return err(error);
  }

  private failParse(error: ArgumentError, index?: number): Result<never, ArgumentError> {
    this.logger.event('parse_failed', error.message, {
      program: this.options.programName,
      token: error.argument,
      index,
    });
    return err(error);
  }
}
