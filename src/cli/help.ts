/**
 * CLI Help Text
 *
 * Renders usage text for a set of argument definitions
 */

import type { ArgumentDefinition, ArgumentType } from '../core/argument-types';
import type { ArgumentRegistry } from '../core/argument-registry';

/** Placeholder shown after options that take a value */
const VALUE_PLACEHOLDERS: Record<ArgumentType, string> = {
  flag: '',
  string: ' <string>',
  int: ' <int>',
  float: ' <float>',
};

function formatNames(definition: ArgumentDefinition): string {
  return definition.shortName
    ? `${definition.shortName}, ${definition.longName}`
    : definition.longName;
}

/**
 * Format the usage text for definitions, in registration order
 */
export function formatHelp(
  definitions: readonly ArgumentDefinition[],
  programName?: string
): string {
  const lines = [`Usage: ${programName || 'program'} [OPTIONS]...`, '', 'Options:'];

  for (const definition of definitions) {
    lines.push(`  ${formatNames(definition)}${VALUE_PLACEHOLDERS[definition.type]}`);

    const detail = [definition.description, definition.required ? '(required)' : '']
      .filter(Boolean)
      .join(' ');
    if (detail) {
      lines.push(`      ${detail}`);
    }
  }

  return lines.join('\n');
}

/**
 * Get the usage text for everything registered so far
 */
export function getHelpText(registry: ArgumentRegistry, programName?: string): string {
  return formatHelp(registry.definitions, programName ?? registry.programName);
}

/** Print usage to stdout */
export function printHelp(registry: ArgumentRegistry, programName?: string): void {
  console.log(getHelpText(registry, programName));
}
