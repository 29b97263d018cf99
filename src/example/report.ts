/**
 * Example Report
 *
 * Text the example program prints after a successful parse
 */

export interface ExampleValues {
  verbose: boolean;
  input: string | null;
  output: string | null;
  outputIsSet: boolean;
  count: number;
  countIsSet: boolean;
  threshold: number;
  thresholdIsSet: boolean;
  positional: readonly string[];
}

function defaultMarker(isSet: boolean): string {
  return isSet ? '' : ' (default)';
}

/**
 * Format the report as lines of text
 */
export function formatReport(values: ExampleValues): string[] {
  const input = values.input ?? '(none)';
  const output = values.output ?? '(none)';
  const threshold = values.threshold.toFixed(2);

  const lines = [
    '=== Program Arguments Example ===',
    `Verbose mode: ${values.verbose ? 'enabled' : 'disabled'}`,
    `Input file: ${input}`,
    `Output file: ${output}${defaultMarker(values.outputIsSet)}`,
    `Count: ${values.count}${defaultMarker(values.countIsSet)}`,
    `Threshold: ${threshold}${defaultMarker(values.thresholdIsSet)}`,
  ];

  if (values.positional.length > 0) {
    lines.push('', 'Positional arguments:');
    values.positional.forEach((arg, index) => {
      lines.push(`  [${index}] ${arg}`);
    });
  }

  if (values.verbose) {
    lines.push(
      '',
      '=== Verbose Details ===',
      `Processing ${values.count} iterations with threshold ${threshold}`,
      `Reading from: ${input}`,
      `Writing to: ${output}`
    );
  }

  return lines;
}
