/**
 * Example Program
 *
 * Declares a handful of options, parses argv and prints what it got
 */

import { ArgumentRegistry } from '../core/argument-registry';
import { exitCodeForError } from '../core/errors';
import { getHelpText } from '../cli/help';
import { ExitCode } from '../types/exit-codes';
import type { Logger } from '../types/logger';
import { isErr, unwrap } from '../types/result';
import { formatReport } from './report';
import { validateCount, validateOutputFile, validateThreshold } from './validators';

/**
 * Where the example writes its output
 */
export interface ExampleIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface ExampleOptions {
  io: ExampleIo;
  /** Overrides the registry's default console logger */
  logger?: Logger;
}

const HELP_TOKENS = ['-h', '--help'];

/**
 * Build the registry the example program parses with
 */
export function createExampleRegistry(programName: string, logger?: Logger): ArgumentRegistry {
  const registry = new ArgumentRegistry(logger ? { programName, logger } : { programName });

  unwrap(registry.addFlag('-v', '--verbose', 'Enable verbose output'));
  unwrap(registry.addFlag('-h', '--help', 'Display this help message'));
  unwrap(registry.addString('-o', '--output', 'Output file path', false, 'output.txt'));
  unwrap(registry.addString('-i', '--input', 'Input file path', true));
  unwrap(registry.addInt('-n', '--count', 'Number of iterations', false, 10));
  unwrap(registry.addFloat('-t', '--threshold', 'Threshold value', false, 0.5));

  unwrap(registry.setValidator('--count', validateCount));
  unwrap(registry.setValidator('--threshold', validateThreshold));
  unwrap(registry.setValidator('--output', validateOutputFile));

  return registry;
}

/**
 * Run the example against an argv-style vector (index 0 is the program name)
 */
export function runExample(argv: readonly string[], options: ExampleOptions): ExitCode {
  const { io } = options;
  const programName = argv[0] || 'example';
  const registry = createExampleRegistry(programName, options.logger);

  try {
    // Help wins over any parse error
    if (argv.slice(1).some((token) => HELP_TOKENS.includes(token))) {
      io.stdout(getHelpText(registry));
      return ExitCode.SUCCESS;
    }

    const parsed = registry.parse(argv);
    if (isErr(parsed)) {
      io.stderr(parsed.error.message);
      io.stderr('');
      io.stderr('Use --help for usage information');
      return exitCodeForError(parsed.error);
    }

    const report = formatReport({
      verbose: registry.getFlag('--verbose'),
      input: registry.getString('--input'),
      output: registry.getString('--output'),
      outputIsSet: registry.isSet('--output'),
      count: registry.getInt('--count'),
      countIsSet: registry.isSet('--count'),
      threshold: registry.getFloat('--threshold'),
      thresholdIsSet: registry.isSet('--threshold'),
      positional: registry.getPositional().values,
    });
    for (const line of report) {
      io.stdout(line);
    }
    return ExitCode.SUCCESS;
  } finally {
    registry.dispose();
  }
}
