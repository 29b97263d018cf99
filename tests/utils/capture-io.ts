/**
 * Captured program output for integration tests
 */

import type { ExampleIo } from '../../src/example/run-example';

export interface CapturedIo extends ExampleIo {
  readonly out: string[];
  readonly err: string[];
}

/**
 * Create an IO sink that records each line written to stdout and stderr
 */
export function createCapturedIo(): CapturedIo {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => {
      out.push(line);
    },
    stderr: (line) => {
      err.push(line);
    },
  };
}
