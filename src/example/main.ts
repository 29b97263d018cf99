#!/usr/bin/env node

import { resolveLogLevelFromEnv } from '../config/registry-options';
import { createConsoleLogger } from '../logging/console-logger';
import { runExample } from './run-example';

const logger = createConsoleLogger({
  minLevel: resolveLogLevelFromEnv(process.env),
  includeTimestamp: false,
});

process.exitCode = runExample(process.argv.slice(1), {
  io: {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  },
  logger,
});
