/**
 * Main entry point - one provider backfill per invocation
 *
 * Exit codes: 0 completed (zero-record runs included), 1 invalid arguments or
 * unexpected error, 2 configuration error, 3 sink failure.
 */

import { executeRun } from './cli/execute';
import { runCli } from './cli/program';

runCli(process.argv, { execute: (request) => executeRun(request) })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
