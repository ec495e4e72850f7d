/**
 * deadline-lens CLI entry point
 */

import { createChildLogger, describeError } from '@deadline-lens/shared';
import { createProgram } from './program.js';

const logger = createChildLogger({ component: 'CLI' });

const program = createProgram({
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal({ error: describeError(err) }, 'Unexpected failure');
  process.stderr.write(`error: ${describeError(err)}\n`);
  process.exitCode = 1;
});
