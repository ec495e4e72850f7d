/**
 * Command-line surface
 */

import { Command } from 'commander';
import { analyze, type CommandIO } from './commands/analyze.js';

export const CLI_VERSION = '0.1.0';

export interface ProgramIO extends CommandIO {
  setExitCode: (code: number) => void;
}

export function createProgram(io: ProgramIO): Command {
  const program = new Command()
    .name('deadline-lens')
    .description('Correlate client logs and QLOG traces into per-stream deadline compliance reports')
    .version(CLI_VERSION);

  program
    .command('analyze')
    .description('Analyze one test run')
    .requiredOption('--log-dir <dir>', 'Directory of client log files (required)')
    .option('--trace-dir <dir>', 'Directory of QLOG trace documents')
    .option('--report <file>', 'Write the text report here instead of stdout')
    .option('--timeline <file>', 'Render the stream timeline as a PNG')
    .option('--metrics-json <file>', 'Write metrics and per-stream rows as JSON')
    .action(async (opts: {
      logDir: string;
      traceDir?: string;
      report?: string;
      timeline?: string;
      metricsJson?: string;
    }) => {
      io.setExitCode(await analyze(opts, io));
    });

  return program;
}
