/**
 * analyze command - one run over a log directory and optional trace directory
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import {
  buildMetricsDocument,
  renderReport,
  runAnalysis,
  type AnalysisResult,
} from '@deadline-lens/core';
import { renderTimelinePng } from '@deadline-lens/vision';
import { DeadlineLensError, createChildLogger } from '@deadline-lens/shared';

const logger = createChildLogger({ component: 'AnalyzeCommand' });

export interface AnalyzeOptions {
  logDir: string;
  traceDir?: string;
  /** Report destination; stdout when absent */
  report?: string;
  /** PNG destination for the timeline chart */
  timeline?: string;
  /** Destination for the machine-readable metrics document */
  metricsJson?: string;
}

/**
 * Where the command writes its human-facing output
 */
export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

async function writeOutput(path: string, content: string | Buffer): Promise<string> {
  const target = resolve(path);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content);
  return target;
}

async function emitOutputs(result: AnalysisResult, options: AnalyzeOptions, io: CommandIO): Promise<void> {
  const report = renderReport(result.snapshot, result.metrics, result.evaluations, {
    failures: result.failures,
  });

  if (options.report) {
    const target = await writeOutput(options.report, report);
    logger.info({ path: target }, 'Report written');
  } else {
    io.stdout(report);
  }

  if (options.metricsJson) {
    const document = buildMetricsDocument(result.snapshot, result.metrics, result.evaluations);
    const target = await writeOutput(options.metricsJson, `${JSON.stringify(document, null, 2)}\n`);
    logger.info({ path: target }, 'Metrics document written');
  }

  if (options.timeline) {
    const png = renderTimelinePng(result.snapshot);
    const target = await writeOutput(options.timeline, png);
    logger.info({ path: target, bytes: png.length }, 'Timeline chart written');
  }
}

/**
 * Runs the analysis and writes every requested output.
 * Resolves to the process exit code: 0 on success (per-file failures
 * included), 1 when the run itself cannot proceed.
 */
export async function analyze(options: AnalyzeOptions, io: CommandIO): Promise<number> {
  try {
    const result = await runAnalysis({ logDir: options.logDir, traceDir: options.traceDir });
    await emitOutputs(result, options, io);

    if (result.failures.length > 0) {
      logger.warn({ failures: result.failures.length }, 'Some input files could not be processed');
    }
    return 0;
  } catch (err) {
    if (err instanceof DeadlineLensError) {
      logger.error({ err: err.toJSON() }, 'Analysis failed');
      io.stderr(`error [${err.code}]: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}
