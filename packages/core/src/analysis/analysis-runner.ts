/**
 * Analysis Runner
 * One forward pass: discover inputs, extract, aggregate, compute metrics
 */

import {
  createChildLogger,
  getConfig,
  logFileFailed,
  logFileProcessed,
  LogReadError,
  NoInputFilesError,
  TraceParseError,
} from '@deadline-lens/shared';
import { StreamStateAggregator } from '../aggregation/stream-state-aggregator.js';
import { LogExtractor, splitLines } from '../ingestion/log-extractor.js';
import { TraceExtractor } from '../ingestion/trace-extractor.js';
import { computeMetrics, evaluateStreams } from '../metrics/metrics-calculator.js';
import { discoverFiles, readFileBatches } from './file-discovery.js';
import type {
  AnalysisInput,
  AnalysisResult,
  AnalysisRunnerConfig,
  DiscoveredInputs,
  InputFailure,
} from './types.js';

function configDefaults(): AnalysisRunnerConfig {
  const { analysis } = getConfig();
  return {
    logExtensions: analysis.logExtensions,
    traceExtensions: analysis.traceExtensions,
    readConcurrency: analysis.readConcurrency,
  };
}

export class AnalysisRunner {
  private config: AnalysisRunnerConfig;
  private logger = createChildLogger({ component: 'AnalysisRunner' });
  private logExtractor = new LogExtractor();
  private traceExtractor = new TraceExtractor();

  constructor(config: Partial<AnalysisRunnerConfig> = {}) {
    this.config = { ...configDefaults(), ...config };
  }

  /**
   * List the log and trace files a run would consume
   */
  async discover(input: AnalysisInput): Promise<DiscoveredInputs> {
    const logs = await discoverFiles(input.logDir, this.config.logExtensions);
    const traces = input.traceDir
      ? await discoverFiles(input.traceDir, this.config.traceExtensions)
      : [];
    return { logs, traces };
  }

  /**
   * Run a full analysis. Every call uses a fresh aggregator, so each
   * discovered file is applied exactly once.
   */
  async run(input: AnalysisInput): Promise<AnalysisResult> {
    const files = await this.discover(input);

    if (files.logs.length === 0 && files.traces.length === 0) {
      throw new NoInputFilesError({ logDir: input.logDir, traceDir: input.traceDir });
    }

    this.logger.info({
      logFiles: files.logs.length,
      traceFiles: files.traces.length,
      readConcurrency: this.config.readConcurrency,
    }, 'Starting analysis');

    const aggregator = new StreamStateAggregator();
    const failures: InputFailure[] = [];
    const eventCounts = { log: 0, trace: 0 };

    for await (const batch of readFileBatches(files.logs, this.config.readConcurrency)) {
      for (const outcome of batch) {
        if (!outcome.ok) {
          const error = new LogReadError(outcome.filePath, outcome.reason);
          failures.push({ kind: 'log', filePath: outcome.filePath, reason: outcome.reason, error });
          logFileFailed(outcome.filePath, 'log', outcome.reason);
          continue;
        }

        const applied = aggregator.applyAll(
          this.logExtractor.extract(splitLines(outcome.content), outcome.filePath)
        );
        eventCounts.log += applied;
        logFileProcessed(outcome.filePath, 'log', applied);
      }
    }

    for await (const batch of readFileBatches(files.traces, this.config.readConcurrency)) {
      for (const outcome of batch) {
        if (!outcome.ok) {
          const reason = `unreadable (${outcome.reason})`;
          const error = new TraceParseError(outcome.filePath, reason);
          failures.push({ kind: 'trace', filePath: outcome.filePath, reason, error });
          logFileFailed(outcome.filePath, 'trace', reason);
          continue;
        }

        const extraction = this.traceExtractor.extract(outcome.content, outcome.filePath);
        if (extraction.error) {
          failures.push({
            kind: 'trace',
            filePath: outcome.filePath,
            reason: extraction.error.reason,
            error: extraction.error,
          });
          continue;
        }

        const applied = aggregator.applyAll(extraction.events);
        eventCounts.trace += applied;
        logFileProcessed(outcome.filePath, 'trace', applied);
      }
    }

    const snapshot = aggregator.finalize();
    const evaluations = evaluateStreams(snapshot);
    const metrics = computeMetrics(snapshot, evaluations);

    this.logger.info({
      streams: metrics.totalStreams,
      deadlinesMet: metrics.deadlinesMet,
      failures: failures.length,
    }, 'Analysis complete');

    return { snapshot, metrics, evaluations, files, failures, eventCounts };
  }
}

/**
 * Convenience wrapper around `new AnalysisRunner(config).run(input)`
 */
export async function runAnalysis(
  input: AnalysisInput,
  config: Partial<AnalysisRunnerConfig> = {}
): Promise<AnalysisResult> {
  return new AnalysisRunner(config).run(input);
}
