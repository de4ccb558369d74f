import {
  type ChatStreamClient,
  type InferenceResult,
  type Logger,
  type ReportSink,
  PROBE_DEFAULTS,
  describeFailure,
  rateTimeToFirstToken,
  summarizeResults
} from '@chatprobe/core';

import { type BenchmarkEntry, type BenchmarkReport, formatBenchmarkReport } from './report';

export interface BenchmarkRunnerOptions {
  client        : ChatStreamClient;
  sink          : ReportSink;
  logger        : Logger;
  systemPrompt  : string;
  warmupPrompt? : string;
  now?          : () => Date;
  onWarmup?     : (phase: 'start' | 'done') => void;
  onResult?     : (entry: BenchmarkEntry, total: number) => void;
}

export interface BenchmarkRun extends BenchmarkReport {
  /** Where the report was appended, or null when the write failed. */
  savedTo: string | null;
}

/**
 * Sends each prompt as an isolated single-turn exchange after one discarded
 * warm-up call, then appends the report to the sink. Failed prompts are
 * logged and excluded from the summary; the run never aborts early.
 */
export class BenchmarkRunner {
  private readonly options: BenchmarkRunnerOptions;
  private readonly logger: Logger;

  public constructor(options: BenchmarkRunnerOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'benchmark' });
  }

  public async run(prompts: readonly string[]): Promise<BenchmarkRun> {
    const { client, systemPrompt } = this.options;
    const startedAt = (this.options.now ?? (() => new Date()))();

    await this.warmUp();

    const entries: BenchmarkEntry[] = [];
    const completed: InferenceResult[] = [];

    for (const [position, prompt] of prompts.entries()) {
      const outcome = await client.chat(systemPrompt, prompt);
      const entry: BenchmarkEntry = { index: position + 1, prompt, outcome };
      entries.push(entry);

      if (outcome.status === 'ok') {
        completed.push(outcome.result);
      } else {
        this.logger.warn({ index: entry.index, failure: describeFailure(outcome) }, 'benchmark prompt failed');
      }

      this.options.onResult?.(entry, prompts.length);
    }

    const summary = summarizeResults(completed, prompts.length);
    const rating = summary ? rateTimeToFirstToken(summary.timeToFirstTokenMs.avg) : null;
    const report: BenchmarkReport = {
      startedAt,
      model: client.model,
      target: client.baseUrl,
      entries,
      summary,
      rating
    };

    this.logger.info({
      completed: summary?.completed ?? 0,
      attempted: prompts.length,
      avgTtftMs: summary?.timeToFirstTokenMs.avg ?? null,
      rating
    }, 'benchmark complete');

    return { ...report, savedTo: await this.save(report) };
  }

  private async warmUp(): Promise<void> {
    this.options.onWarmup?.('start');
    const outcome = await this.options.client.chat(
      this.options.systemPrompt,
      this.options.warmupPrompt ?? PROBE_DEFAULTS.WARMUP_PROMPT
    );
    if (outcome.status === 'error') {
      this.logger.warn({ failure: describeFailure(outcome) }, 'warm-up request failed');
    } else {
      this.logger.debug({ totalMs: outcome.result.totalMs }, 'warm-up complete');
    }
    this.options.onWarmup?.('done');
  }

  private async save(report: BenchmarkReport): Promise<string | null> {
    const { sink } = this.options;
    try {
      await sink.append(formatBenchmarkReport(report));
      return sink.location;
    } catch (error) {
      this.logger.error(
        { location: sink.location, err: error instanceof Error ? error.message : String(error) },
        'could not save benchmark report'
      );
      return null;
    }
  }
}
