import { TTFT_RATING_THRESHOLDS } from '../config/defaults';
import {
  type BenchmarkSummary,
  type InferenceResult,
  type TimingStats,
  type TtftRating
} from '../entities/inference';

const NS_PER_SECOND = 1e9;

/** Server-side generation throughput; 0 unless both inputs are positive. */
export function tokensPerSecond(evalCount: number, evalDurationNs: number): number {
  if (evalCount <= 0 || evalDurationNs <= 0) return 0;
  return evalCount / (evalDurationNs / NS_PER_SECOND);
}

function timingStats(values: number[]): TimingStats {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let sum = 0;

  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
  }

  return { min, avg: sum / values.length, max };
}

/**
 * Aggregates successful results. Returns null for an empty set since
 * min/avg/max are undefined there.
 */
export function summarizeResults(results: readonly InferenceResult[], attempted = results.length): BenchmarkSummary | null {
  if (results.length === 0) return null;

  const throughputs = results.map((r) => r.tokensPerSecond).filter((tps) => tps > 0);
  const avgTokensPerSecond = throughputs.length
    ? throughputs.reduce((sum, tps) => sum + tps, 0) / throughputs.length
    : 0;

  return {
    completed: results.length,
    attempted,
    timeToFirstTokenMs: timingStats(results.map((r) => r.timeToFirstTokenMs)),
    totalMs: timingStats(results.map((r) => r.totalMs)),
    avgTokensPerSecond
  };
}

export function rateTimeToFirstToken(avgTtftMs: number): TtftRating {
  if (avgTtftMs < TTFT_RATING_THRESHOLDS.EXCELLENT_BELOW_MS) return 'excellent';
  if (avgTtftMs < TTFT_RATING_THRESHOLDS.ACCEPTABLE_BELOW_MS) return 'acceptable';
  return 'slow';
}
