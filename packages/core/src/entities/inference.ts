import { type InferenceError } from '../errors';

/**
 * Outcome of one streamed chat request that reached a terminal chunk
 * (or the end of the stream).
 *
 * `timeToFirstTokenMs` is measured to the first non-empty content fragment,
 * not the first byte. Both timings are wall-clock milliseconds on the
 * client's clock; `tokensPerSecond` is derived from server-reported
 * nanoseconds and is 0 when the server sent no usable metrics.
 */
export interface InferenceResult {
  readonly text               : string;
  readonly timeToFirstTokenMs : number;
  readonly totalMs            : number;
  readonly evalTokenCount     : number;
  readonly tokensPerSecond    : number;
}

export interface InferenceFailure {
  readonly error              : InferenceError;
  readonly elapsedMs          : number;
  readonly timeToFirstTokenMs : number;
}

export type InferenceOutcome =
  | { status: 'ok'; result: InferenceResult }
  | ({ status: 'error' } & InferenceFailure);

export interface TimingStats {
  min : number;
  avg : number;
  max : number;
}

export interface BenchmarkSummary {
  completed          : number;
  attempted          : number;
  timeToFirstTokenMs : TimingStats;
  totalMs            : TimingStats;
  /** Mean over results with positive throughput only; 0 when there are none. */
  avgTokensPerSecond : number;
}

export type TtftRating = 'excellent' | 'acceptable' | 'slow';
