import {
  type BenchmarkSummary,
  type InferenceOutcome,
  type TtftRating,
  describeFailure
} from '@chatprobe/core';

export interface BenchmarkEntry {
  /** 1-based position in the prompt set. */
  index   : number;
  prompt  : string;
  outcome : InferenceOutcome;
}

export interface BenchmarkReport {
  startedAt : Date;
  model     : string;
  target    : string;
  entries   : BenchmarkEntry[];
  summary   : BenchmarkSummary | null;
  rating    : TtftRating | null;
}

const RULE = '='.repeat(60);
const PREVIEW_CHARS = 80;

const RATING_TEXT: Record<TtftRating, string> = {
  excellent: 'TTFT < 1s: excellent, the exchange feels responsive.',
  acceptable: 'TTFT 1-2s: acceptable, a natural conversation pace.',
  slow: 'TTFT > 2s: slow, consider a smaller model or a closer server.'
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(at: Date): string {
  return `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())} `
    + `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`;
}

export function singleLine(text: string): string {
  return text.replace(/\r?\n/g, ' ');
}

export function previewText(text: string, maxChars = PREVIEW_CHARS): string {
  const flat = singleLine(text);
  return flat.length > maxChars ? `${flat.slice(0, maxChars)}...` : flat;
}

export function describeRating(rating: TtftRating): string {
  return RATING_TEXT[rating];
}

export function formatEntry(entry: BenchmarkEntry): string {
  const { outcome } = entry;
  if (outcome.status === 'error') {
    return `[${entry.index}] FAILED: ${entry.prompt} - ${describeFailure(outcome)}`;
  }

  const { result } = outcome;
  return `[${entry.index}] TTFT ${result.timeToFirstTokenMs.toFixed(0)}ms`
    + ` | Total ${result.totalMs.toFixed(0)}ms`
    + ` | ${result.tokensPerSecond.toFixed(1)} tok/s`
    + ` | Q: ${entry.prompt} | A: ${singleLine(result.text)}`;
}

export function formatSummary(summary: BenchmarkSummary, rating: TtftRating): string[] {
  const ttft = summary.timeToFirstTokenMs;
  const total = summary.totalMs;
  return [
    `  Completed    : ${summary.completed}/${summary.attempted}`,
    `  TTFT  Min/Avg/Max: ${ttft.min.toFixed(0)} / ${ttft.avg.toFixed(0)} / ${ttft.max.toFixed(0)} ms`,
    `  Total Min/Avg/Max: ${total.min.toFixed(0)} / ${total.avg.toFixed(0)} / ${total.max.toFixed(0)} ms`,
    `  Avg tok/sec  : ${summary.avgTokensPerSecond.toFixed(1)}`,
    `  Rating       : ${describeRating(rating)}`
  ];
}

/** Human-readable log block for one run; appended verbatim to the log file. */
export function formatBenchmarkReport(report: BenchmarkReport): string[] {
  const lines = [
    RULE,
    `Benchmark Run: ${formatTimestamp(report.startedAt)}`,
    `Model: ${report.model}  Target: ${report.target}`,
    RULE,
    ...report.entries.map(formatEntry),
    ''
  ];

  if (report.summary && report.rating) {
    lines.push('--- Summary ---', ...formatSummary(report.summary, report.rating));
  } else {
    lines.push('No successful responses.');
  }
  lines.push('');

  return lines;
}
