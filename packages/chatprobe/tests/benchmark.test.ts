import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, ProtocolError, type ReportSink, TransportError } from '@chatprobe/core';
import {
  FakeChatStreamClient,
  FakeLogger,
  MemoryReportSink,
  errorOutcome,
  okOutcome
} from '@chatprobe/testing';

import {
  BenchmarkRunner,
  formatBenchmarkReport,
  formatEntry,
  formatTimestamp,
  loadPromptCorpus,
  previewText
} from '../src/index';

const RULE = '='.repeat(60);
const STARTED_AT = new Date(2026, 0, 2, 3, 4, 5);

describe('BenchmarkRunner', () => {
  let client: FakeChatStreamClient;
  let logger: FakeLogger;
  let sink: MemoryReportSink;

  beforeEach(() => {
    client = new FakeChatStreamClient([
      okOutcome({ text: 'warm', timeToFirstTokenMs: 5000, totalMs: 9000 }),
      okOutcome({ text: 'First', timeToFirstTokenMs: 100, totalMs: 400, tokensPerSecond: 50 }),
      errorOutcome(new ProtocolError(500)),
      okOutcome({ text: 'Third\nline', timeToFirstTokenMs: 300, totalMs: 800, tokensPerSecond: 0 })
    ]);
    logger = new FakeLogger();
    sink = new MemoryReportSink();
  });

  const createRunner = (overrides: { sink?: ReportSink } = {}) => new BenchmarkRunner({
    client,
    logger,
    sink: overrides.sink ?? sink,
    systemPrompt: 'Be brief.',
    now: () => STARTED_AT
  });

  it('sends a discarded warm-up, then each prompt as an isolated exchange', async () => {
    await createRunner().run(['p1', 'p2', 'p3']);

    expect(client.requests).toHaveLength(4);
    expect(client.requests[0]?.[1]).toEqual({ role: 'user', content: 'Hello.' });
    for (const request of client.requests) {
      expect(request).toHaveLength(2);
      expect(request[0]).toEqual({ role: 'system', content: 'Be brief.' });
    }
    expect(client.requests.slice(1).map((r) => r[1]?.content)).toEqual(['p1', 'p2', 'p3']);
  });

  it('summarises only the successful prompts', async () => {
    const run = await createRunner().run(['p1', 'p2', 'p3']);

    expect(run.entries.map((e) => e.outcome.status)).toEqual(['ok', 'error', 'ok']);
    expect(run.summary).toEqual({
      completed: 2,
      attempted: 3,
      timeToFirstTokenMs: { min: 100, avg: 200, max: 300 },
      totalMs: { min: 400, avg: 600, max: 800 },
      avgTokensPerSecond: 50
    });
    expect(run.rating).toBe('excellent');
    expect(logger.logs).toContainEqual({
      level: 'warn',
      obj: { component: 'benchmark', index: 2, failure: '[HTTP 500]' },
      msg: 'benchmark prompt failed'
    });
  });

  it('appends the formatted report to the sink', async () => {
    const run = await createRunner().run(['p1', 'p2', 'p3']);

    expect(run.savedTo).toBe('memory://report');
    expect(sink.lines).toEqual([
      RULE,
      'Benchmark Run: 2026-01-02 03:04:05',
      'Model: fake-model  Target: http://fake.local:11434',
      RULE,
      '[1] TTFT 100ms | Total 400ms | 50.0 tok/s | Q: p1 | A: First',
      '[2] FAILED: p2 - [HTTP 500]',
      '[3] TTFT 300ms | Total 800ms | 0.0 tok/s | Q: p3 | A: Third line',
      '',
      '--- Summary ---',
      '  Completed    : 2/3',
      '  TTFT  Min/Avg/Max: 100 / 200 / 300 ms',
      '  Total Min/Avg/Max: 400 / 600 / 800 ms',
      '  Avg tok/sec  : 50.0',
      '  Rating       : TTFT < 1s: excellent, the exchange feels responsive.',
      ''
    ]);
  });

  it('reports progress through the callbacks', async () => {
    const events: string[] = [];
    const runner = new BenchmarkRunner({
      client,
      logger,
      sink,
      systemPrompt: 'S',
      onWarmup: (phase) => events.push(`warmup:${phase}`),
      onResult: (entry, total) => events.push(`${entry.index}/${total}:${entry.outcome.status}`)
    });

    await runner.run(['p1', 'p2']);

    expect(events).toEqual(['warmup:start', 'warmup:done', '1/2:ok', '2/2:error']);
  });

  it('keeps the results when the report cannot be saved', async () => {
    const failingSink: ReportSink = {
      location: '/read-only/log.txt',
      append: async () => {
        throw new Error('EACCES: permission denied');
      }
    };

    const run = await createRunner({ sink: failingSink }).run(['p1']);

    expect(run.savedTo).toBeNull();
    expect(run.summary?.completed).toBe(1);
    expect(logger.messages('error')).toEqual(['could not save benchmark report']);
  });

  it('logs a failed warm-up and carries on', async () => {
    client.setOutcomes([errorOutcome(new ProtocolError(503)), okOutcome()]);

    const run = await createRunner().run(['p1']);

    expect(logger.messages('warn')).toEqual(['warm-up request failed']);
    expect(run.summary?.completed).toBe(1);
  });
});

describe('report formatting', () => {
  it('formats timestamps in local time with zero padding', () => {
    expect(formatTimestamp(new Date(2026, 10, 9, 8, 7, 6))).toBe('2026-11-09 08:07:06');
  });

  it('previews long replies on one line', () => {
    expect(previewText('a\nb')).toBe('a b');
    expect(previewText('x'.repeat(81))).toBe(`${'x'.repeat(80)}...`);
    expect(previewText('x'.repeat(80))).toBe('x'.repeat(80));
  });

  it('renders a failed transport entry with the error name', () => {
    const entry = { index: 4, prompt: 'hi', outcome: errorOutcome(new TransportError('connect ECONNREFUSED')) };

    expect(formatEntry(entry)).toBe('[4] FAILED: hi - [ERROR] TransportError: connect ECONNREFUSED');
  });

  it('writes a closing note when nothing succeeded', () => {
    const lines = formatBenchmarkReport({
      startedAt: STARTED_AT,
      model: 'm',
      target: 'http://t',
      entries: [{ index: 1, prompt: 'p', outcome: errorOutcome(new ProtocolError(500, 'boom')) }],
      summary: null,
      rating: null
    });

    expect(lines.slice(4)).toEqual(['[1] FAILED: p - [HTTP 500] boom', '', 'No successful responses.', '']);
  });
});

describe('loadPromptCorpus', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chatprobe-prompts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and trims a JSON array of prompts', async () => {
    const path = join(dir, 'prompts.json');
    await writeFile(path, JSON.stringify(['  What time is it? ', 'Tell me a joke.']));

    expect(await loadPromptCorpus(path)).toEqual(['What time is it?', 'Tell me a joke.']);
  });

  it('rejects empty prompts with their position', async () => {
    const path = join(dir, 'prompts.json');
    await writeFile(path, JSON.stringify(['ok', '   ']));

    await expect(loadPromptCorpus(path)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadPromptCorpus(path)).rejects.toThrow(/promptsFile\[1\]: /);
  });

  it('rejects a missing file', async () => {
    const path = join(dir, 'missing.json');

    await expect(loadPromptCorpus(path)).rejects.toThrow(`promptsFile: cannot read ${path}`);
  });
});
