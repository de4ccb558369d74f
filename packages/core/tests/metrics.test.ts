import { describe, expect, it } from 'vitest';

import {
  ProtocolError,
  StreamReadError,
  TransportError,
  describeFailure,
  rateTimeToFirstToken,
  summarizeResults,
  tokensPerSecond
} from '../src/index';

function result(timeToFirstTokenMs: number, totalMs: number, tps: number) {
  return { text: 'x', timeToFirstTokenMs, totalMs, evalTokenCount: 10, tokensPerSecond: tps };
}

describe('tokensPerSecond', () => {
  it('divides the token count by the duration in seconds', () => {
    expect(tokensPerSecond(2, 1_000_000_000)).toBe(2);
    expect(tokensPerSecond(30, 500_000_000)).toBe(60);
  });

  it('is 0 when either metric is missing', () => {
    expect(tokensPerSecond(0, 1_000_000_000)).toBe(0);
    expect(tokensPerSecond(5, 0)).toBe(0);
    expect(tokensPerSecond(5, -1)).toBe(0);
  });
});

describe('summarizeResults', () => {
  it('computes min/avg/max and averages only positive throughput', () => {
    const summary = summarizeResults([result(100, 400, 50), result(200, 500, 0), result(300, 900, 30)]);

    expect(summary).toEqual({
      completed: 3,
      attempted: 3,
      timeToFirstTokenMs: { min: 100, avg: 200, max: 300 },
      totalMs: { min: 400, avg: 600, max: 900 },
      avgTokensPerSecond: 40
    });
  });

  it('reports 0 throughput when no result has any', () => {
    expect(summarizeResults([result(10, 20, 0)], 4)?.avgTokensPerSecond).toBe(0);
    expect(summarizeResults([result(10, 20, 0)], 4)?.attempted).toBe(4);
  });

  it('returns null for an empty result set', () => {
    expect(summarizeResults([], 3)).toBeNull();
  });
});

describe('rateTimeToFirstToken', () => {
  it('rates against the 1s and 2s thresholds', () => {
    expect(rateTimeToFirstToken(999)).toBe('excellent');
    expect(rateTimeToFirstToken(1000)).toBe('acceptable');
    expect(rateTimeToFirstToken(1999)).toBe('acceptable');
    expect(rateTimeToFirstToken(2000)).toBe('slow');
  });
});

describe('describeFailure', () => {
  const timing = { elapsedMs: 12, timeToFirstTokenMs: 12 };

  it('renders protocol errors with the status code', () => {
    expect(describeFailure({ error: new ProtocolError(500), ...timing })).toBe('[HTTP 500]');
    expect(describeFailure({ error: new ProtocolError(404, "model 'x' not found"), ...timing }))
      .toBe("[HTTP 404] model 'x' not found");
  });

  it('renders other failures with the error name', () => {
    expect(describeFailure({ error: new TransportError('connect ECONNREFUSED 127.0.0.1:9'), ...timing }))
      .toBe('[ERROR] TransportError: connect ECONNREFUSED 127.0.0.1:9');
    expect(describeFailure({ error: new StreamReadError('other side closed'), ...timing }))
      .toBe('[ERROR] StreamReadError: other side closed');
  });

  it('tags each error with its kind', () => {
    expect(new TransportError('x').kind).toBe('transport');
    expect(new ProtocolError(502).kind).toBe('protocol');
    expect(new StreamReadError('x').kind).toBe('stream_read');
  });
});
