import { describe, expect, it } from 'vitest';

import { decodeChunk } from '../src/index';

const TERMINAL = '{"model":"m","message":{"role":"assistant","content":" there"},"done":true,"eval_count":2,"eval_duration":1000000000}';

describe('decodeChunk', () => {
  it('decodes a content delta', () => {
    expect(decodeChunk('{"message":{"content":"Hi"}}')).toEqual({ type: 'content', text: 'Hi' });
  });

  it('decodes the terminal chunk with its metrics and trailing content', () => {
    expect(decodeChunk(TERMINAL)).toEqual({
      type: 'done',
      text: ' there',
      evalCount: 2,
      evalDurationNs: 1_000_000_000
    });
  });

  it('treats blank, malformed and content-free lines as unknown', () => {
    expect(decodeChunk('   ')).toEqual({ type: 'unknown' });
    expect(decodeChunk('{"message":')).toEqual({ type: 'unknown' });
    expect(decodeChunk('{"status":"pulling manifest"}')).toEqual({ type: 'unknown' });
    expect(decodeChunk('{"message":{"content":""},"done":false}')).toEqual({ type: 'unknown' });
    expect(decodeChunk('[1,2,3]')).toEqual({ type: 'unknown' });
  });

  it('ignores unrecognised fields', () => {
    const line = '{"message":{"role":"assistant","content":"ok","images":null,"tool_calls":[]},"new_field":{"x":1}}';
    expect(decodeChunk(line)).toEqual({ type: 'content', text: 'ok' });
  });

  it('does not treat a string "true" as the completion marker', () => {
    expect(decodeChunk('{"message":{"content":"a"},"done":"true"}')).toEqual({ type: 'unknown' });
  });

  describe('scan mode', () => {
    it('agrees with the structured decoder on well-formed chunks', () => {
      expect(decodeChunk(TERMINAL, 'scan')).toEqual(decodeChunk(TERMINAL, 'structured'));
      expect(decodeChunk('{"message":{"content":"Hi"}}', 'scan')).toEqual({ type: 'content', text: 'Hi' });
    });

    it('recovers content from a line that is not valid JSON', () => {
      const truncated = '{"message":{"content":"Hi"}';
      expect(decodeChunk(truncated, 'structured')).toEqual({ type: 'unknown' });
      expect(decodeChunk(truncated, 'scan')).toEqual({ type: 'content', text: 'Hi' });
    });

    it('accepts one space before true in the completion marker', () => {
      const line = '{"message":{"content":""},"done": true,"eval_count":3,"eval_duration":1500000000}';
      expect(decodeChunk(line, 'scan')).toEqual({ type: 'done', text: '', evalCount: 3, evalDurationNs: 1_500_000_000 });
    });

    it('does not read done:false as terminal', () => {
      expect(decodeChunk('{"message":{"content":"x"},"done":false}', 'scan')).toEqual({ type: 'content', text: 'x' });
    });
  });
});
