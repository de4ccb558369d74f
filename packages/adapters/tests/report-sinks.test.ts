import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileReportSink, MemoryReportSink } from '../src/index';

describe('FileReportSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chatprobe-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the directory and appends without truncating', async () => {
    const path = join(dir, 'results', 'latency_log.txt');
    const sink = new FileReportSink(path);

    await sink.append(['first run', '']);
    await sink.append(['second run']);

    expect(sink.location).toBe(path);
    expect(await readFile(path, 'utf8')).toBe('first run\n\nsecond run\n');
  });
});

describe('MemoryReportSink', () => {
  it('collects appended lines', async () => {
    const sink = new MemoryReportSink();

    await sink.append(['a', 'b']);
    await sink.append(['c']);

    expect(sink.lines).toEqual(['a', 'b', 'c']);
    expect(sink.location).toBe('memory://report');
  });
});
