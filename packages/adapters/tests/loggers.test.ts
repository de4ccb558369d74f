import { describe, expect, it } from 'vitest';

import { FakeLogger, PinoLogger } from '../src/index';

describe('FakeLogger', () => {
  it('records entries with child bindings in a shared buffer', () => {
    const root = new FakeLogger();
    const child = root.child({ component: 'benchmark' });

    root.info('starting');
    child.warn({ index: 2 }, 'prompt failed');

    expect(root.logs).toEqual([
      { level: 'info', msg: 'starting' },
      { level: 'warn', obj: { component: 'benchmark', index: 2 }, msg: 'prompt failed' }
    ]);
    expect(root.messages('warn')).toEqual(['prompt failed']);
  });
});

describe('PinoLogger', () => {
  it('wraps child loggers in the same adapter', () => {
    const logger = new PinoLogger({ level: 'silent' });

    expect(logger.child({ component: 'x' })).toBeInstanceOf(PinoLogger);
  });
});
