import { describe, it, expect, afterEach, vi } from 'vitest';

import { formatTraceLine, shouldTrace, traceDebug, traceInfo } from './trace.js';

describe('trace', () => {
  const prevTrace = process.env.FORGEKIT_TRACE;
  const prevLevel = process.env.FORGEKIT_TRACE_LEVEL;

  afterEach(() => {
    vi.restoreAllMocks();
    if (prevTrace == null) delete process.env.FORGEKIT_TRACE;
    else process.env.FORGEKIT_TRACE = prevTrace;
    if (prevLevel == null) delete process.env.FORGEKIT_TRACE_LEVEL;
    else process.env.FORGEKIT_TRACE_LEVEL = prevLevel;
  });

  it('is off unless FORGEKIT_TRACE is set', () => {
    delete process.env.FORGEKIT_TRACE;
    expect(shouldTrace('error')).toBe(false);
  });

  it('filters by level, defaulting to info', () => {
    process.env.FORGEKIT_TRACE = '1';
    delete process.env.FORGEKIT_TRACE_LEVEL;
    expect(shouldTrace('info')).toBe(true);
    expect(shouldTrace('debug')).toBe(false);

    process.env.FORGEKIT_TRACE_LEVEL = 'debug';
    expect(shouldTrace('debug')).toBe(true);
  });

  it('emits one JSON payload per event', () => {
    process.env.FORGEKIT_TRACE = '1';
    process.env.FORGEKIT_TRACE_LEVEL = 'info';
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    traceInfo('build.stage', { stage: 'LIBRARY_READY' });
    traceDebug('compile.skip');

    expect(spy).toHaveBeenCalledTimes(1);
    const line = String(spy.mock.calls[0][0]);
    expect(line.startsWith('[forgekit:trace] ')).toBe(true);
    const payload: unknown = JSON.parse(line.slice('[forgekit:trace] '.length));
    expect(payload).toMatchObject({ level: 'info', event: 'build.stage', data: { stage: 'LIBRARY_READY' } });
  });

  it('omits data when none is given', () => {
    const line = formatTraceLine('warn', 'link.alias.copy');
    expect(line).not.toMatch(/"data"/);
    expect(line).toMatch(/"event":"link.alias.copy"/);
  });
});
