import { performance } from 'node:perf_hooks';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

export type TraceData = Record<string, unknown>;

function envTraceEnabled(): boolean {
  const v = process.env.FORGEKIT_TRACE;
  return v === '1' || v === 'true' || v === 'yes';
}

function envTraceLevel(): TraceLevel {
  const v = (process.env.FORGEKIT_TRACE_LEVEL ?? '').toLowerCase();
  if (v === 'error' || v === 'warn' || v === 'info' || v === 'debug') return v;
  return 'info';
}

const order: Record<TraceLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function shouldTrace(level: TraceLevel): boolean {
  if (!envTraceEnabled()) return false;
  return order[level] <= order[envTraceLevel()];
}

export function formatTraceLine(level: TraceLevel, event: string, data?: TraceData): string {
  const payload: { t: number; pid: number; level: TraceLevel; event: string; data?: TraceData } = {
    t: Number(performance.now().toFixed(3)),
    pid: process.pid,
    level,
    event,
  };
  if (data !== undefined) payload.data = data;
  return `[forgekit:trace] ${JSON.stringify(payload)}`;
}

export function trace(level: TraceLevel, event: string, data?: TraceData) {
  if (!shouldTrace(level)) return;
  // eslint-disable-next-line no-console
  console.log(formatTraceLine(level, event, data));
}

export function traceError(event: string, data?: TraceData) {
  trace('error', event, data);
}

export function traceWarn(event: string, data?: TraceData) {
  trace('warn', event, data);
}

export function traceInfo(event: string, data?: TraceData) {
  trace('info', event, data);
}

export function traceDebug(event: string, data?: TraceData) {
  trace('debug', event, data);
}
