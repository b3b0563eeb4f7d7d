import { spawnSync } from 'node:child_process';

export type ProcessResult = {
  /** Exit code; null when the process was killed or never started. */
  status: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** Spawn failure (ENOENT, EACCES, timeout). */
  error?: Error;
  timedOut: boolean;
};

export type RunOptions = {
  cwd?: string;
  timeoutMs?: number;
};

/**
 * Blocking subprocess call. Every toolchain invocation and test execution
 * goes through one of these so tests can substitute the toolchain.
 */
export type ProcessRunner = (file: string, args: readonly string[], options?: RunOptions) => ProcessResult;

export const spawnProcess: ProcessRunner = (file, args, options = {}) => {
  const res = spawnSync(file, [...args], {
    cwd: options.cwd,
    encoding: 'utf8',
    stdio: ['ignore', 'pipe', 'pipe'],
    timeout: options.timeoutMs,
    killSignal: 'SIGKILL',
  });

  const timedOut = res.error !== undefined && 'code' in res.error && res.error.code === 'ETIMEDOUT';

  return {
    status: res.status,
    signal: res.signal,
    stdout: res.stdout ?? '',
    stderr: res.stderr ?? '',
    error: res.error,
    timedOut,
  };
};

export function succeeded(res: ProcessResult): boolean {
  return !res.error && res.status === 0;
}

/** Human-readable reason a process did not exit cleanly. */
export function describeExit(res: ProcessResult): string {
  if (res.timedOut) return 'timed out';
  if (res.error) return res.error.message;
  if (res.signal) return `killed by ${res.signal}`;
  return `exit ${res.status ?? 'unknown'}`;
}

export function combinedOutput(res: ProcessResult): string {
  return [res.stderr, res.stdout].filter((s) => s.trim().length > 0).join('\n').trim();
}
