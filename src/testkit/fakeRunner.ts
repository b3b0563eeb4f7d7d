import { mkdirSync, mkdtempSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';

import { resolveBuildContext, type BuildContext } from '../config/context.js';
import type { ForgekitConfig } from '../dx/config.js';
import type { ProcessResult, ProcessRunner } from '../toolchain/runProcess.js';

// Test support: an in-process stand-in for cc/ar and the built binaries.

export type FakeCall = { file: string; args: string[] };

export type FakeRunner = {
  runner: ProcessRunner;
  calls: FakeCall[];
};

export type FakeRunnerOptions = {
  /** Return a result to make that invocation fail; its output file is then not written. */
  fail?: (file: string, args: readonly string[]) => ProcessResult | undefined;
  /** Exit codes of executed binaries keyed by file name; default 0. */
  exitCodes?: Record<string, number>;
};

export function result(status: number | null, stderr = '', stdout = ''): ProcessResult {
  return { status, signal: null, stdout, stderr, timedOut: false };
}

/**
 * Writes whatever the real tool would produce: the `-o` target for the
 * compiler and linker, the archive for `ar rcs`.
 */
export function createFakeRunner(opts: FakeRunnerOptions = {}): FakeRunner {
  const calls: FakeCall[] = [];

  const runner: ProcessRunner = (file, args) => {
    calls.push({ file, args: [...args] });

    const failure = opts.fail?.(file, args);
    if (failure) return failure;

    const out = args.indexOf('-o');
    if (out !== -1) {
      const target = args[out + 1];
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, `${file} ${args.join(' ')}\n`);
      return result(0);
    }
    if (args[0] === 'rcs') {
      writeFileSync(args[1], `!<arch>\n${args.slice(2).join('\n')}\n`);
      return result(0);
    }

    const code = opts.exitCodes?.[basename(file)] ?? 0;
    return code === 0 ? result(0, '', `${basename(file)} ok`) : result(code, `${basename(file)}: assertion failed`);
  };

  return { runner, calls };
}

/** Invocations whose output is an object file. */
export function compileCalls(fake: FakeRunner): FakeCall[] {
  return fake.calls.filter((c) => c.args.includes('-c'));
}

const PAST = new Date('2024-01-01T00:00:00Z');

/**
 * Temp project with the given files (relative path -> contents), all
 * dated in the past so freshly written objects are strictly newer.
 */
export function makeProject(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), 'forgekit-proj-'));
  for (const [rel, content] of Object.entries(files)) {
    const p = join(root, rel);
    mkdirSync(dirname(p), { recursive: true });
    writeFileSync(p, content);
    utimesSync(p, PAST, PAST);
  }
  return root;
}

export const SAMPLE_PROJECT: Record<string, string> = {
  'include/core.h': 'int core_add(int a, int b);\n',
  'src/main.c': '#include "core.h"\nint main(void) { return core_add(1, 1) - 2; }\n',
  'src/core/core.c': 'int core_add(int a, int b) { return a + b; }\n',
  'src/core/vec.c': 'int vec_len(void) { return 0; }\n',
  'src/apps/demo_app.c': 'int demo_app(void) { return 0; }\n',
  'tests/test_core.c': '#include "core.h"\nint main(void) { return core_add(2, 2) != 4; }\n',
  'tests/unit_vec.c': 'int main(void) { return 0; }\n',
};

export function testContext(root: string, runner: ProcessRunner, config: ForgekitConfig = {}): BuildContext {
  return resolveBuildContext(root, { projectName: 'demo', ...config }, {
    toolchain: { compiler: 'cc', archiver: 'ar' },
    runner,
  });
}
