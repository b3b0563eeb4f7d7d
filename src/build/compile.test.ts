import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync, utimesSync } from 'node:fs';
import { join } from 'node:path';

import { compileAll, compileSource, isFresh } from './compile.js';
import { getProfile } from '../config/profiles.js';
import { discoverLibrarySources, discoverTestSources, type SourceFile } from '../discovery/discoverSources.js';
import { BuildError } from '../errors.js';
import { compileCalls, createFakeRunner, makeProject, result, SAMPLE_PROJECT, testContext } from '../testkit/fakeRunner.js';
import type { BuildContext } from '../config/context.js';

function source(ctx: BuildContext, stem: string): SourceFile {
  const found = [...discoverLibrarySources(ctx), ...discoverTestSources(ctx)].find((s) => s.stem === stem);
  if (!found) throw new Error(`no source ${stem}`);
  return found;
}

describe('incremental compiler', () => {
  it('invokes the compiler with profile flags and both include paths', () => {
    const root = makeProject(SAMPLE_PROJECT);
    const fake = createFakeRunner();
    const ctx = testContext(root, fake.runner);
    const core = source(ctx, 'core');

    const obj = compileSource(ctx, core, getProfile('debug'));

    expect(obj.path).toBe(join(root, 'build', 'debug', 'obj', 'core.o'));
    expect(obj.rebuilt).toBe(true);
    expect(existsSync(obj.path)).toBe(true);
    expect(fake.calls).toEqual([
      {
        file: 'cc',
        args: [
          '-Wall',
          '-Wextra',
          '-g',
          '-O0',
          '-DDEBUG=1',
          `-I${join(root, 'include')}`,
          `-I${join(root, 'src', 'core')}`,
          '-c',
          core.path,
          '-o',
          obj.path,
        ],
      },
    ]);
  });

  it('is idempotent: a fresh object is reused without spawning', () => {
    const root = makeProject(SAMPLE_PROJECT);
    const fake = createFakeRunner();
    const ctx = testContext(root, fake.runner);
    const core = source(ctx, 'core');

    const first = compileSource(ctx, core, getProfile('debug'));
    const before = readFileSync(first.path, 'utf8');
    const second = compileSource(ctx, core, getProfile('debug'));

    expect(second.rebuilt).toBe(false);
    expect(second.path).toBe(first.path);
    expect(compileCalls(fake)).toHaveLength(1);
    expect(readFileSync(second.path, 'utf8')).toBe(before);
  });

  it('recompiles once the source is newer than its object', () => {
    const root = makeProject(SAMPLE_PROJECT);
    const fake = createFakeRunner();
    const ctx = testContext(root, fake.runner);

    const first = compileSource(ctx, source(ctx, 'core'), getProfile('debug'));
    const future = new Date(Date.now() + 60_000);
    utimesSync(first.source.path, future, future);

    expect(isFresh(first.path, source(ctx, 'core'))).toBe(false);
    const again = compileSource(ctx, source(ctx, 'core'), getProfile('debug'));
    expect(again.rebuilt).toBe(true);
    expect(compileCalls(fake)).toHaveLength(2);
  });

  it('treats an object with the same mtime as its source as stale', () => {
    const root = makeProject(SAMPLE_PROJECT);
    const ctx = testContext(root, createFakeRunner().runner);
    const core = source(ctx, 'core');
    const obj = compileSource(ctx, core, getProfile('debug'));

    const t = new Date('2024-01-01T00:00:00Z');
    utimesSync(obj.path, t, t);
    expect(isFresh(obj.path, core)).toBe(false);
  });

  it('puts test objects under test_obj', () => {
    const root = makeProject(SAMPLE_PROJECT);
    const ctx = testContext(root, createFakeRunner().runner);
    const obj = compileSource(ctx, source(ctx, 'unit_vec'), getProfile('release'));
    expect(obj.path).toBe(join(root, 'build', 'release', 'test_obj', 'unit_vec.o'));
  });

  it('surfaces compiler failure as COMPILE_FAILED with stderr verbatim', () => {
    const root = makeProject(SAMPLE_PROJECT);
    const stderr = "src/core/vec.c:1:5: error: expected ';'";
    const fake = createFakeRunner({ fail: (_file, args) => (args.some((a) => a.endsWith('vec.c')) ? result(1, stderr) : undefined) });
    const ctx = testContext(root, fake.runner);

    let caught: unknown;
    try {
      compileSource(ctx, source(ctx, 'vec'), getProfile('debug'));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(BuildError);
    expect(caught instanceof BuildError && caught.code).toBe('COMPILE_FAILED');
    expect(caught instanceof BuildError && caught.details?.output).toBe(stderr);
    expect(caught instanceof BuildError && caught.details?.status).toBe(1);
    expect(existsSync(join(root, 'build', 'debug', 'obj', 'vec.o'))).toBe(false);
  });

  it('compileAll stops at the first failure', () => {
    const root = makeProject(SAMPLE_PROJECT);
    const fake = createFakeRunner({ fail: (_file, args) => (args.some((a) => a.endsWith('core.c')) ? result(1, 'boom') : undefined) });
    const ctx = testContext(root, fake.runner);
    const sources = discoverLibrarySources(ctx);

    expect(() => compileAll(ctx, sources, getProfile('debug'))).toThrow(/Error compiling/);
    // demo_app.c then core.c; vec.c and main.c never reached
    expect(compileCalls(fake)).toHaveLength(2);
  });
});
