import { describe, it, expect } from 'vitest';
import { join } from 'node:path';

import {
  assertUniqueStems,
  discoverFiles,
  discoverLibrarySources,
  discoverTestSources,
  hasExtension,
} from './discoverSources.js';
import { BuildError } from '../errors.js';
import { createFakeRunner, makeProject, SAMPLE_PROJECT, testContext } from '../testkit/fakeRunner.js';

describe('source discovery', () => {
  it('walks recursively, filters by extension and sorts', () => {
    const root = makeProject({ 'a/z.c': '', 'a/b/y.c': '', 'a/notes.txt': '', 'a/x.h': '' });
    expect(discoverFiles(join(root, 'a'), hasExtension(['.c']))).toEqual([
      join(root, 'a', 'b', 'y.c'),
      join(root, 'a', 'z.c'),
    ]);
  });

  it('returns nothing for a missing root', () => {
    expect(discoverFiles('/nonexistent/forgekit-src', hasExtension(['.c']))).toEqual([]);
  });

  it('groups application sources apart from the library', () => {
    const root = makeProject(SAMPLE_PROJECT);
    const ctx = testContext(root, createFakeRunner().runner);

    const sources = discoverLibrarySources(ctx);
    expect(sources.map((s) => [s.relativePath, s.group])).toEqual([
      [join('apps', 'demo_app.c'), 'application'],
      [join('core', 'core.c'), 'library'],
      [join('core', 'vec.c'), 'library'],
      ['main.c', 'library'],
    ]);
    expect(sources[1].stem).toBe('core');
    expect(sources[1].mtimeMs).toBe(new Date('2024-01-01T00:00:00Z').getTime());
  });

  it('keeps test sources in their own discovery call', () => {
    const root = makeProject(SAMPLE_PROJECT);
    const ctx = testContext(root, createFakeRunner().runner);

    const tests = discoverTestSources(ctx);
    expect(tests.map((s) => s.stem)).toEqual(['test_core', 'unit_vec']);
    expect(tests.every((s) => s.group === 'test')).toBe(true);
    expect(discoverLibrarySources(ctx).some((s) => s.group === 'test')).toBe(false);
  });

  it('rejects two sources that would share an object name', () => {
    const root = makeProject({ ...SAMPLE_PROJECT, 'src/extra/core.c': 'int x;\n' });
    const ctx = testContext(root, createFakeRunner().runner);

    let caught: unknown;
    try {
      assertUniqueStems(discoverLibrarySources(ctx));
    } catch (e) {
      caught = e;
    }
    expect(caught instanceof BuildError && caught.code).toBe('OBJECT_NAME_COLLISION');
    expect(caught instanceof BuildError && caught.details?.paths).toEqual([
      join(root, 'src', 'core', 'core.c'),
      join(root, 'src', 'extra', 'core.c'),
    ]);
  });
});
