import { existsSync, readdirSync, statSync } from 'node:fs';
import { basename, dirname, extname, join, relative, sep } from 'node:path';

import type { BuildContext } from '../config/context.js';
import { BuildError } from '../errors.js';
import { logDebug } from '../dx/logger.js';

export type SourceGroup = 'library' | 'application' | 'test';

export type SourceFile = {
  path: string;
  group: SourceGroup;
  mtimeMs: number;
  /** Base name without extension; names the object file. */
  stem: string;
  /** Path relative to the discovery root. */
  relativePath: string;
};

export type PathPredicate = (path: string) => boolean;

export function hasExtension(extensions: readonly string[]): PathPredicate {
  const set = new Set(extensions);
  return (p) => set.has(extname(p));
}

/**
 * Recursive walk. A missing root yields no files. Results are sorted so
 * compile and link order do not depend on directory enumeration order.
 */
export function discoverFiles(rootDir: string, predicate: PathPredicate): string[] {
  const out: string[] = [];

  function walk(dir: string) {
    for (const ent of readdirSync(dir, { withFileTypes: true })) {
      const p = join(dir, ent.name);
      if (ent.isDirectory()) walk(p);
      else if (ent.isFile() && predicate(p)) out.push(p);
    }
  }

  if (!existsSync(rootDir)) return [];
  walk(rootDir);
  return out.sort();
}

function toSourceFile(root: string, path: string, group: SourceGroup): SourceFile {
  return {
    path,
    group,
    mtimeMs: statSync(path).mtimeMs,
    stem: basename(path, extname(path)),
    relativePath: relative(root, path),
  };
}

function inAppDir(relativePath: string, appDirs: readonly string[]): boolean {
  const dirs = dirname(relativePath).split(sep);
  return dirs.some((d) => appDirs.includes(d));
}

/** Sources under the source root: `library`, or `application` when inside an app directory. */
export function discoverLibrarySources(ctx: BuildContext): SourceFile[] {
  const files = discoverFiles(ctx.sourceRoot, hasExtension(ctx.extensions)).map((p) => {
    const rel = relative(ctx.sourceRoot, p);
    return toSourceFile(ctx.sourceRoot, p, inAppDir(rel, ctx.appDirs) ? 'application' : 'library');
  });
  logDebug('discovered sources', { root: ctx.sourceRoot, count: files.length });
  return files;
}

/** Test sources; each is linked on its own against the library, never archived. */
export function discoverTestSources(ctx: BuildContext): SourceFile[] {
  const files = discoverFiles(ctx.testRoot, hasExtension(ctx.extensions)).map((p) =>
    toSourceFile(ctx.testRoot, p, 'test'),
  );
  logDebug('discovered tests', { root: ctx.testRoot, count: files.length });
  return files;
}

/**
 * Object files are named by stem alone, so two sources sharing a stem
 * would overwrite each other's object. Reject instead.
 */
export function assertUniqueStems(sources: readonly SourceFile[]): void {
  const seen = new Map<string, SourceFile>();
  for (const s of sources) {
    const prev = seen.get(s.stem);
    if (prev) {
      throw new BuildError(
        'OBJECT_NAME_COLLISION',
        `Sources ${prev.path} and ${s.path} would both compile to ${s.stem}.o`,
        { paths: [prev.path, s.path] },
      );
    }
    seen.set(s.stem, s);
  }
}
