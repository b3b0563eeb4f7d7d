import { existsSync, mkdirSync, statSync } from 'node:fs';
import { dirname } from 'node:path';

import { requireToolchain, type BuildContext } from '../config/context.js';
import type { BuildProfile } from '../config/profiles.js';
import type { SourceFile } from '../discovery/discoverSources.js';
import { logDebug, logProgress } from '../dx/logger.js';
import { traceDebug, traceError } from '../dx/trace.js';
import { BuildError } from '../errors.js';
import { compileArgs } from '../toolchain/buildCommand.js';
import { formatDiagnostics, parseDiagnostics, summarizeDiagnostics } from '../toolchain/diagnostics.js';
import { combinedOutput, describeExit, succeeded } from '../toolchain/runProcess.js';
import { objectPath, type ObjectKind } from '../workspace/layout.js';

export type ObjectArtifact = {
  path: string;
  source: SourceFile;
  profile: BuildProfile['name'];
  /** False when the existing object was fresh and reused. */
  rebuilt: boolean;
};

export function objectKindFor(source: SourceFile): ObjectKind {
  return source.group === 'test' ? 'test_obj' : 'obj';
}

/** Fresh iff the object exists and is strictly newer than its source. */
export function isFresh(objPath: string, source: SourceFile): boolean {
  if (!existsSync(objPath)) return false;
  return statSync(objPath).mtimeMs > source.mtimeMs;
}

/**
 * Compiles one source into its object file unless the object is fresh.
 * A compiler failure throws COMPILE_FAILED with the captured output.
 */
export function compileSource(ctx: BuildContext, source: SourceFile, profile: BuildProfile): ObjectArtifact {
  const path = objectPath(ctx, profile.name, objectKindFor(source), source.stem);

  if (isFresh(path, source)) {
    traceDebug('compile.skip', { source: source.path, object: path });
    return { path, source, profile: profile.name, rebuilt: false };
  }

  const { compiler } = requireToolchain(ctx);
  const args = compileArgs({
    profile,
    sourcePath: source.path,
    objectPath: path,
    includePaths: [ctx.includeRoot, dirname(source.path)],
  });

  mkdirSync(dirname(path), { recursive: true });
  logProgress(`Compiling: ${source.relativePath}`);
  logDebug('compile', { compiler, args });
  const res = ctx.runner(compiler, args, { cwd: ctx.projectRoot });

  if (!succeeded(res)) {
    const output = combinedOutput(res);
    const diags = parseDiagnostics(output);
    const counts = summarizeDiagnostics(diags);
    const formatted = formatDiagnostics(diags);
    traceError('compile.failed', { source: source.path, status: res.status });
    throw new BuildError(
      'COMPILE_FAILED',
      `Error compiling ${source.path} (${describeExit(res)}${counts ? `, ${counts}` : ''})${formatted ? `\n\n${formatted}` : ''}`,
      { command: [compiler, ...args], status: res.status, output: res.stderr || output },
    );
  }

  return { path, source, profile: profile.name, rebuilt: true };
}

/** Compiles in order; the first failure aborts the rest. */
export function compileAll(
  ctx: BuildContext,
  sources: readonly SourceFile[],
  profile: BuildProfile,
): ObjectArtifact[] {
  return sources.map((s) => compileSource(ctx, s, profile));
}
