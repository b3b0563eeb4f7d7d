import { chmodSync, copyFileSync, lstatSync, mkdirSync, symlinkSync, unlinkSync } from 'node:fs';
import { basename } from 'node:path';

import { requireToolchain, type BuildContext } from '../config/context.js';
import type { BuildProfile } from '../config/profiles.js';
import { logDebug, logProgress, logWarn } from '../dx/logger.js';
import { traceError, traceInfo, traceWarn } from '../dx/trace.js';
import { BuildError } from '../errors.js';
import { linkExecutableArgs, linkTestArgs } from '../toolchain/buildCommand.js';
import { combinedOutput, describeExit, succeeded } from '../toolchain/runProcess.js';
import { aliasPath, executablePath, testExecutablePath } from '../workspace/layout.js';
import type { LibraryArtifact } from './archive.js';
import type { ObjectArtifact } from './compile.js';

export type ExecutableArtifact = {
  path: string;
  profile: BuildProfile['name'];
  /** Set for the main executable once bin/<project> points at it. */
  alias?: string;
};

export type TestLinkResult =
  | { ok: true; name: string; executable: ExecutableArtifact }
  | { ok: false; name: string; reason: string; output: string };

function pathExists(p: string): boolean {
  try {
    lstatSync(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Points bin/<project> at the given executable: remove whatever is there
 * (including a dangling symlink), then link. Falls back to a copy where
 * symlinks are not permitted.
 */
export function replaceAlias(alias: string, target: string): void {
  if (pathExists(alias)) unlinkSync(alias);
  try {
    // Relative target keeps bin/ relocatable.
    symlinkSync(basename(target), alias);
  } catch (err) {
    traceWarn('link.alias.copy', { alias, target, error: String(err) });
    logWarn(`symlink refused, copying ${basename(target)} to ${alias}`);
    copyFileSync(target, alias);
    chmodSync(alias, 0o755);
  }
}

/** Links library + application objects into bin/<project>_<profile>. Fatal on failure. */
export function linkExecutable(
  ctx: BuildContext,
  profile: BuildProfile,
  objects: readonly ObjectArtifact[],
): ExecutableArtifact {
  const path = executablePath(ctx, profile.name);
  const { compiler } = requireToolchain(ctx);
  const args = linkExecutableArgs(
    profile,
    objects.filter((o) => o.source.group !== 'test').map((o) => o.path),
    path,
  );

  mkdirSync(ctx.binDir, { recursive: true });
  logProgress(`Linking executable: ${basename(path)}`);
  const res = ctx.runner(compiler, args, { cwd: ctx.projectRoot });

  if (!succeeded(res)) {
    traceError('link.failed', { output: path, status: res.status });
    throw new BuildError('LINK_FAILED', `Error linking executable ${path} (${describeExit(res)})`, {
      command: [compiler, ...args],
      status: res.status,
      output: res.stderr || combinedOutput(res),
    });
  }

  chmodSync(path, 0o755);
  logProgress(`Executable built: ${path}`);

  const alias = aliasPath(ctx);
  replaceAlias(alias, path);
  logDebug('alias updated', { alias, target: path });
  traceInfo('link.done', { output: path, alias });

  return { path, profile: profile.name, alias };
}

/** Removes `bin/<test>_<p>` if present, so a test that fails to build is never run. */
export function removeTestExecutable(ctx: BuildContext, profile: BuildProfile, stem: string): void {
  const path = testExecutablePath(ctx, profile.name, stem);
  if (pathExists(path)) unlinkSync(path);
}

/**
 * Links one test object against the profile's archive. A failure is
 * returned, not thrown: the remaining tests still get built.
 */
export function linkTest(
  ctx: BuildContext,
  profile: BuildProfile,
  testObject: ObjectArtifact,
  library: LibraryArtifact,
): TestLinkResult {
  const path = testExecutablePath(ctx, profile.name, testObject.source.stem);
  const name = basename(path);
  const { compiler } = requireToolchain(ctx);
  const args = linkTestArgs(profile, testObject.path, library.path, path);

  mkdirSync(ctx.binDir, { recursive: true });
  removeTestExecutable(ctx, profile, testObject.source.stem);
  logProgress(`Building test: ${name}`);
  const res = ctx.runner(compiler, args, { cwd: ctx.projectRoot });

  if (!succeeded(res)) {
    const output = combinedOutput(res);
    traceWarn('link.test.failed', { test: name, status: res.status });
    return { ok: false, name, reason: describeExit(res), output };
  }

  chmodSync(path, 0o755);
  return { ok: true, name, executable: { path, profile: profile.name } };
}
