import { existsSync, mkdirSync, unlinkSync } from 'node:fs';
import { basename } from 'node:path';

import { requireToolchain, type BuildContext } from '../config/context.js';
import type { BuildProfile } from '../config/profiles.js';
import { logDebug, logProgress } from '../dx/logger.js';
import { traceError, traceInfo } from '../dx/trace.js';
import { BuildError } from '../errors.js';
import { archiveArgs } from '../toolchain/buildCommand.js';
import { combinedOutput, describeExit, succeeded } from '../toolchain/runProcess.js';
import { libraryPath } from '../workspace/layout.js';
import type { ObjectArtifact } from './compile.js';

export type LibraryArtifact = {
  path: string;
  profile: BuildProfile['name'];
  /** Known only when the archive was built in this invocation. */
  members?: string[];
};

/**
 * Rebuilds lib/lib<project>_<profile>.a from scratch out of the library
 * group's objects. Test and application objects are never archived.
 */
export function archiveLibrary(
  ctx: BuildContext,
  profile: BuildProfile,
  objects: readonly ObjectArtifact[],
): LibraryArtifact {
  const path = libraryPath(ctx, profile.name);
  const members = objects.filter((o) => o.source.group === 'library').map((o) => o.path);

  mkdirSync(ctx.libDir, { recursive: true });
  if (existsSync(path)) {
    unlinkSync(path);
    logDebug('removed previous archive', path);
  }

  const { archiver } = requireToolchain(ctx);
  const args = archiveArgs(path, members);
  logProgress(`Creating library: ${basename(path)}`);
  const res = ctx.runner(archiver, args, { cwd: ctx.projectRoot });

  if (!succeeded(res)) {
    traceError('archive.failed', { library: path, status: res.status });
    throw new BuildError('ARCHIVE_FAILED', `Error creating library ${path} (${describeExit(res)})`, {
      command: [archiver, ...args],
      status: res.status,
      output: res.stderr || combinedOutput(res),
    });
  }

  traceInfo('archive.done', { library: path, members: members.length });
  logProgress(`Library built: ${path}`);
  return { path, profile: profile.name, members };
}
