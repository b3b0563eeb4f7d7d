import { existsSync, mkdirSync, readdirSync, rmSync, unlinkSync } from 'node:fs';
import { extname, join } from 'node:path';

import type { BuildContext } from '../config/context.js';
import type { BuildProfileName } from '../config/profiles.js';
import { logDebug, logProgress } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import { objectDir } from './layout.js';

export type CleanReport = {
  removedDirs: string[];
  removedFiles: string[];
};

const STRAY_EXTS = new Set(['.o', '.a']);

function roots(ctx: BuildContext): string[] {
  return [ctx.buildDir, ctx.binDir, ctx.libDir];
}

/** Creates build/, bin/ and lib/. No-op for directories that exist. */
export function setupWorkspace(ctx: BuildContext): string[] {
  const created: string[] = [];
  for (const dir of roots(ctx)) {
    if (existsSync(dir)) continue;
    mkdirSync(dir, { recursive: true });
    created.push(dir);
    logProgress(`Created directory: ${dir}`);
  }
  return created;
}

export function ensureProfileDirs(ctx: BuildContext, profile: BuildProfileName) {
  setupWorkspace(ctx);
  mkdirSync(objectDir(ctx, profile, 'obj'), { recursive: true });
  mkdirSync(objectDir(ctx, profile, 'test_obj'), { recursive: true });
}

function sweepStrayArtifacts(dir: string, out: string[]) {
  for (const ent of readdirSync(dir, { withFileTypes: true })) {
    const p = join(dir, ent.name);
    if (ent.isDirectory()) {
      sweepStrayArtifacts(p, out);
    } else if (STRAY_EXTS.has(extname(ent.name))) {
      unlinkSync(p);
      out.push(p);
    }
  }
}

/**
 * Removes build/, bin/ and lib/ entirely, then any .o/.a left anywhere
 * else under the project root. Irreversible.
 */
export function cleanWorkspace(ctx: BuildContext): CleanReport {
  logProgress('\nCleaning build artifacts...');
  const report: CleanReport = { removedDirs: [], removedFiles: [] };

  for (const dir of roots(ctx)) {
    if (!existsSync(dir)) continue;
    rmSync(dir, { recursive: true, force: true });
    report.removedDirs.push(dir);
    logProgress(`Removed: ${dir}`);
  }

  if (existsSync(ctx.projectRoot)) {
    sweepStrayArtifacts(ctx.projectRoot, report.removedFiles);
  }
  for (const f of report.removedFiles) logDebug('removed stray artifact', f);

  traceInfo('workspace.clean', { dirs: report.removedDirs.length, files: report.removedFiles.length });
  logProgress('Clean complete');
  return report;
}
