import { join } from 'node:path';

import type { BuildProfileName } from '../config/profiles.js';
import type { BuildContext } from '../config/context.js';

export type ObjectKind = 'obj' | 'test_obj';

export function profileDir(ctx: BuildContext, profile: BuildProfileName): string {
  return join(ctx.buildDir, profile);
}

export function objectDir(ctx: BuildContext, profile: BuildProfileName, kind: ObjectKind): string {
  return join(profileDir(ctx, profile), kind);
}

export function objectPath(ctx: BuildContext, profile: BuildProfileName, kind: ObjectKind, stem: string): string {
  return join(objectDir(ctx, profile, kind), `${stem}.o`);
}

export function libraryPath(ctx: BuildContext, profile: BuildProfileName): string {
  return join(ctx.libDir, `lib${ctx.projectName}_${profile}.a`);
}

export function executablePath(ctx: BuildContext, profile: BuildProfileName): string {
  return join(ctx.binDir, `${ctx.projectName}_${profile}`);
}

/** Profile-independent alias of the most recently linked executable. */
export function aliasPath(ctx: BuildContext): string {
  return join(ctx.binDir, ctx.projectName);
}

export function testExecutablePath(ctx: BuildContext, profile: BuildProfileName, testStem: string): string {
  return join(ctx.binDir, `${testStem}_${profile}`);
}
