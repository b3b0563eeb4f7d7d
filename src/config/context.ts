import { isAbsolute, join, resolve } from 'node:path';

import { BuildError } from '../errors.js';
import type { ForgekitConfig } from '../dx/config.js';
import { spawnProcess, type ProcessRunner } from '../toolchain/runProcess.js';

/** Resolved tool commands handed to the runner. */
export type ToolPaths = {
  compiler: string;
  archiver: string;
};

/**
 * Everything a stage needs, resolved once per invocation and passed
 * explicitly. Frozen; stages never mutate it.
 */
export type BuildContext = Readonly<{
  projectRoot: string;
  projectName: string;
  sourceRoot: string;
  testRoot: string;
  includeRoot: string;
  appDirs: readonly string[];
  extensions: readonly string[];
  testPrefixes: readonly string[];
  buildDir: string;
  binDir: string;
  libDir: string;
  /** null for actions that never invoke the toolchain (clean, run-tests). */
  toolchain: ToolPaths | null;
  runner: ProcessRunner;
  testTimeoutMs?: number;
}>;

export const DEFAULTS = {
  projectName: 'app',
  sourceRoot: 'src',
  testRoot: 'tests',
  includeRoot: 'include',
  appDirs: ['apps'],
  extensions: ['.c'],
  testPrefixes: ['test_', 'unit_', 'integration_'],
} as const;

export type ContextOptions = {
  toolchain?: ToolPaths | null;
  runner?: ProcessRunner;
};

function under(root: string, p: string): string {
  return isAbsolute(p) ? p : join(root, p);
}

export function resolveBuildContext(
  projectRoot: string,
  config: ForgekitConfig | null,
  opts: ContextOptions = {},
): BuildContext {
  const root = resolve(projectRoot);
  const cfg = config ?? {};

  const projectName = cfg.projectName ?? DEFAULTS.projectName;
  if (/[\\/]/.test(projectName)) {
    throw new BuildError('INVALID_CONFIG', `projectName must not contain path separators: ${projectName}`);
  }

  return Object.freeze({
    projectRoot: root,
    projectName,
    sourceRoot: under(root, cfg.sourceRoot ?? DEFAULTS.sourceRoot),
    testRoot: under(root, cfg.testRoot ?? DEFAULTS.testRoot),
    includeRoot: under(root, cfg.includeRoot ?? DEFAULTS.includeRoot),
    appDirs: Object.freeze([...(cfg.appDirs ?? DEFAULTS.appDirs)]),
    extensions: Object.freeze([...(cfg.extensions ?? DEFAULTS.extensions)]),
    testPrefixes: Object.freeze([...(cfg.testPrefixes ?? DEFAULTS.testPrefixes)]),
    buildDir: join(root, 'build'),
    binDir: join(root, 'bin'),
    libDir: join(root, 'lib'),
    toolchain: opts.toolchain ?? null,
    runner: opts.runner ?? spawnProcess,
    testTimeoutMs: cfg.testTimeoutMs,
  });
}

export function requireToolchain(ctx: BuildContext): ToolPaths {
  if (!ctx.toolchain) {
    throw new BuildError('TOOLCHAIN_NOT_FOUND', 'No toolchain resolved for this build');
  }
  return ctx.toolchain;
}
