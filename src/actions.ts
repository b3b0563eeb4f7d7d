import { resolve } from 'node:path';

import { resolveBuildContext, type BuildContext, type ToolPaths } from './config/context.js';
import { getProfile, type BuildProfile, type BuildProfileName } from './config/profiles.js';
import { loadOptionalConfig, type ForgekitConfig } from './dx/config.js';
import { logDebug, setDebugEnabled } from './dx/logger.js';
import { BuildError, isBuildError } from './errors.js';
import { detectToolchain } from './toolchain/detectToolchain.js';
import type { ProcessRunner } from './toolchain/runProcess.js';
import type { LibraryArtifact } from './build/archive.js';
import type { ExecutableArtifact } from './build/link.js';
import {
  buildAll,
  buildExecutable,
  buildLibrary,
  buildTests,
  type BuildSummary,
  type TestBuildReport,
} from './build/pipeline.js';
import { discoverTestExecutables, runTests, type RunTestsResult } from './testing/runTests.js';
import { cleanWorkspace, type CleanReport } from './workspace/workspace.js';

export const ACTIONS = ['all', 'library', 'executable', 'tests', 'clean', 'run-tests'] as const;

export type Action = (typeof ACTIONS)[number];

export function isAction(v: string): v is Action {
  return (ACTIONS as readonly string[]).includes(v);
}

export type ActionOptions = {
  /** Raw profile name; validated before any work. Defaults to the config's defaultProfile, then debug. */
  profile?: string;
  /** Clean before the action (ignored for `clean` itself). */
  clean?: boolean;
  projectRoot?: string;
  /** Skip loading forgekit.config.js. */
  config?: ForgekitConfig | null;
  /** Skip toolchain detection. */
  toolchain?: ToolPaths;
  runner?: ProcessRunner;
};

export type ActionArtifacts = {
  clean?: CleanReport;
  library?: LibraryArtifact;
  executable?: ExecutableArtifact;
  tests?: TestBuildReport;
  summary?: BuildSummary;
  testRun?: RunTestsResult;
};

/** `invalid`: bad profile or config, nothing was attempted. */
export type ActionFailureKind = 'invalid' | 'build-failed' | 'tests-failed';

export type ActionOutcome =
  | { ok: true; action: Action; profile: BuildProfileName; artifacts: ActionArtifacts }
  | {
      ok: false;
      action: Action;
      kind: ActionFailureKind;
      message: string;
      error?: BuildError;
      artifacts: ActionArtifacts;
    };

function needsToolchain(action: Action): boolean {
  return action !== 'clean' && action !== 'run-tests';
}

function resolveTools(action: Action, cfg: ForgekitConfig | null, given?: ToolPaths): ToolPaths | null {
  if (given) return given;
  if (!needsToolchain(action)) return null;
  const { compiler, archiver } = detectToolchain({ compiler: cfg?.compiler, archiver: cfg?.archiver });
  return { compiler: compiler.path, archiver: archiver.path };
}

function perform(
  action: Action,
  ctx: BuildContext,
  profile: BuildProfile,
  opts: ActionOptions,
  artifacts: ActionArtifacts,
): ActionOutcome {
  switch (action) {
    case 'clean':
      artifacts.clean = cleanWorkspace(ctx);
      break;
    case 'library':
      artifacts.library = buildLibrary(ctx, profile);
      break;
    case 'executable':
      artifacts.executable = buildExecutable(ctx, profile);
      break;
    case 'tests':
      artifacts.tests = buildTests(ctx, profile);
      break;
    case 'all':
      artifacts.summary = buildAll(ctx, profile);
      break;
    case 'run-tests': {
      // An explicit --config narrows the run to that profile's binaries.
      const executables = discoverTestExecutables(ctx, opts.profile ? profile.name : undefined);
      const run = runTests(ctx, executables);
      artifacts.testRun = run;
      if (!run.allPassed) {
        const failed = run.results.filter((r) => !r.passed).length;
        return {
          ok: false,
          action,
          kind: 'tests-failed',
          message: `${failed} of ${run.results.length} tests failed`,
          artifacts,
        };
      }
      break;
    }
  }
  return { ok: true, action, profile: profile.name, artifacts };
}

/**
 * Runs one action to completion. Fatal build errors come back as an
 * outcome; nothing here exits the process.
 */
export async function runAction(action: Action, opts: ActionOptions = {}): Promise<ActionOutcome> {
  const projectRoot = resolve(opts.projectRoot ?? process.cwd());
  const artifacts: ActionArtifacts = {};

  let ctx: BuildContext;
  let profile: BuildProfile;
  try {
    const cfg = opts.config !== undefined ? opts.config : await loadOptionalConfig(projectRoot);
    if (cfg?.debug) setDebugEnabled(true);
    profile = getProfile(opts.profile ?? cfg?.defaultProfile ?? 'debug');
    ctx = resolveBuildContext(projectRoot, cfg, {
      toolchain: resolveTools(action, cfg, opts.toolchain),
      runner: opts.runner,
    });
  } catch (err) {
    if (!isBuildError(err)) throw err;
    const kind: ActionFailureKind =
      err.code === 'UNKNOWN_PROFILE' || err.code === 'INVALID_CONFIG' ? 'invalid' : 'build-failed';
    return { ok: false, action, kind, message: err.message, error: err, artifacts };
  }

  logDebug('action', { action, profile: profile.name, projectRoot });

  try {
    if (opts.clean && action !== 'clean') artifacts.clean = cleanWorkspace(ctx);
    return perform(action, ctx, profile, opts, artifacts);
  } catch (err) {
    if (!isBuildError(err)) throw err;
    return { ok: false, action, kind: 'build-failed', message: err.message, error: err, artifacts };
  }
}
