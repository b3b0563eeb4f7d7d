import { existsSync } from 'node:fs';
import { basename } from 'node:path';

import type { BuildContext } from '../config/context.js';
import type { BuildProfile } from '../config/profiles.js';
import {
  assertUniqueStems,
  discoverLibrarySources,
  discoverTestSources,
  type SourceFile,
} from '../discovery/discoverSources.js';
import { logError, logProgress } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import { aliasPath, libraryPath } from '../workspace/layout.js';
import { ensureProfileDirs, setupWorkspace } from '../workspace/workspace.js';
import { archiveLibrary, type LibraryArtifact } from './archive.js';
import { compileAll, compileSource } from './compile.js';
import { linkExecutable, linkTest, removeTestExecutable, type ExecutableArtifact } from './link.js';

/** Per-profile progression of one build invocation. */
export type BuildStage =
  | 'UNBUILT'
  | 'SOURCES_DISCOVERED'
  | 'OBJECTS_READY'
  | 'LIBRARY_READY'
  | 'EXECUTABLE_READY'
  | 'TESTS_BUILT'
  | 'TESTS_RUN';

/** A test binary that failed to link. */
export type TestBuildFailure = {
  name: string;
  reason: string;
  output: string;
};

export type TestBuildReport = {
  built: ExecutableArtifact[];
  failed: TestBuildFailure[];
};

export type BuildSummary = {
  profile: BuildProfile['name'];
  stage: BuildStage;
  library: LibraryArtifact;
  executable: ExecutableArtifact;
  tests: TestBuildReport;
};

function reached(profile: BuildProfile, stage: BuildStage) {
  traceInfo('build.stage', { profile: profile.name, stage });
}

function librarySources(sources: SourceFile[]): SourceFile[] {
  return sources.filter((s) => s.group === 'library');
}

/** Compiles the library group and rebuilds the profile's archive. */
export function buildLibrary(ctx: BuildContext, profile: BuildProfile): LibraryArtifact {
  logProgress(`\nBuilding library (${profile.name})...`);
  ensureProfileDirs(ctx, profile.name);

  const all = discoverLibrarySources(ctx);
  assertUniqueStems(all);
  logProgress(`Found ${all.length} source files`);
  reached(profile, 'SOURCES_DISCOVERED');

  const objects = compileAll(ctx, librarySources(all), profile);
  reached(profile, 'OBJECTS_READY');

  const library = archiveLibrary(ctx, profile, objects);
  reached(profile, 'LIBRARY_READY');
  return library;
}

/** Compiles library and application sources and links bin/<project>_<profile>. */
export function buildExecutable(ctx: BuildContext, profile: BuildProfile): ExecutableArtifact {
  logProgress(`\nBuilding executable (${profile.name})...`);
  ensureProfileDirs(ctx, profile.name);

  const sources = discoverLibrarySources(ctx);
  assertUniqueStems(sources);
  reached(profile, 'SOURCES_DISCOVERED');

  const objects = compileAll(ctx, sources, profile);
  reached(profile, 'OBJECTS_READY');

  const exe = linkExecutable(ctx, profile, objects);
  reached(profile, 'EXECUTABLE_READY');
  return exe;
}

function existingLibrary(ctx: BuildContext, profile: BuildProfile): LibraryArtifact | null {
  const path = libraryPath(ctx, profile.name);
  return existsSync(path) ? { path, profile: profile.name } : null;
}

/**
 * Compiles and links every test source against the profile's archive,
 * building the archive first when it is missing. A test source that fails
 * to compile stops the build; a test that fails to link is recorded and the
 * next one proceeds.
 */
export function buildTests(ctx: BuildContext, profile: BuildProfile): TestBuildReport {
  logProgress(`\nBuilding tests (${profile.name})...`);
  ensureProfileDirs(ctx, profile.name);

  const sources = discoverTestSources(ctx);
  assertUniqueStems(sources);

  const library = existingLibrary(ctx, profile) ?? buildLibrary(ctx, profile);
  const report: TestBuildReport = { built: [], failed: [] };

  for (const source of sources) {
    removeTestExecutable(ctx, profile, source.stem);
    const object = compileSource(ctx, source, profile);
    const linked = linkTest(ctx, profile, object, library);
    if (linked.ok) {
      report.built.push(linked.executable);
    } else {
      logProgress(`Error building test: ${linked.name}`);
      logError(linked.output || linked.reason);
      report.failed.push({ name: linked.name, reason: linked.reason, output: linked.output });
    }
  }

  reached(profile, 'TESTS_BUILT');
  logProgress(
    report.failed.length
      ? `Tests built: ${report.built.length} ok, ${report.failed.length} failed`
      : 'Tests built successfully',
  );
  return report;
}

export function buildAll(ctx: BuildContext, profile: BuildProfile): BuildSummary {
  logProgress(`=== Building ${ctx.projectName} (${profile.name}) ===`);
  setupWorkspace(ctx);

  const library = buildLibrary(ctx, profile);
  const executable = buildExecutable(ctx, profile);
  const tests = buildTests(ctx, profile);

  const summary: BuildSummary = { profile: profile.name, stage: 'TESTS_BUILT', library, executable, tests };
  logProgress(formatBuildSummary(ctx, summary));
  return summary;
}

export function formatBuildSummary(ctx: BuildContext, summary: BuildSummary): string {
  const lines = [
    '',
    '=== Build Complete ===',
    `Executable: ${aliasPath(ctx)} -> ${basename(summary.executable.path)}`,
    `Library: ${summary.library.path}`,
    `Tests: ${summary.tests.built.length} built`,
  ];
  for (const f of summary.tests.failed) lines.push(`  ✗ ${f.name} (link failed)`);
  return lines.join('\n');
}
