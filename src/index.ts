export { runAction, isAction, ACTIONS } from './actions.js';
export type { Action, ActionOptions, ActionOutcome, ActionArtifacts, ActionFailureKind } from './actions.js';

export { getProfile, listProfiles, isProfileName, PROFILE_NAMES } from './config/profiles.js';
export type { BuildProfile, BuildProfileName } from './config/profiles.js';
export { resolveBuildContext } from './config/context.js';
export type { BuildContext, ToolPaths } from './config/context.js';
export { loadOptionalConfig, validateConfig } from './dx/config.js';
export type { ForgekitConfig } from './dx/config.js';
export { setDebugEnabled, setQuiet } from './dx/logger.js';

export { BuildError, isBuildError } from './errors.js';
export type { BuildErrorCode } from './errors.js';

export { discoverFiles, discoverLibrarySources, discoverTestSources } from './discovery/discoverSources.js';
export type { SourceFile, SourceGroup } from './discovery/discoverSources.js';
export { compileSource } from './build/compile.js';
export type { ObjectArtifact } from './build/compile.js';
export { archiveLibrary } from './build/archive.js';
export type { LibraryArtifact } from './build/archive.js';
export { linkExecutable, linkTest } from './build/link.js';
export type { ExecutableArtifact, TestLinkResult } from './build/link.js';
export { buildAll, buildExecutable, buildLibrary, buildTests } from './build/pipeline.js';
export type { BuildStage, BuildSummary, TestBuildReport } from './build/pipeline.js';
export { discoverTestExecutables, runTests, formatTestResults } from './testing/runTests.js';
export type { RunTestsResult, TestResult } from './testing/runTests.js';
export { setupWorkspace, cleanWorkspace } from './workspace/workspace.js';
export type { CleanReport } from './workspace/workspace.js';

export { detectToolchain } from './toolchain/detectToolchain.js';
export { spawnProcess } from './toolchain/runProcess.js';
export type { ProcessRunner, ProcessResult } from './toolchain/runProcess.js';
