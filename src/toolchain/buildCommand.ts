import type { BuildProfile } from '../config/profiles.js';

export type CompileCommandRequest = {
  profile: BuildProfile;
  sourcePath: string;
  objectPath: string;
  /** Header search paths (translated to -I). Shared root first, then the source's own directory. */
  includePaths: string[];
};

export function compileArgs(request: CompileCommandRequest): string[] {
  return [
    ...request.profile.compilerFlags,
    ...request.includePaths.map((p) => `-I${p}`),
    '-c',
    request.sourcePath,
    '-o',
    request.objectPath,
  ];
}

export function archiveArgs(libraryPath: string, objectPaths: readonly string[]): string[] {
  return ['rcs', libraryPath, ...objectPaths];
}

export function linkExecutableArgs(
  profile: BuildProfile,
  objectPaths: readonly string[],
  outputPath: string,
): string[] {
  return [...objectPaths, ...profile.linkerFlags, '-o', outputPath];
}

// The archive goes after the object so the linker resolves the test's
// references against it.
export function linkTestArgs(
  profile: BuildProfile,
  testObjectPath: string,
  libraryPath: string,
  outputPath: string,
): string[] {
  return [testObjectPath, libraryPath, ...profile.linkerFlags, '-o', outputPath];
}
