import { BuildError } from '../errors.js';

export type BuildProfileName = 'debug' | 'release' | 'profile';

export type BuildProfile = {
  readonly name: BuildProfileName;
  readonly compilerFlags: readonly string[];
  readonly linkerFlags: readonly string[];
};

function defineProfile(name: BuildProfileName, cflags: string, ldflags: string): BuildProfile {
  return Object.freeze({
    name,
    compilerFlags: Object.freeze(cflags.split(' ')),
    linkerFlags: Object.freeze(ldflags.split(' ')),
  });
}

const PROFILES: Readonly<Record<BuildProfileName, BuildProfile>> = Object.freeze({
  debug: defineProfile('debug', '-Wall -Wextra -g -O0 -DDEBUG=1', '-lm -pthread'),
  release: defineProfile('release', '-Wall -Wextra -O3 -DNDEBUG', '-lm -pthread -flto'),
  // gprof instrumentation
  profile: defineProfile('profile', '-Wall -Wextra -g -O2 -pg', '-lm -pthread -pg'),
});

export const PROFILE_NAMES: readonly BuildProfileName[] = ['debug', 'release', 'profile'];

export function isProfileName(name: string): name is BuildProfileName {
  return (PROFILE_NAMES as readonly string[]).includes(name);
}

export function getProfile(name: string): BuildProfile {
  if (!isProfileName(name)) {
    throw new BuildError(
      'UNKNOWN_PROFILE',
      `Unknown build configuration: ${name} (expected: ${PROFILE_NAMES.join('|')})`,
    );
  }
  return PROFILES[name];
}

export function listProfiles(): BuildProfile[] {
  return PROFILE_NAMES.map((n) => PROFILES[n]);
}
