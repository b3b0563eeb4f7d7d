import { describe, it, expect } from 'vitest';

import { getProfile, isProfileName, listProfiles } from './profiles.js';
import { BuildError } from '../errors.js';

describe('build profiles', () => {
  it('returns the flag sets of a registered profile', () => {
    const release = getProfile('release');
    expect(release.name).toBe('release');
    expect(release.compilerFlags).toEqual(['-Wall', '-Wextra', '-O3', '-DNDEBUG']);
    expect(release.linkerFlags).toEqual(['-lm', '-pthread', '-flto']);
  });

  it('has materially different flags per profile', () => {
    expect(getProfile('debug').compilerFlags).toContain('-O0');
    expect(getProfile('debug').compilerFlags).toContain('-g');
    expect(getProfile('profile').compilerFlags).toContain('-pg');
    expect(getProfile('profile').linkerFlags).toContain('-pg');
    expect(getProfile('release').compilerFlags).not.toContain('-g');
  });

  it('rejects an unknown profile name', () => {
    let caught: unknown;
    try {
      getProfile('fast');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(BuildError);
    expect(caught instanceof BuildError && caught.code).toBe('UNKNOWN_PROFILE');
  });

  it('profiles are frozen', () => {
    const debug = getProfile('debug');
    expect(Object.isFrozen(debug)).toBe(true);
    expect(Object.isFrozen(debug.compilerFlags)).toBe(true);
  });

  it('lists all three profiles', () => {
    expect(listProfiles().map((p) => p.name)).toEqual(['debug', 'release', 'profile']);
    expect(isProfileName('profile')).toBe(true);
    expect(isProfileName('Debug')).toBe(false);
  });
});
