import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { isProfileName, type BuildProfileName } from '../config/profiles.js';
import { BuildError } from '../errors.js';
import { logDebug } from './logger.js';

export type ForgekitConfig = {
  /** Base name of the library and executable artifacts. */
  projectName?: string;
  sourceRoot?: string;
  testRoot?: string;
  /** Shared header root, passed as -I to every compilation. */
  includeRoot?: string;
  /** Directories under sourceRoot whose sources are linked into the executable but not archived. */
  appDirs?: string[];
  extensions?: string[];
  /** Name prefixes identifying test binaries in bin/. */
  testPrefixes?: string[];
  compiler?: string;
  archiver?: string;
  defaultProfile?: BuildProfileName;
  /** Per-test wall clock limit. Unset waits forever. */
  testTimeoutMs?: number;
  /** Enable debug logs without env var */
  debug?: boolean;
};

export const CONFIG_FILE = 'forgekit.config.js';

const cache = new Map<string, ForgekitConfig | null>();

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function invalid(field: string, expected: string): never {
  throw new BuildError('INVALID_CONFIG', `Invalid ${CONFIG_FILE}: "${field}" must be ${expected}`);
}

function optString(raw: Record<string, unknown>, field: string): string | undefined {
  const v = raw[field];
  if (v === undefined) return undefined;
  if (typeof v !== 'string' || !v.length) invalid(field, 'a non-empty string');
  return v;
}

function optStringList(raw: Record<string, unknown>, field: string): string[] | undefined {
  const v = raw[field];
  if (v === undefined) return undefined;
  if (!Array.isArray(v)) invalid(field, 'an array of strings');
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== 'string' || !item.length) invalid(field, 'an array of strings');
    out.push(item);
  }
  return out;
}

/**
 * Validates a raw config object (the module's default export).
 * Unknown keys are ignored.
 */
export function validateConfig(raw: unknown): ForgekitConfig {
  if (!isRecord(raw)) {
    throw new BuildError('INVALID_CONFIG', `Invalid ${CONFIG_FILE}: expected an object export`);
  }

  const cfg: ForgekitConfig = {
    projectName: optString(raw, 'projectName'),
    sourceRoot: optString(raw, 'sourceRoot'),
    testRoot: optString(raw, 'testRoot'),
    includeRoot: optString(raw, 'includeRoot'),
    appDirs: optStringList(raw, 'appDirs'),
    extensions: optStringList(raw, 'extensions'),
    testPrefixes: optStringList(raw, 'testPrefixes'),
    compiler: optString(raw, 'compiler'),
    archiver: optString(raw, 'archiver'),
  };

  const profile = optString(raw, 'defaultProfile');
  if (profile !== undefined) {
    if (!isProfileName(profile)) {
      throw new BuildError('UNKNOWN_PROFILE', `Invalid ${CONFIG_FILE}: unknown defaultProfile "${profile}"`);
    }
    cfg.defaultProfile = profile;
  }

  const timeout = raw.testTimeoutMs;
  if (timeout !== undefined) {
    if (typeof timeout !== 'number' || !Number.isFinite(timeout) || timeout <= 0) {
      invalid('testTimeoutMs', 'a positive number');
    }
    cfg.testTimeoutMs = timeout;
  }

  const debug = raw.debug;
  if (debug !== undefined) {
    if (typeof debug !== 'boolean') invalid('debug', 'a boolean');
    cfg.debug = debug;
  }

  return cfg;
}

/**
 * Loads optional `forgekit.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process and root
 */
export async function loadOptionalConfig(projectRoot: string = process.cwd()): Promise<ForgekitConfig | null> {
  const root = resolve(projectRoot);
  const hit = cache.get(root);
  if (hit !== undefined) return hit;

  const p = join(root, CONFIG_FILE);
  if (!existsSync(p)) {
    cache.set(root, null);
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const mod: unknown = await import(pathToFileURL(p).href);
  const raw = isRecord(mod) && 'default' in mod ? mod.default : mod;
  const cfg = validateConfig(raw);
  cache.set(root, cfg);
  logDebug('loaded config', { path: p });
  return cfg;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cache.clear();
}
