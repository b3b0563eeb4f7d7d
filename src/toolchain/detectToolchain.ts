import { execFileSync } from 'node:child_process';

import { BuildError } from '../errors.js';
import { isExecutable, which } from '../utils/which.js';
import { logDebug } from '../dx/logger.js';
import { detectPlatform, type PlatformInfo } from './detectPlatform.js';
import type { ToolInfo, ToolKind, ToolchainInfo, ToolchainOverrides } from './toolchainTypes.js';

function getVersion(path: string): string {
  try {
    return execFileSync(path, ['--version'], { encoding: 'utf8', stdio: ['ignore', 'pipe', 'ignore'] })
      .split('\n')[0]
      .trim();
  } catch {
    // GNU ar prints its version, BSD ar rejects the flag.
    return 'unknown';
  }
}

function vendorOf(kind: ToolKind, resolved: string, version: string): ToolInfo['vendor'] {
  if (kind === 'archiver') return 'ar';
  const probe = `${resolved} ${version}`.toLowerCase();
  if (probe.includes('clang')) return 'clang';
  if (probe.includes('gcc') || probe.includes('gnu')) return 'gcc';
  return 'unknown';
}

export function compilerCandidates(platform: PlatformInfo, override?: string): string[] {
  const primary = platform.isMac ? ['clang', 'gcc'] : ['gcc', 'clang'];
  const list = [override, process.env.CC, ...primary, 'cc'].filter((c): c is string => Boolean(c));
  return platform.isWindows ? list.map(withExe) : list;
}

export function archiverCandidates(platform: PlatformInfo, override?: string): string[] {
  const list = [override, process.env.AR, 'ar'].filter((c): c is string => Boolean(c));
  return platform.isWindows ? list.map(withExe) : list;
}

function withExe(name: string): string {
  return name.toLowerCase().endsWith('.exe') ? name : `${name}.exe`;
}

function resolveTool(kind: ToolKind, candidates: string[]): ToolInfo {
  for (const name of candidates) {
    const explicit = name.includes('/') || name.includes('\\');
    const resolved = explicit ? (isExecutable(name) ? name : null) : which(name);
    if (!resolved) continue;

    const version = getVersion(resolved);
    logDebug('tool detected', { kind, path: resolved, version });
    return { kind, path: resolved, version, vendor: vendorOf(kind, resolved, version) };
  }

  throw new BuildError('TOOLCHAIN_NOT_FOUND', `No ${kind} found (tried: ${candidates.join(', ')})`);
}

export function detectToolchain(overrides: ToolchainOverrides = {}): ToolchainInfo {
  const platform = detectPlatform();
  return {
    platform,
    compiler: resolveTool('compiler', compilerCandidates(platform, overrides.compiler)),
    archiver: resolveTool('archiver', archiverCandidates(platform, overrides.archiver)),
  };
}
