import { describe, it, expect, afterEach } from 'vitest';

import { getProfile } from '../config/profiles.js';
import { archiveArgs, compileArgs, linkExecutableArgs, linkTestArgs } from './buildCommand.js';
import { archiverCandidates, compilerCandidates, detectToolchain } from './detectToolchain.js';
import { detectPlatform } from './detectPlatform.js';
import { formatDiagnostics, parseDiagnostics, summarizeDiagnostics } from './diagnostics.js';
import { BuildError } from '../errors.js';

describe('command builders', () => {
  it('compiles with profile flags, both include paths and -c/-o', () => {
    expect(
      compileArgs({
        profile: getProfile('debug'),
        sourcePath: '/p/src/kernel/vfs.c',
        objectPath: '/p/build/debug/obj/vfs.o',
        includePaths: ['/p/include', '/p/src/kernel'],
      }),
    ).toEqual([
      '-Wall',
      '-Wextra',
      '-g',
      '-O0',
      '-DDEBUG=1',
      '-I/p/include',
      '-I/p/src/kernel',
      '-c',
      '/p/src/kernel/vfs.c',
      '-o',
      '/p/build/debug/obj/vfs.o',
    ]);
  });

  it('archives with rcs', () => {
    expect(archiveArgs('/p/lib/libx_debug.a', ['a.o', 'b.o'])).toEqual(['rcs', '/p/lib/libx_debug.a', 'a.o', 'b.o']);
  });

  it('links executables and tests with linker flags last before -o', () => {
    const release = getProfile('release');
    expect(linkExecutableArgs(release, ['a.o', 'b.o'], 'bin/x_release')).toEqual([
      'a.o',
      'b.o',
      '-lm',
      '-pthread',
      '-flto',
      '-o',
      'bin/x_release',
    ]);
    expect(linkTestArgs(release, 't.o', 'lib/libx_release.a', 'bin/t_release')).toEqual([
      't.o',
      'lib/libx_release.a',
      '-lm',
      '-pthread',
      '-flto',
      '-o',
      'bin/t_release',
    ]);
  });
});

describe('toolchain detection', () => {
  const prev = { CC: process.env.CC, AR: process.env.AR, PATH: process.env.PATH };

  afterEach(() => {
    for (const [k, v] of Object.entries(prev)) {
      if (v == null) delete process.env[k];
      else process.env[k] = v;
    }
  });

  it('prefers clang on macOS and gcc elsewhere', () => {
    delete process.env.CC;
    expect(compilerCandidates(detectPlatform('darwin', 'arm64'), 'my-cc')).toEqual(['my-cc', 'clang', 'gcc', 'cc']);
    expect(compilerCandidates(detectPlatform('linux', 'x64'))).toEqual(['gcc', 'clang', 'cc']);
  });

  it('honours CC and AR', () => {
    process.env.CC = 'tcc';
    process.env.AR = 'llvm-ar';
    expect(compilerCandidates(detectPlatform('linux', 'x64'))[0]).toBe('tcc');
    expect(archiverCandidates(detectPlatform('linux', 'x64'))).toEqual(['llvm-ar', 'ar']);
  });

  it('appends .exe on Windows', () => {
    delete process.env.CC;
    delete process.env.AR;
    expect(compilerCandidates(detectPlatform('win32', 'x64'))).toEqual(['gcc.exe', 'clang.exe', 'cc.exe']);
    expect(archiverCandidates(detectPlatform('win32', 'x64'))).toEqual(['ar.exe']);
  });

  it('fails with TOOLCHAIN_NOT_FOUND when nothing resolves', () => {
    delete process.env.CC;
    process.env.PATH = '';
    let caught: unknown;
    try {
      detectToolchain({ compiler: '/nonexistent/forgekit-cc' });
    } catch (e) {
      caught = e;
    }
    expect(caught instanceof BuildError && caught.code).toBe('TOOLCHAIN_NOT_FOUND');
  });
});

describe('diagnostics', () => {
  const stderr = [
    "src/kernel/vfs.c:12:7: error: expected ';' before 'return'",
    'src/kernel/vfs.c:3:1: warning: unused variable',
    '   12 |   int x = 1',
    'compilation terminated.',
  ].join('\n');

  it('parses gcc/clang lines and ignores the rest', () => {
    const diags = parseDiagnostics(stderr);
    expect(diags).toHaveLength(2);
    expect(diags[0]).toMatchObject({
      file: 'src/kernel/vfs.c',
      line: 12,
      col: 7,
      severity: 'error',
      message: "expected ';' before 'return'",
    });
    expect(diags[1].severity).toBe('warning');
  });

  it('treats fatal errors as errors', () => {
    const [d] = parseDiagnostics('a.c:1:10: fatal error: core.h: No such file or directory');
    expect(d.severity).toBe('error');
    expect(d.message).toBe('core.h: No such file or directory');
  });

  it('formats and summarises', () => {
    const diags = parseDiagnostics(stderr);
    expect(formatDiagnostics(diags)).toBe(
      "src/kernel/vfs.c:12:7 - error: expected ';' before 'return'\nsrc/kernel/vfs.c:3:1 - warning: unused variable",
    );
    expect(summarizeDiagnostics(diags)).toBe('1 error, 1 warning');
    expect(formatDiagnostics([])).toBe('');
  });
});
