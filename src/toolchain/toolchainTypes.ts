import type { PlatformInfo } from './detectPlatform.js';

export type ToolKind = 'compiler' | 'archiver';

export type ToolInfo = {
  kind: ToolKind;
  path: string;
  version: string;
  vendor: 'gcc' | 'clang' | 'ar' | 'unknown';
};

export type ToolchainInfo = {
  compiler: ToolInfo;
  archiver: ToolInfo;
  platform: PlatformInfo;
};

export type ToolchainOverrides = {
  compiler?: string;
  archiver?: string;
};
