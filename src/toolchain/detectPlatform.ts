export type PlatformInfo = {
  platform: NodeJS.Platform;
  arch: string;
  isWindows: boolean;
  isMac: boolean;
  isLinux: boolean;
};

export function detectPlatform(platform: NodeJS.Platform = process.platform, arch: string = process.arch): PlatformInfo {
  return {
    platform,
    arch,
    isWindows: platform === 'win32',
    isMac: platform === 'darwin',
    isLinux: platform === 'linux',
  };
}
