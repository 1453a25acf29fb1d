export type PlatformInfo = {
  platform: NodeJS.Platform;
  arch: string;
  isWindows: boolean;
  isMac: boolean;
  /** Suffix of native executables (`.exe` on Windows). */
  exeSuffix: string;
  /** Suffix of Ghidra's launcher scripts (`.bat` on Windows). */
  launcherSuffix: string;
};

export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): PlatformInfo {
  const isWindows = platform === 'win32';
  return {
    platform,
    arch,
    isWindows,
    isMac: platform === 'darwin',
    exeSuffix: isWindows ? '.exe' : '',
    launcherSuffix: isWindows ? '.bat' : '',
  };
}
