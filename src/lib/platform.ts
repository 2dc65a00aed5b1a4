/**
 * Platform utilities
 *
 * Host platform detection for defaults that depend on where the build runs.
 */

export interface SystemInfo {
  isWindows: boolean;
  isMac: boolean;
  isLinux: boolean;
}

/**
 * Get system information for cross-platform logic
 */
export function getSystemInfo(platform: NodeJS.Platform = process.platform): SystemInfo {
  return {
    isWindows: platform === 'win32',
    isMac: platform === 'darwin',
    isLinux: platform === 'linux',
  };
}
