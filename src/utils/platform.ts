/**
 * Platform-specific utility functions
 */

export interface ShellInvocation {
  file: string;
  args: string[];
}

/**
 * Returns how a command line is handed to the platform shell.
 *
 * - Windows: powershell -NoProfile -Command
 * - Others:  /bin/sh -c
 */
export function getShellInvocation(command: string, platform: NodeJS.Platform = process.platform): ShellInvocation {
  if (platform === 'win32') {
    return { file: 'powershell', args: ['-NoProfile', '-Command', command] };
  }
  return { file: '/bin/sh', args: ['-c', command] };
}

export function getPlatformLabel(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case 'win32':
      return 'Windows (PowerShell)';
    case 'darwin':
      return 'macOS (sh)';
    default:
      return 'Linux (sh)';
  }
}
