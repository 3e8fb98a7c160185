/**
 * Platform detection and OS-specific helpers
 */

import * as os from 'os';

export enum Platform {
  WINDOWS = 'windows',
  LINUX = 'linux',
  MACOS = 'darwin',
  UNKNOWN = 'unknown',
}

export function getPlatform(): Platform {
  switch (os.platform()) {
    case 'win32':
      return Platform.WINDOWS;
    case 'linux':
      return Platform.LINUX;
    case 'darwin':
      return Platform.MACOS;
    default:
      return Platform.UNKNOWN;
  }
}

export function isWindows(): boolean {
  return getPlatform() === Platform.WINDOWS;
}

export function isMacOS(): boolean {
  return getPlatform() === Platform.MACOS;
}

/**
 * 'Meta' (Cmd) on macOS, 'Control' elsewhere. Names match the key
 * vocabulary accepted by the input layer.
 */
export function getPlatformModifierKey(): string {
  return isMacOS() ? 'Meta' : 'Control';
}

/**
 * Shortcut chords for window commands, per platform.
 */
export function getWindowCommandShortcut(
  command: 'minimize' | 'maximize' | 'close',
): string[] {
  if (isMacOS()) {
    switch (command) {
      case 'minimize':
        return ['Meta', 'M'];
      case 'maximize':
        return ['Control', 'Meta', 'F'];
      case 'close':
        return ['Meta', 'W'];
    }
  }
  if (isWindows()) {
    switch (command) {
      case 'minimize':
        return ['Super', 'Down'];
      case 'maximize':
        return ['Super', 'Up'];
      case 'close':
        return ['Alt', 'F4'];
    }
  }
  switch (command) {
    case 'minimize':
      return ['Super', 'H'];
    case 'maximize':
      return ['Super', 'Up'];
    case 'close':
      return ['Alt', 'F4'];
  }
}

/**
 * Command and arguments that open a URL with the default handler.
 */
export function getUrlOpener(url: string): { command: string; args: string[] } {
  if (isWindows()) {
    return { command: 'cmd', args: ['/c', 'start', '""', url] };
  }
  if (isMacOS()) {
    return { command: 'open', args: [url] };
  }
  return { command: 'xdg-open', args: [url] };
}

export function getPlatformInfo(): {
  platform: Platform;
  arch: string;
  release: string;
  hostname: string;
} {
  return {
    platform: getPlatform(),
    arch: os.arch(),
    release: os.release(),
    hostname: os.hostname(),
  };
}

export function logPlatformInfo(logger: { log: (message: string) => void }): void {
  const info = getPlatformInfo();
  logger.log(`Platform: ${info.platform} (${info.arch})`);
  logger.log(`OS Release: ${info.release}`);
  logger.log(`Hostname: ${info.hostname}`);
}
