import os from 'node:os';
import path from 'node:path';

export interface PlatformContext {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  homedir: string;
}

function currentPlatform(): PlatformContext {
  return { env: process.env, platform: process.platform, homedir: os.homedir() };
}

/**
 * Per-user data directory for an application.
 *
 * - Linux and other Unix: `$XDG_DATA_HOME/<appId>` or `~/.local/share/<appId>`
 * - macOS: `~/Library/Application Support/<appId>`
 * - Windows: `%LOCALAPPDATA%\<appId>` or `~\AppData\Local\<appId>`
 */
export function userDataDir(appId: string, context: PlatformContext = currentPlatform()): string {
  const { env, platform, homedir } = context;

  if (platform === 'win32') {
    const localAppData = env.LOCALAPPDATA?.trim();
    return path.win32.join(localAppData || path.win32.join(homedir, 'AppData', 'Local'), appId);
  }

  if (platform === 'darwin') {
    return path.posix.join(homedir, 'Library', 'Application Support', appId);
  }

  // XDG requires an absolute path; relative values are ignored
  const xdgDataHome = env.XDG_DATA_HOME?.trim();
  if (xdgDataHome && path.posix.isAbsolute(xdgDataHome)) {
    return path.posix.join(xdgDataHome, appId);
  }
  return path.posix.join(homedir, '.local', 'share', appId);
}

/**
 * Parent directory under which overlays are allocated: the configured
 * override when present, else the application's user data directory.
 */
export function overlayParentDir(appId: string, dataHome?: string): string {
  return dataHome ? path.resolve(dataHome) : userDataDir(appId);
}
