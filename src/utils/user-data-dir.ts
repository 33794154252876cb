// =============================================================================
// User Data Directory — Per-platform location for an application's user data
// =============================================================================

import { homedir } from "node:os";
import * as path from "node:path";

export interface UserDataDirOptions {
  /** Directory name of the application inside the platform data folder. */
  appName: string;
  platform?: NodeJS.Platform;
  env?: Record<string, string | undefined>;
  homeDir?: string;
}

/**
 * - Linux and other Unix: `$XDG_DATA_HOME`, else `~/.local/share`
 * - macOS: `~/Library/Application Support`
 * - Windows: `%APPDATA%`, else `~\AppData\Roaming`
 */
export function resolveUserDataDir(options: UserDataDirOptions): string {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const home = options.homeDir ?? homedir();

  if (platform === "win32") {
    const appData = env.APPDATA || path.win32.join(home, "AppData", "Roaming");
    return path.win32.join(appData, options.appName);
  }

  const dataDir =
    platform === "darwin"
      ? path.posix.join(home, "Library", "Application Support")
      : env.XDG_DATA_HOME || path.posix.join(home, ".local", "share");
  return path.posix.join(dataDir, options.appName);
}
