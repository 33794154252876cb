// =============================================================================
// PathResolver — Absolute path normalization and platform-aware lookup keys
// =============================================================================

import * as path from "node:path";

/** Platforms whose default file systems compare names case-insensitively. */
const CASE_INSENSITIVE_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set(["win32", "darwin"]);

export class PathResolver {
  readonly platform: NodeJS.Platform;
  readonly caseSensitive: boolean;
  readonly path: path.PlatformPath;

  constructor(platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
    this.caseSensitive = !CASE_INSENSITIVE_PLATFORMS.has(platform);
    this.path = platform === "win32" ? path.win32 : path.posix;
  }

  /** Absolute, normalized form of `p`, resolved against `base` when relative. */
  normalize(p: string, base?: string): string {
    return base === undefined ? this.path.resolve(p) : this.path.resolve(base, p);
  }

  /** Lookup key: the normalized path, case-folded where the platform ignores case. */
  key(p: string): string {
    const normalized = this.normalize(p);
    return this.caseSensitive ? normalized : normalized.toLowerCase();
  }

  equals(a: string, b: string): boolean {
    return this.key(a) === this.key(b);
  }
}
