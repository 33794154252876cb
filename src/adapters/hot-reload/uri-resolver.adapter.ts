// =============================================================================
// UriResolverAdapter — Maps logical control URIs to files and back
// =============================================================================

import type { UriResolverPort } from "../../ports/hot-reload.port.js";
import { InvalidArgumentError } from "../../hot-reload/errors.js";
import { PathResolver } from "../../hot-reload/path-resolver.js";

/**
 * Resolves URIs such as `ui://app/views/Main.ui`. The authority names the
 * owning module and is ignored; the decoded URI path is taken relative to the
 * project root.
 */
export class UriResolverAdapter implements UriResolverPort {
  private readonly paths: PathResolver;

  constructor(paths: PathResolver = new PathResolver()) {
    this.paths = paths;
  }

  resolvePathFromUri(rootPath: string, uri: string): string {
    const segments = this.segmentsOf(uri);
    return this.paths.normalize(this.paths.path.join(rootPath, ...segments));
  }

  resolveHostPath(uri: string, filePath: string): string {
    const segments = this.segmentsOf(uri);
    const p = this.paths.path;

    let rootPath = this.paths.normalize(filePath);
    for (let i = 0; i < segments.length; i++) {
      rootPath = p.dirname(rootPath);
    }

    if (!this.paths.equals(p.join(rootPath, ...segments), filePath)) {
      throw new InvalidArgumentError(
        "uri",
        `"${uri}" does not describe the file at ${filePath}`,
      );
    }
    return rootPath;
  }

  private segmentsOf(uri: string): string[] {
    let parsed: URL;
    try {
      parsed = new URL(uri);
    } catch (err) {
      throw new InvalidArgumentError("uri", `"${uri}" is not a valid URI (${String(err)})`);
    }

    const segments = parsed.pathname
      .split("/")
      .filter((s) => s.length > 0)
      .map((s) => decodeURIComponent(s));
    if (segments.length === 0) {
      throw new InvalidArgumentError("uri", `"${uri}" has no path`);
    }
    return segments;
  }
}
