/**
 * Structured errors raised while building a hot reload context.
 *
 * Runtime failures (a reload that throws, a watch error) are logged and never
 * surface here; only construction-time configuration errors do:
 *
 * ```ts
 * try {
 *   HotReloadContext.fromDiscoverySource(views, "./src/ui", { runtime });
 * } catch (e) {
 *   if (e instanceof NotFoundError) { ... }
 *   if (e instanceof InvalidArgumentError) { ... }
 * }
 * ```
 *
 * @module errors
 */

/** Base error. Includes an error code for programmatic matching. */
export class HotReloadError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "HotReloadError";
    this.code = code;
  }
}

/** Thrown when a root directory or control file does not exist. */
export class NotFoundError extends HotReloadError {
  readonly path: string;
  constructor(kind: "directory" | "file", path: string) {
    super("NOT_FOUND", `${kind === "directory" ? "Directory" : "File"} not found: ${path}`);
    this.name = "NotFoundError";
    this.path = path;
  }
}

/** Thrown when an argument cannot be turned into a usable control set. */
export class InvalidArgumentError extends HotReloadError {
  readonly argument: string;
  constructor(argument: string, message: string) {
    super("INVALID_ARGUMENT", `Invalid "${argument}": ${message}`);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}
