// =============================================================================
// ui-hot-reload — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ControlType,
  ControlDescriptor,
  DiscoverySource,
  ReloadTarget,
  ControlRuntimePort,
  ControlDiscoveryPort,
  UriResolverPort,
  FileWatchSourcePort,
  ChangedHandler,
  MovedHandler,
  WatchErrorHandler,
} from "./ports/hot-reload.port.js";
export type { LoggingPort, LogEntry, LogLevel } from "./ports/logging.port.js";

// ─────────────────────────────────────────────────────────────────────────────
// Core
// ─────────────────────────────────────────────────────────────────────────────

export {
  HotReloadContext,
  type HotReloadContextOptions,
  type WatchSourceFactory,
  type WatchSourceRequest,
} from "./hot-reload/hot-reload-context.js";
export { ControlRegistry, type ControlRegistryDeps } from "./hot-reload/control-registry.js";
export { ManagedControl } from "./hot-reload/managed-control.js";
export { PathResolver } from "./hot-reload/path-resolver.js";
export { HotReloadError, NotFoundError, InvalidArgumentError } from "./hot-reload/errors.js";
export {
  HotReloadConfigSchema,
  LogLevelSchema,
  resolveHotReloadConfig,
  hotReloadConfigFromEnv,
  type HotReloadConfig,
  type HotReloadConfigInput,
} from "./hot-reload/config.js";

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

export { FileWatcherAdapter, type FileWatcherOptions } from "./adapters/hot-reload/file-watcher.adapter.js";
export {
  ModuleScannerAdapter,
  isControlClass,
  type ControlClass,
  type ModuleScannerOptions,
} from "./adapters/hot-reload/module-scanner.adapter.js";
export { UriResolverAdapter } from "./adapters/hot-reload/uri-resolver.adapter.js";
export { ConsoleLoggingAdapter, type ConsoleLoggingOptions } from "./adapters/logging/console-logging.adapter.js";

// ─────────────────────────────────────────────────────────────────────────────
// Utilities
// ─────────────────────────────────────────────────────────────────────────────

export { resolveUserDataDir, type UserDataDirOptions } from "./utils/user-data-dir.js";
