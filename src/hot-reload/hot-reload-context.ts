// =============================================================================
// HotReloadContext — Drives live control reloads from UI definition file events
// =============================================================================

import { statSync } from "node:fs";
import type {
  ControlDescriptor,
  ControlDiscoveryPort,
  ControlRuntimePort,
  DiscoverySource,
  FileWatchSourcePort,
  UriResolverPort,
} from "../ports/hot-reload.port.js";
import type { LoggingPort } from "../ports/logging.port.js";
import { ConsoleLoggingAdapter } from "../adapters/logging/console-logging.adapter.js";
import { FileWatcherAdapter } from "../adapters/hot-reload/file-watcher.adapter.js";
import { ModuleScannerAdapter } from "../adapters/hot-reload/module-scanner.adapter.js";
import { UriResolverAdapter } from "../adapters/hot-reload/uri-resolver.adapter.js";
import { resolveHotReloadConfig, type HotReloadConfig, type HotReloadConfigInput } from "./config.js";
import { ControlRegistry } from "./control-registry.js";
import { HotReloadError, InvalidArgumentError, NotFoundError } from "./errors.js";
import type { ManagedControl } from "./managed-control.js";
import { PathResolver } from "./path-resolver.js";

export interface WatchSourceRequest {
  rootPath: string;
  files: string[];
  paths: PathResolver;
  debounceMs: number;
}

export type WatchSourceFactory = (request: WatchSourceRequest) => FileWatchSourcePort;

export interface HotReloadContextOptions {
  /** The UI runtime that performs the actual reload. */
  runtime: ControlRuntimePort;
  discovery?: ControlDiscoveryPort;
  uriResolver?: UriResolverPort;
  /** Defaults to a console logger scoped "hotreload" at `config.logLevel`. */
  logger?: LoggingPort;
  paths?: PathResolver;
  createWatchSource?: WatchSourceFactory;
  config?: HotReloadConfigInput;
}

interface InFlightReload {
  rerun: boolean;
}

const defaultWatchSource: WatchSourceFactory = (request) => new FileWatcherAdapter(request);

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

export class HotReloadContext {
  readonly rootPath: string;
  private readonly registry: ControlRegistry;
  private readonly watcher: FileWatchSourcePort;
  private readonly logger: LoggingPort;
  private readonly config: HotReloadConfig;
  private readonly inFlight = new Map<ManagedControl, InFlightReload>();
  private readonly pending = new Set<Promise<void>>();
  private readonly unsubscribers: Array<() => void>;
  private enabled: boolean;
  private disposed = false;

  private constructor(
    rootPath: string,
    descriptors: ControlDescriptor[],
    options: HotReloadContextOptions,
    config: HotReloadConfig,
  ) {
    const paths = options.paths ?? new PathResolver();
    this.config = config;
    this.logger = options.logger ?? new ConsoleLoggingAdapter({ minLevel: config.logLevel });
    this.rootPath = paths.normalize(rootPath);

    this.registry = ControlRegistry.seed(descriptors, this.rootPath, {
      paths,
      uriResolver: options.uriResolver ?? new UriResolverAdapter(paths),
      runtime: options.runtime,
      logger: this.logger,
    });

    const createWatchSource = options.createWatchSource ?? defaultWatchSource;
    this.watcher = createWatchSource({
      rootPath: this.rootPath,
      files: this.registry.files(),
      paths,
      debounceMs: config.debounceMs,
    });
    this.unsubscribers = [
      this.watcher.onChanged((path) => this.handleChanged(path)),
      this.watcher.onMoved((oldPath, newPath) => this.handleMoved(oldPath, newPath)),
      this.watcher.onError((error) => this.handleError(error)),
    ];

    this.enabled = config.enabled;
    this.logger.info("Hot reload context created", {
      rootPath: this.rootPath,
      controls: this.registry.size,
      enabled: this.enabled,
    });
  }

  /**
   * Watch every control the discovery port finds in `source`, resolving
   * definition files under `rootPath`.
   */
  static fromDiscoverySource(
    source: DiscoverySource,
    rootPath: string,
    options: HotReloadContextOptions,
  ): HotReloadContext {
    if (typeof rootPath !== "string" || rootPath.length === 0) {
      throw new InvalidArgumentError("rootPath", "must be a non-empty string");
    }
    if (!isDirectory(rootPath)) throw new NotFoundError("directory", rootPath);

    const config = resolveHotReloadConfig(options.config);
    const discovery = options.discovery ?? new ModuleScannerAdapter();

    let descriptors: ControlDescriptor[];
    try {
      descriptors = discovery.findControls(source);
    } catch (err) {
      if (err instanceof HotReloadError) throw err;
      throw new InvalidArgumentError("source", `control discovery failed: ${String(err)}`);
    }
    if (descriptors.length === 0) {
      throw new InvalidArgumentError("source", "no hot-reloadable controls were found");
    }

    return new HotReloadContext(rootPath, descriptors, options, config);
  }

  /**
   * Start from one live control and the file that defines it. The project
   * root is derived from the control's source URI.
   */
  static fromSingleControl(
    control: object,
    filePath: string,
    options: HotReloadContextOptions,
  ): HotReloadContext {
    if (typeof filePath !== "string" || filePath.length === 0) {
      throw new InvalidArgumentError("filePath", "must be a non-empty string");
    }
    if (!isFile(filePath)) throw new NotFoundError("file", filePath);

    const paths = options.paths ?? new PathResolver();
    const discovery = options.discovery ?? new ModuleScannerAdapter();
    const uriResolver = options.uriResolver ?? new UriResolverAdapter(paths);

    const found = discovery.sourceOf(control);
    if (!found) {
      throw new InvalidArgumentError(
        "control",
        "not a user-defined control; could not determine its URI",
      );
    }

    const rootPath = uriResolver.resolveHostPath(found.descriptor.uri, paths.normalize(filePath));
    return HotReloadContext.fromDiscoverySource(found.source, rootPath, {
      ...options,
      paths,
      discovery,
      uriResolver,
    });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  enable(): void {
    if (this.disposed) return;
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  /** Registry keys. Always equal to the watch source's watched set. */
  trackedPaths(): string[] {
    return this.registry.keys();
  }

  controls(): ManagedControl[] {
    return this.registry.controls();
  }

  /** Resolves once every reload dispatched so far has settled. */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** Stop reacting to file events and release the watch. Reloads already running finish on their own. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.enabled = false;

    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers.length = 0;
    this.watcher.close();
    this.logger.debug("Hot reload context disposed", { rootPath: this.rootPath });
  }

  // ===========================================================================
  // Event handlers
  // ===========================================================================

  private handleChanged(path: string): void {
    if (!this.enabled) return;

    const control = this.registry.lookup(path);
    if (!control) {
      this.logger.debug("Change to an untracked file ignored", { path });
      return;
    }

    const running = this.inFlight.get(control);
    if (running && this.config.coalesceReloads) {
      running.rerun = true;
      return;
    }

    const entry: InFlightReload = { rerun: false };
    if (this.config.coalesceReloads) this.inFlight.set(control, entry);

    const promise = this.runReload(control, entry);
    this.pending.add(promise);
    void promise.finally(() => this.pending.delete(promise));
  }

  private handleMoved(oldPath: string, newPath: string): void {
    const control = this.registry.rekey(oldPath, newPath);
    if (!control) return;

    this.watcher.retarget(oldPath, newPath);
    this.logger.info("Tracking renamed control file", {
      type: control.descriptor.typeName,
      oldPath,
      newPath: control.filePath,
    });
  }

  private handleError(error: Error): void {
    this.logger.error("Unexpected error while monitoring file changes", {
      rootPath: this.rootPath,
      error,
    });
  }

  // Never rejects: every failure is logged here.
  private async runReload(control: ManagedControl, entry: InFlightReload): Promise<void> {
    // Let the event handler return before the runtime starts working.
    await Promise.resolve();
    try {
      do {
        entry.rerun = false;
        await this.reloadOnce(control);
      } while (entry.rerun && this.enabled);
    } finally {
      if (this.inFlight.get(control) === entry) this.inFlight.delete(control);
    }
  }

  private async reloadOnce(control: ManagedControl): Promise<void> {
    try {
      await control.reloadAsync();
      this.logger.info("Reloaded control", {
        type: control.descriptor.typeName,
        uri: control.descriptor.uri,
      });
    } catch (error) {
      this.logger.error(
        `Failed to reload ${control.descriptor.typeName} (${control.descriptor.uri})`,
        {
          type: control.descriptor.typeName,
          uri: control.descriptor.uri,
          filePath: control.filePath,
          error,
        },
      );
    }
  }
}
