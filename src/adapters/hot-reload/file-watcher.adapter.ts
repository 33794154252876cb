// =============================================================================
// FileWatcherAdapter — Watches UI definition files under a root for hot-reload
// =============================================================================

import { existsSync, statSync, watch, type FSWatcher, type Stats } from "node:fs";
import type {
  ChangedHandler,
  FileWatchSourcePort,
  MovedHandler,
  WatchErrorHandler,
} from "../../ports/hot-reload.port.js";
import { PathResolver } from "../../hot-reload/path-resolver.js";

export interface FileWatcherOptions {
  rootPath: string;
  /** Files of interest. Events for anything else are dropped here. */
  files: Iterable<string>;
  paths?: PathResolver;
  /** Quiet period per path before an event is reported (default: 50) */
  debounceMs?: number;
}

interface WatchedFile {
  path: string;
  dev?: number;
  ino?: number;
  /** Pending expiry of the identity of a file that vanished. */
  forget?: ReturnType<typeof setTimeout>;
}

const RESTART_BASE_MS = 100;
const RESTART_MAX_MS = 5_000;

/**
 * Recursive `fs.watch` over the root. The OS reports a rename as two
 * unrelated "rename" events, so moves are recovered by matching the inode of
 * a newly appeared file against watched files that disappeared shortly
 * before. Once that window passes the vanished file's inode is forgotten,
 * since the filesystem may hand it to an unrelated file.
 *
 * Node closes the handle before emitting "error", so the watch is re-armed
 * with exponential backoff after each failure.
 */
export class FileWatcherAdapter implements FileWatchSourcePort {
  readonly rootPath: string;
  private readonly paths: PathResolver;
  private readonly debounceMs: number;
  private readonly files = new Map<string, WatchedFile>();
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly changedHandlers = new Set<ChangedHandler>();
  private readonly movedHandlers = new Set<MovedHandler>();
  private readonly errorHandlers = new Set<WatchErrorHandler>();
  private readonly moveWindowMs: number;
  private watcher: FSWatcher | null;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;
  private restartAttempts = 0;
  private closed = false;

  constructor(options: FileWatcherOptions) {
    this.paths = options.paths ?? new PathResolver();
    this.rootPath = this.paths.normalize(options.rootPath);
    this.debounceMs = options.debounceMs ?? 50;
    this.moveWindowMs = Math.max(this.debounceMs * 4, 200);

    for (const file of options.files) {
      const path = this.paths.normalize(file);
      this.files.set(this.paths.key(path), this.snapshot(path));
    }

    this.watcher = this.start();
  }

  watchedFiles(): ReadonlySet<string> {
    return new Set(this.files.keys());
  }

  onChanged(handler: ChangedHandler): () => void {
    this.changedHandlers.add(handler);
    return () => this.changedHandlers.delete(handler);
  }

  onMoved(handler: MovedHandler): () => void {
    this.movedHandlers.add(handler);
    return () => this.movedHandlers.delete(handler);
  }

  onError(handler: WatchErrorHandler): () => void {
    this.errorHandlers.add(handler);
    return () => this.errorHandlers.delete(handler);
  }

  retarget(oldPath: string, newPath: string): void {
    const oldKey = this.paths.key(oldPath);
    const entry = this.files.get(oldKey);
    if (!entry) return;

    this.files.delete(oldKey);
    entry.path = this.paths.normalize(newPath);
    this.files.set(this.paths.key(entry.path), entry);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    for (const entry of this.files.values()) this.keepIdentity(entry);
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    this.changedHandlers.clear();
    this.movedHandlers.clear();
    this.errorHandlers.clear();
  }

  // ===========================================================================
  // Internal helpers
  // ===========================================================================

  private start(): FSWatcher {
    const watcher = watch(this.rootPath, { recursive: true }, (_event, filename) => {
      this.restartAttempts = 0;
      if (filename) this.schedule(this.paths.normalize(filename, this.rootPath));
    });
    watcher.on("error", (err: unknown) => {
      this.emitError(err);
      this.restart(watcher);
    });
    return watcher;
  }

  private restart(failed: FSWatcher): void {
    if (this.closed || this.watcher !== failed) return;
    this.watcher = null;
    failed.close();
    this.scheduleRestart();
  }

  private scheduleRestart(): void {
    const delay = Math.min(RESTART_BASE_MS * 2 ** this.restartAttempts, RESTART_MAX_MS);
    this.restartAttempts++;
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      if (this.closed) return;
      try {
        this.watcher = this.start();
      } catch (err) {
        this.emitError(err);
        this.scheduleRestart();
      }
    }, delay);
  }

  private schedule(path: string): void {
    const key = this.paths.key(path);
    const pending = this.timers.get(key);
    if (pending) clearTimeout(pending);
    this.timers.set(key, setTimeout(() => {
      this.timers.delete(key);
      try {
        this.inspect(path, key);
      } catch (err) {
        this.emitError(err);
      }
    }, this.debounceMs));
  }

  private inspect(path: string, key: string): void {
    const stats = statSync(path, { throwIfNoEntry: false });
    const watched = this.files.get(key);

    if (watched) {
      if (!stats) {
        // Deleted, or the first half of a rename.
        this.forgetIdentityLater(watched);
        return;
      }
      this.keepIdentity(watched);
      watched.dev = stats.dev;
      watched.ino = stats.ino;
      this.dispatch(this.changedHandlers, watched.path);
      return;
    }

    if (!stats?.isFile()) return;
    const origin = this.findMovedFrom(stats);
    if (!origin) return;
    this.keepIdentity(origin);
    this.dispatch(this.movedHandlers, origin.path, path);
  }

  private forgetIdentityLater(entry: WatchedFile): void {
    if (entry.forget || entry.ino === undefined) return;
    entry.forget = setTimeout(() => {
      entry.forget = undefined;
      entry.dev = undefined;
      entry.ino = undefined;
    }, this.moveWindowMs);
  }

  private keepIdentity(entry: WatchedFile): void {
    if (!entry.forget) return;
    clearTimeout(entry.forget);
    entry.forget = undefined;
  }

  private dispatch<A extends unknown[]>(handlers: Set<(...args: A) => void>, ...args: A): void {
    for (const handler of [...handlers]) {
      try {
        handler(...args);
      } catch (err) {
        this.emitError(err);
      }
    }
  }

  private findMovedFrom(stats: Stats): WatchedFile | undefined {
    for (const entry of this.files.values()) {
      if (entry.ino === undefined) continue;
      if (entry.ino === stats.ino && entry.dev === stats.dev && !existsSync(entry.path)) {
        return entry;
      }
    }
    return undefined;
  }

  private snapshot(path: string): WatchedFile {
    const stats = statSync(path, { throwIfNoEntry: false });
    return { path, dev: stats?.dev, ino: stats?.ino };
  }

  private emitError(err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    for (const handler of [...this.errorHandlers]) handler(error);
  }
}
