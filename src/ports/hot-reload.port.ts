// =============================================================================
// HotReload Port — Contracts for watching UI definitions and reloading controls
// =============================================================================

/** Constructor of a UI control class. Used as the control's type identity. */
export type ControlType = abstract new (...args: never[]) => unknown;

/** A discoverable UI control: its type and the logical URI of its definition. */
export interface ControlDescriptor {
  readonly type: ControlType;
  readonly typeName: string;
  /** Logical source location, e.g. `ui://app/views/Main.ui`. */
  readonly uri: string;
}

/**
 * Anything that can be scanned for controls. The default discovery adapter
 * treats it as an ES module namespace (`import * as views from "./views"`).
 */
export type DiscoverySource = Readonly<Record<string, unknown>>;

/** A live control reloadable from the file currently backing it. */
export interface ReloadTarget {
  readonly descriptor: ControlDescriptor;
  readonly filePath: string;
}

/**
 * The UI runtime that re-parses a definition file and re-applies it to the
 * live instances of a control. Must tolerate overlapping calls.
 */
export interface ControlRuntimePort {
  reload(target: ReloadTarget): Promise<void>;
}

export interface ControlDiscoveryPort {
  /** Enumerate the controls of a source. Throws when the source cannot be read. */
  findControls(source: DiscoverySource): ControlDescriptor[];

  /** Map a live control instance back to its discovery source, if it has one. */
  sourceOf(control: object): { source: DiscoverySource; descriptor: ControlDescriptor } | undefined;
}

export interface UriResolverPort {
  /** Absolute file path of a logical URI under a root directory. */
  resolvePathFromUri(rootPath: string, uri: string): string;

  /** Root directory under which `uri` resolves to `filePath`. */
  resolveHostPath(uri: string, filePath: string): string;
}

export type ChangedHandler = (path: string) => void;
export type MovedHandler = (oldPath: string, newPath: string) => void;
export type WatchErrorHandler = (error: Error) => void;

/**
 * Directory-level change notifications for a fixed set of files under a root.
 * Errors are advisory: the watch stays alive after reporting one.
 */
export interface FileWatchSourcePort {
  readonly rootPath: string;

  /** Keys of the files currently watched. */
  watchedFiles(): ReadonlySet<string>;

  onChanged(handler: ChangedHandler): () => void;
  onMoved(handler: MovedHandler): () => void;
  onError(handler: WatchErrorHandler): () => void;

  /** Follow a watched file to its new path. No-op if `oldPath` is not watched. */
  retarget(oldPath: string, newPath: string): void;

  close(): void;
}
