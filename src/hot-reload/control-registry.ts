// =============================================================================
// ControlRegistry — Managed controls keyed by normalized file path
// =============================================================================

import type {
  ControlDescriptor,
  ControlRuntimePort,
  UriResolverPort,
} from "../ports/hot-reload.port.js";
import type { LoggingPort } from "../ports/logging.port.js";
import { ManagedControl } from "./managed-control.js";
import type { PathResolver } from "./path-resolver.js";

export interface ControlRegistryDeps {
  paths: PathResolver;
  uriResolver: UriResolverPort;
  runtime: ControlRuntimePort;
  logger: LoggingPort;
}

export class ControlRegistry {
  private readonly entries = new Map<string, ManagedControl>();
  private readonly deps: ControlRegistryDeps;

  constructor(deps: ControlRegistryDeps) {
    this.deps = deps;
  }

  /**
   * Build a registry from descriptors in order. Two descriptors resolving to
   * the same file leave the later one registered.
   */
  static seed(
    descriptors: Iterable<ControlDescriptor>,
    rootPath: string,
    deps: ControlRegistryDeps,
  ): ControlRegistry {
    const registry = new ControlRegistry(deps);
    for (const descriptor of descriptors) {
      registry.insert(registry.resolve(descriptor, rootPath));
    }
    return registry;
  }

  /** Create the managed control for a descriptor under `rootPath`. Does not insert it. */
  resolve(descriptor: ControlDescriptor, rootPath: string): ManagedControl {
    const filePath = this.deps.paths.normalize(
      this.deps.uriResolver.resolvePathFromUri(rootPath, descriptor.uri),
    );
    return new ManagedControl(descriptor, filePath, this.deps.runtime);
  }

  insert(control: ManagedControl): void {
    this.entries.set(this.deps.paths.key(control.filePath), control);
  }

  lookup(path: string): ManagedControl | undefined {
    return this.entries.get(this.deps.paths.key(path));
  }

  /** Move the control registered under `oldPath` to `newPath`. Returns it, or undefined on a miss. */
  rekey(oldPath: string, newPath: string): ManagedControl | undefined {
    const oldKey = this.deps.paths.key(oldPath);
    const control = this.entries.get(oldKey);
    if (!control) {
      this.deps.logger.debug("Rename of an untracked file ignored", { oldPath, newPath });
      return undefined;
    }

    this.entries.delete(oldKey);
    control.filePath = this.deps.paths.normalize(newPath);
    this.entries.set(this.deps.paths.key(control.filePath), control);
    return control;
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /** Current file paths, in their original case. */
  files(): string[] {
    return [...this.entries.values()].map((c) => c.filePath);
  }

  controls(): ManagedControl[] {
    return [...this.entries.values()];
  }
}
