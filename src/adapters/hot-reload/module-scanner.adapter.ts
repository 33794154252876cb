// =============================================================================
// ModuleScannerAdapter — Discovers control classes in ES module namespaces
// =============================================================================

import type {
  ControlDescriptor,
  ControlDiscoveryPort,
  ControlType,
  DiscoverySource,
} from "../../ports/hot-reload.port.js";
import { InvalidArgumentError } from "../../hot-reload/errors.js";

/**
 * A control class. It declares where its definition lives:
 *
 * ```ts
 * export class MainWindow extends Window {
 *   static readonly uiSource = "ui://app/views/MainWindow.ui";
 * }
 * ```
 */
export type ControlClass = ControlType & { readonly uiSource: string; readonly name: string };

export function isControlClass(value: unknown): value is ControlClass {
  return (
    typeof value === "function" &&
    "uiSource" in value &&
    typeof value.uiSource === "string" &&
    value.uiSource.length > 0
  );
}

function describe(type: ControlClass): ControlDescriptor {
  return { type, typeName: type.name || "<anonymous>", uri: type.uiSource };
}

export interface ModuleScannerOptions {
  /**
   * Modules searched by `sourceOf` for the module that exports a control's
   * class. A class found in none of them is treated as a module of its own.
   */
  modules?: DiscoverySource[];
}

export class ModuleScannerAdapter implements ControlDiscoveryPort {
  private readonly modules: DiscoverySource[];

  constructor(options: ModuleScannerOptions = {}) {
    this.modules = options.modules ?? [];
  }

  findControls(source: DiscoverySource): ControlDescriptor[] {
    if (typeof source !== "object" || source === null) {
      throw new InvalidArgumentError("source", "expected a module namespace object");
    }

    // A class re-exported under several names is one control.
    const seen = new Set<ControlClass>();
    const controls: ControlDescriptor[] = [];
    for (const value of Object.values(source)) {
      if (!isControlClass(value) || seen.has(value)) continue;
      seen.add(value);
      controls.push(describe(value));
    }
    return controls;
  }

  sourceOf(control: object): { source: DiscoverySource; descriptor: ControlDescriptor } | undefined {
    const type: unknown = Object.getPrototypeOf(control)?.constructor;
    if (!isControlClass(type)) return undefined;

    const source =
      this.modules.find((m) => Object.values(m).includes(type)) ?? { [type.name]: type };
    return { source, descriptor: describe(type) };
  }
}
