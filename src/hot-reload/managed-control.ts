// =============================================================================
// ManagedControl — A live control paired with the file that defines it
// =============================================================================

import type {
  ControlDescriptor,
  ControlRuntimePort,
  ReloadTarget,
} from "../ports/hot-reload.port.js";

export class ManagedControl implements ReloadTarget {
  readonly descriptor: ControlDescriptor;
  /** Absolute path of the definition file. Follows renames. */
  filePath: string;
  private readonly runtime: ControlRuntimePort;

  constructor(descriptor: ControlDescriptor, filePath: string, runtime: ControlRuntimePort) {
    this.descriptor = descriptor;
    this.filePath = filePath;
    this.runtime = runtime;
  }

  /** Re-apply the current contents of `filePath` to the live control. */
  reloadAsync(): Promise<void> {
    return this.runtime.reload({ descriptor: this.descriptor, filePath: this.filePath });
  }
}
