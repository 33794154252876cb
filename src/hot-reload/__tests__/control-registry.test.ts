import { describe, it, expect, vi } from "vitest";
import { ControlRegistry, type ControlRegistryDeps } from "../control-registry.js";
import { PathResolver } from "../path-resolver.js";
import { UriResolverAdapter } from "../../adapters/hot-reload/uri-resolver.adapter.js";
import type { ControlDescriptor } from "../../ports/hot-reload.port.js";
import { RecordingLogger, createFakeRuntime } from "../../__tests__/helpers/test-utils.js";

class XView {}
class YView {}

const x: ControlDescriptor = { type: XView, typeName: "XView", uri: "ui://app/X.ui" };
const y: ControlDescriptor = { type: YView, typeName: "YView", uri: "ui://app/Y.ui" };

function deps(platform: NodeJS.Platform = "linux"): ControlRegistryDeps & { logger: RecordingLogger } {
  const paths = new PathResolver(platform);
  return {
    paths,
    uriResolver: new UriResolverAdapter(paths),
    runtime: createFakeRuntime().runtime,
    logger: new RecordingLogger(),
  };
}

describe("ControlRegistry.seed", () => {
  it("keys every control by its resolved file", () => {
    const registry = ControlRegistry.seed([x, y], "/a", deps());

    expect(registry.size).toBe(2);
    expect(registry.keys()).toEqual(["/a/X.ui", "/a/Y.ui"]);
    expect(registry.lookup("/a/X.ui")?.descriptor).toBe(x);
    expect(registry.lookup("/a/Y.ui")?.descriptor).toBe(y);
  });

  it("keeps the later descriptor when two resolve to the same file", () => {
    const duplicate: ControlDescriptor = { type: YView, typeName: "YView", uri: "ui://other/X.ui" };
    const registry = ControlRegistry.seed([x, duplicate], "/a", deps());

    expect(registry.size).toBe(1);
    expect(registry.lookup("/a/X.ui")?.descriptor).toBe(duplicate);
  });
});

describe("ControlRegistry.resolve", () => {
  it("creates a control without inserting it", () => {
    const registry = new ControlRegistry(deps());
    const control = registry.resolve(x, "/root/project");

    expect(control.filePath).toBe("/root/project/X.ui");
    expect(control.descriptor).toBe(x);
    expect(registry.size).toBe(0);
  });

  it("hands the current file to the runtime on reload", async () => {
    const d = deps();
    const reload = vi.fn(async () => {});
    const registry = new ControlRegistry({ ...d, runtime: { reload } });
    const control = registry.resolve(x, "/a");

    await control.reloadAsync();

    expect(reload).toHaveBeenCalledWith({ descriptor: x, filePath: "/a/X.ui" });
  });
});

describe("ControlRegistry.lookup", () => {
  it("normalizes the path before lookup", () => {
    const registry = ControlRegistry.seed([x], "/a", deps());
    expect(registry.lookup("/a/b/../X.ui")?.descriptor).toBe(x);
  });

  it("returns undefined for an unknown path", () => {
    const registry = ControlRegistry.seed([x], "/a", deps());
    expect(registry.lookup("/a/Other.ui")).toBeUndefined();
  });

  it("matches case-insensitively on win32", () => {
    const registry = ControlRegistry.seed([x], "C:\\Project", deps("win32"));
    expect(registry.lookup("c:\\project\\x.UI")?.descriptor).toBe(x);
  });

  it("matches case-sensitively on linux", () => {
    const registry = ControlRegistry.seed([x], "/a", deps());
    expect(registry.lookup("/a/x.ui")).toBeUndefined();
  });
});

describe("ControlRegistry.rekey", () => {
  it("moves the entry and updates the control's path", () => {
    const registry = ControlRegistry.seed([x, y], "/a", deps());
    const control = registry.lookup("/a/X.ui");

    const moved = registry.rekey("/a/X.ui", "/a/Z.ui");

    expect(moved).toBe(control);
    expect(moved?.filePath).toBe("/a/Z.ui");
    expect(registry.lookup("/a/X.ui")).toBeUndefined();
    expect(registry.lookup("/a/Z.ui")).toBe(control);
    expect(registry.keys().sort()).toEqual(["/a/Y.ui", "/a/Z.ui"]);
  });

  it("logs a miss at debug level and changes nothing", () => {
    const d = deps();
    const registry = ControlRegistry.seed([x], "/a", d);

    expect(registry.rekey("/a/Missing.ui", "/a/Z.ui")).toBeUndefined();
    expect(registry.keys()).toEqual(["/a/X.ui"]);
    expect(d.logger.entries).toHaveLength(1);
    expect(d.logger.entries[0]).toMatchObject({
      level: "debug",
      message: "Rename of an untracked file ignored",
      data: { oldPath: "/a/Missing.ui", newPath: "/a/Z.ui" },
    });
  });

  it("keeps the original case of the new path on win32", () => {
    const registry = ControlRegistry.seed([x], "C:\\Project", deps("win32"));
    const moved = registry.rekey("c:\\project\\x.ui", "C:\\Project\\Views\\Main.ui");

    expect(moved?.filePath).toBe("C:\\Project\\Views\\Main.ui");
    expect(registry.keys()).toEqual(["c:\\project\\views\\main.ui"]);
    expect(registry.files()).toEqual(["C:\\Project\\Views\\Main.ui"]);
  });
});
