// src/core/resources/meshRegistry.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MeshRegistry } from "@/core/resources/meshRegistry";
import { ResourceHandle } from "@/core/resources/resourceHandle";
import { RecordingBackend } from "@/core/rendering/recordingBackend";
import { generateShape } from "@/core/primitives";
import { generateBox } from "@/core/primitives/flat";
import { MIN_EXTENT } from "@/core/geometry/clamp";
import {
  DEFAULT_ATTRIBUTE_LAYOUT,
  getLayoutKey,
} from "@/core/utils/layout";

describe("MeshRegistry", () => {
  let backend: RecordingBackend;
  let registry: MeshRegistry;

  beforeEach(() => {
    backend = new RecordingBackend();
    registry = new MeshRegistry(backend);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("loading", () => {
    it("should bind the attribute layout once, before the first upload", () => {
      registry.load("cone", { slices: 3 });
      registry.load("box");
      expect(backend.calls[0]).toEqual({
        type: "bindAttributeLayout",
        layoutKey: getLayoutKey(DEFAULT_ATTRIBUTE_LAYOUT),
      });
      expect(backend.callsOfType("bindAttributeLayout")).toHaveLength(1);
      expect(registry.isLayoutBound).toBe(true);
    });

    it("should reuse a mesh loaded with equal parameters", () => {
      const a = registry.load("cone", { slices: 3, radius: 1 });
      const b = registry.load("cone", { radius: 1, slices: 3 });
      expect(a.key).toBe(b.key);
      expect(backend.callsOfType("createBuffers")).toHaveLength(1);
      expect(registry.size).toBe(1);
    });

    it("should upload exactly what the generator builds", () => {
      const params = { radius: NaN, slices: 3 };
      const handle = registry.load("cone", params);
      const mesh = registry.getMesh(handle);
      const contents = backend.getContents(mesh.buffers);

      expect(contents && Array.from(contents.vertices)).toEqual(
        Array.from(generateShape("cone", params).vertices),
      );
      expect(mesh.aabb.max[0]).toBeCloseTo(MIN_EXTENT, 6);
    });

    it("should load by key through the primitive loader", () => {
      const handle = registry.loadByKey("PRIM:cone:slices=1");
      expect(registry.getMesh(handle).vertexCount).toBe(11);
    });

    it("should reject unknown prefixes", () => {
      expect(() => registry.loadByKey("OBJ:teapot.obj")).toThrow(
        "[MeshRegistry] Unsupported mesh handle type: OBJ",
      );
    });

    it("should reject unknown primitives", () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      expect(() => registry.loadByKey("PRIM:teapot")).toThrow(
        "[MeshRegistry] Failed to load mesh data for key: PRIM:teapot",
      );
      expect(error).toHaveBeenCalledWith(
        "[PrimitiveMeshLoader] Unknown primitive type: teapot",
      );
      expect(backend.callsOfType("createBuffers")).toHaveLength(0);
    });

    it("should route custom prefixes to registered loaders", () => {
      registry.registerLoader("test", { load: () => generateBox() });
      const handle = registry.loadByKey("TEST:anything");
      expect(registry.getSubRanges(handle).map((r) => r.name)).toEqual([
        "back",
        "bottom",
        "left",
        "right",
        "top",
        "front",
      ]);
    });
  });

  describe("drawing", () => {
    it("should refuse to draw a mesh that was never loaded", () => {
      expect(() => registry.draw(ResourceHandle.forMesh("PRIM:box:"))).toThrow(
        "[MeshRegistry] Mesh Mesh:PRIM:box: has not been loaded",
      );
    });

    it("should draw the whole index buffer by default", () => {
      const handle = registry.load("cone", { slices: 3 });
      registry.draw(handle);
      expect(backend.callsOfType("drawIndexed")).toEqual([
        {
          type: "drawIndexed",
          buffers: registry.getMesh(handle).buffers,
          topology: "triangle-list",
          indexCount: 18,
          byteOffset: 0,
        },
      ]);
    });

    it("should draw named sub-ranges at their byte offsets", () => {
      const handle = registry.load("cylinder", { slices: 4 });
      registry.draw(handle, { range: ["top", "sides"] });
      expect(
        backend
          .callsOfType("drawIndexed")
          .map((c) => [c.indexCount, c.byteOffset]),
      ).toEqual([
        [12, 48],
        [24, 96],
      ]);
    });

    it("should draw non-indexed meshes by vertex range", () => {
      const handle = registry.load("prism");
      registry.draw(handle, { range: "left" });
      registry.draw(handle);
      expect(
        backend
          .callsOfType("drawArrays")
          .map((c) => [c.firstVertex, c.vertexCount]),
      ).toEqual([
        [6, 6],
        [0, 24],
      ]);
      expect(backend.callsOfType("drawIndexed")).toHaveLength(0);
    });

    it("should wrap wireframe draws in line mode and restore fill", () => {
      const handle = registry.load("box");
      registry.draw(handle, { wireframe: true });
      expect(
        backend.calls
          .filter((c) => c.type !== "createBuffers")
          .map((c) => c.type),
      ).toEqual([
        "bindAttributeLayout",
        "setPolygonMode",
        "drawIndexed",
        "setPolygonMode",
      ]);
      expect(backend.callsOfType("setPolygonMode").map((c) => c.mode)).toEqual(
        ["line", "fill"],
      );
      expect(backend.polygonMode).toBe("fill");
    });

    it("should keep drawLines as a wireframe draw", () => {
      const handle = registry.load("box");
      registry.drawLines(handle);
      expect(backend.callsOfType("setPolygonMode").map((c) => c.mode)).toEqual(
        ["line", "fill"],
      );
      expect(backend.callsOfType("drawIndexed")).toHaveLength(1);
    });

    it("should reject unknown sub-ranges without changing polygon mode", () => {
      const handle = registry.load("box");
      expect(() =>
        registry.draw(handle, { range: "lid", wireframe: true }),
      ).toThrow('[MeshRegistry] Mesh "PRIM:box:" has no sub-range "lid"');
      expect(backend.callsOfType("setPolygonMode")).toHaveLength(0);
      expect(backend.callsOfType("drawIndexed")).toHaveLength(0);
    });
  });

  describe("dynamic meshes", () => {
    it("should upload on the first draw and update in place afterwards", () => {
      const dynamic = registry.createDynamic("partialCone");
      expect(backend.callsOfType("createBuffers")).toHaveLength(0);

      registry.drawDynamic(dynamic, { slices: 4 });
      const first = registry.getMesh(dynamic.handle);
      registry.drawDynamic(dynamic, { slices: 8 });
      const second = registry.getMesh(dynamic.handle);

      expect(backend.callsOfType("createBuffers")).toHaveLength(1);
      expect(backend.callsOfType("updateBuffers")).toEqual([
        {
          type: "updateBuffers",
          buffers: first.buffers,
          vertexFloats: 18 * 8,
          indexCount: 48,
        },
      ]);
      expect(second.id).toBe(first.id);
      expect(second.vertexCount).toBe(18);
      expect(
        backend.callsOfType("drawIndexed").map((c) => c.indexCount),
      ).toEqual([24, 48]);
      expect(registry.getRegenerationCount(dynamic)).toBe(2);
    });

    it("should give each dynamic mesh its own buffers", () => {
      const a = registry.createDynamic("sineCone");
      const b = registry.createDynamic("sineCone");
      registry.drawDynamic(a, {});
      registry.drawDynamic(b, { amplitude: 0.3 });
      expect(a.handle.key).not.toBe(b.handle.key);
      expect(registry.getMesh(a.handle).buffers).not.toBe(
        registry.getMesh(b.handle).buffers,
      );
    });

    it("should refuse to regenerate a static mesh", () => {
      const handle = registry.load("spiral");
      expect(() =>
        registry.drawDynamic({ shape: "spiral", handle }, { loops: 2 }),
      ).toThrow(
        "[MeshRegistry] Dynamic mesh Mesh:PRIM:spiral: is not registered",
      );
    });

    it("should refuse to describe a dynamic mesh before its first draw", () => {
      const dynamic = registry.createDynamic("spiral");
      expect(() => registry.getMesh(dynamic.handle)).toThrow(
        "has not been drawn yet",
      );
    });

    it("should honour draw options", () => {
      const dynamic = registry.createDynamic("spiral");
      registry.drawDynamic(dynamic, { loops: 1 }, { range: "cap" });
      const [cap] = registry
        .getSubRanges(dynamic.handle)
        .filter((r) => r.name === "cap");
      expect(backend.callsOfType("drawIndexed")).toEqual([
        {
          type: "drawIndexed",
          buffers: registry.getMesh(dynamic.handle).buffers,
          topology: "triangle-list",
          indexCount: 720,
          byteOffset: cap.offset * 4,
        },
      ]);
    });
  });

  describe("lifetime", () => {
    it("should destroy buffers on release", () => {
      const handle = registry.load("torus");
      registry.release(handle);
      expect(registry.has(handle)).toBe(false);
      expect(backend.liveBufferCount).toBe(0);
      expect(() => registry.draw(handle)).toThrow("has not been loaded");
    });

    it("should ignore releasing an unknown handle", () => {
      registry.release(ResourceHandle.forMesh("PRIM:box:"));
      expect(backend.callsOfType("destroyBuffers")).toHaveLength(0);
    });

    it("should destroy every uploaded mesh on clear", () => {
      registry.load("box");
      registry.load("sphere");
      registry.createDynamic("superellipsoid");
      registry.clear();
      expect(registry.size).toBe(0);
      expect(backend.callsOfType("destroyBuffers")).toHaveLength(2);
      expect(backend.liveBufferCount).toBe(0);
    });

    it("should rebind the layout after a context reset", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      registry.load("box");
      registry.resetContext();
      expect(registry.isLayoutBound).toBe(false);
      expect(registry.size).toBe(0);
      expect(warn).toHaveBeenCalledWith(
        "[MeshRegistry] Render context reset, dropping 1 meshes",
      );

      registry.load("box");
      expect(backend.callsOfType("bindAttributeLayout")).toHaveLength(2);
      expect(backend.callsOfType("createBuffers")).toHaveLength(2);
    });
  });

  describe("debug logging", () => {
    it("should log layout binding and validation", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const group = vi.spyOn(console, "group").mockImplementation(() => {});
      vi.spyOn(console, "groupEnd").mockImplementation(() => {});
      const verbose = new MeshRegistry(backend, { debug: true });

      verbose.load("plane");

      expect(log).toHaveBeenCalledWith(
        `[MeshRegistry] Bound attribute layout ${getLayoutKey(
          DEFAULT_ATTRIBUTE_LAYOUT,
        )}`,
      );
      expect(group).toHaveBeenCalledWith(
        '[MeshFactory] Validating mesh data for "PRIM:plane:"',
      );
    });
  });
});
