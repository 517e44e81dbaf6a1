// src/loaders/mesh/primitiveMeshLoader.test.ts
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  parsePrimParams,
  PrimitiveMeshLoader,
} from "@/loaders/mesh/primitiveMeshLoader";
import { generateShape, primitiveKey, SHAPE_KINDS } from "@/core/primitives";

describe("parsePrimParams", () => {
  it("should parse numeric name=value pairs", () => {
    expect(parsePrimParams("size=2.5,slices=3")).toEqual(
      new Map([
        ["size", 2.5],
        ["slices", 3],
      ]),
    );
  });

  it("should skip malformed and non-numeric entries", () => {
    expect(parsePrimParams("radius=abc,height,=4").size).toBe(0);
    expect(parsePrimParams("").size).toBe(0);
  });
});

describe("PrimitiveMeshLoader", () => {
  const loader = new PrimitiveMeshLoader();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should generate the shape named in the path", () => {
    const mesh = loader.load("cone:radius=2,slices=4");
    const expected = generateShape("cone", { radius: 2, slices: 4 });
    expect(mesh && Array.from(mesh.vertices)).toEqual(
      Array.from(expected.vertices),
    );
  });

  it("should accept a path without parameters", () => {
    expect(loader.load("box")?.indices).toHaveLength(36);
  });

  it("should clamp parameters like the generators do", () => {
    const one = loader.load("cone:slices=1");
    const three = loader.load("cone:slices=3");
    expect(one && Array.from(one.vertices)).toEqual(
      three && Array.from(three.vertices),
    );
  });

  it.each(SHAPE_KINDS)("should round-trip the key of %s", (kind) => {
    const key = primitiveKey(kind);
    const mesh = loader.load(key.slice("PRIM:".length));
    expect(mesh && Array.from(mesh.vertices)).toEqual(
      Array.from(generateShape(kind).vertices),
    );
  });

  it("should report unknown primitives and return null", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(loader.load("teapot:size=1")).toBeNull();
    expect(error).toHaveBeenCalledWith(
      "[PrimitiveMeshLoader] Unknown primitive type: teapot",
    );
  });
});
