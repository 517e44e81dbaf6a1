// src/core/primitives/axisymmetric.test.ts
import { describe, expect, it } from "vitest";
import { vec3 } from "wgpu-matrix";
import {
  generateCone,
  generateCylinder,
  generatePartialCone,
  generateTaperedCylinder,
  generateTube,
} from "@/core/primitives/axisymmetric";
import { triangleIndices } from "@/core/geometry/meshBuilder";
import { MeshBuffer } from "@/core/types/mesh";
import {
  facesOf,
  inwardFaces,
  normalOf,
  positionOf,
  toArray,
  uvOf,
  vertexCountOf,
} from "@/test/meshChecks";

function rangeMesh(mesh: MeshBuffer, name: string): MeshBuffer {
  const range = mesh.subRanges.find((r) => r.name === name);
  if (!range) throw new Error(`missing range ${name}`);
  return {
    ...mesh,
    indices: mesh.indices.slice(range.offset, range.offset + range.count),
  };
}

describe("generateCone", () => {
  it("should build 11 vertices and 18 indices for three slices", () => {
    const cone = generateCone({ slices: 3 });
    expect(vertexCountOf(cone)).toBe(11);
    expect(cone.indices).toHaveLength(18);
    expect(cone.subRanges).toEqual([
      { name: "bottom", offset: 0, count: 9 },
      { name: "sides", offset: 9, count: 9 },
    ]);
  });

  it("should treat fewer than three slices as three", () => {
    const one = generateCone({ slices: 1 });
    const three = generateCone({ slices: 3 });
    expect(Array.from(one.vertices)).toEqual(Array.from(three.vertices));
    expect(Array.from(one.indices)).toEqual(Array.from(three.indices));
  });

  it("should put the apex at the cone height", () => {
    const cone = generateCone({ height: 2, slices: 3 });
    expect(toArray(positionOf(cone, 4))).toEqual([0, 2, 0]);
  });

  it("should tilt side normals perpendicular to the slanted wall", () => {
    const cone = generateCone({ slices: 3 });
    const normal = normalOf(cone, 5);
    expect(normal[0]).toBeCloseTo(0.353553, 5);
    expect(normal[1]).toBeCloseTo(0.707107, 5);
    expect(normal[2]).toBeCloseTo(0.612372, 5);
  });

  it("should wind every face outward", () => {
    const cone = generateCone();
    expect(inwardFaces(cone, () => vec3.create(0, 0.25, 0))).toEqual([]);
  });
});

describe("generateCylinder", () => {
  const cylinder = generateCylinder({ slices: 4 });

  it("should lay out caps and side rings with duplicated seams", () => {
    expect(vertexCountOf(cylinder)).toBe(22);
    expect(cylinder.indices).toHaveLength(48);
  });

  it("should split into bottom, top and sides ranges", () => {
    expect(cylinder.subRanges).toEqual([
      { name: "bottom", offset: 0, count: 12 },
      { name: "top", offset: 12, count: 12 },
      { name: "sides", offset: 24, count: 24 },
    ]);
  });

  it("should repeat the first side vertex at the seam with u = 1", () => {
    expect(toArray(positionOf(cylinder, 16))).toEqual(
      toArray(positionOf(cylinder, 12)),
    );
    expect(uvOf(cylinder, 12)).toEqual([0, 1]);
    expect(uvOf(cylinder, 16)).toEqual([1, 1]);
  });

  it("should wind every face outward", () => {
    expect(inwardFaces(cylinder, () => vec3.create(0, 0.5, 0))).toEqual([]);
  });
});

describe("generateTaperedCylinder", () => {
  const frustum = generateTaperedCylinder({ slices: 5 });

  it("should use wrapped rings without seam duplicates", () => {
    expect(vertexCountOf(frustum)).toBe(22);
    expect(frustum.indices).toHaveLength(60);
  });

  it("should tilt side normals by the wall slope", () => {
    expect(normalOf(frustum, 12)[1]).toBeCloseTo(0.447214, 5);
    expect(normalOf(frustum, 12)[0]).toBeCloseTo(0.894427, 5);
  });

  it("should wind every face outward", () => {
    expect(inwardFaces(frustum, () => vec3.create(0, 0.5, 0))).toEqual([]);
  });
});

describe("generateTube", () => {
  const tube = generateTube({ slices: 6 });

  it("should build eight rings and four ranges", () => {
    expect(vertexCountOf(tube)).toBe(56);
    expect(tube.subRanges).toEqual([
      { name: "outer", offset: 0, count: 36 },
      { name: "inner", offset: 36, count: 36 },
      { name: "bottom", offset: 72, count: 36 },
      { name: "top", offset: 108, count: 36 },
    ]);
  });

  it("should point inner wall normals toward the axis", () => {
    for (let i = 14; i < 28; i++) {
      const p = positionOf(tube, i);
      const n = normalOf(tube, i);
      expect(n[0] * p[0] + n[2] * p[2]).toBeLessThan(0);
    }
  });

  it("should wind each range toward its own side", () => {
    const radial = (name: string) =>
      facesOf(rangeMesh(tube, name)).map(
        (f) => f.normal[0] * f.centroid[0] + f.normal[2] * f.centroid[2],
      );
    const vertical = (name: string) =>
      facesOf(rangeMesh(tube, name)).map((f) => f.normal[1]);

    expect(radial("outer").every((d) => d > 0)).toBe(true);
    expect(radial("inner").every((d) => d < 0)).toBe(true);
    expect(vertical("bottom").every((d) => d < 0)).toBe(true);
    expect(vertical("top").every((d) => d > 0)).toBe(true);
  });

  it("should keep the inner radius below the outer radius", () => {
    const inverted = generateTube({ outerRadius: 1, innerRadius: 2, slices: 6 });
    expect(positionOf(inverted, 14)[0]).toBeCloseTo(0.99, 6);
  });
});

describe("generatePartialCone", () => {
  it("should span the arc centered on +X", () => {
    const cone = generatePartialCone({ slices: 4, arcDegrees: 90 });
    expect(vertexCountOf(cone)).toBe(10);
    expect(cone.indices).toHaveLength(24);
    expect(cone.subRanges).toEqual([{ name: "sides", offset: 0, count: 24 }]);

    const first = positionOf(cone, 0);
    const last = positionOf(cone, 4);
    expect(first[0]).toBeCloseTo(Math.SQRT1_2, 6);
    expect(first[2]).toBeCloseTo(-Math.SQRT1_2, 6);
    expect(last[0]).toBeCloseTo(Math.SQRT1_2, 6);
    expect(last[2]).toBeCloseTo(Math.SQRT1_2, 6);
  });

  it("should leave the silhouette open even for a full turn", () => {
    const cone = generatePartialCone({ slices: 4, arcDegrees: 360 });
    const bridging = triangleIndices(cone).filter(
      (t) => t.includes(0) && t.includes(4),
    );
    expect(bridging).toEqual([]);
  });

  it("should clamp the arc to one turn", () => {
    expect(
      Array.from(generatePartialCone({ arcDegrees: 720 }).vertices),
    ).toEqual(Array.from(generatePartialCone({ arcDegrees: 360 }).vertices));
  });

  it("should wind every face outward", () => {
    const cone = generatePartialCone({ slices: 8, arcDegrees: 180 });
    expect(inwardFaces(cone, () => vec3.create(0, 0.25, 0))).toEqual([]);
  });
});
