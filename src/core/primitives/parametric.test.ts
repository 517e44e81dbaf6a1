// src/core/primitives/parametric.test.ts
import { describe, expect, it } from "vitest";
import { Vec3, vec3 } from "wgpu-matrix";
import {
  generateHemisphere,
  generateSphere,
  generateSuperellipsoid,
  generateTaperedTorus,
  generateThickTorus,
  generateTorus,
  signedPow,
} from "@/core/primitives/parametric";
import { deindexMesh } from "@/core/geometry/meshBuilder";
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

const origin = () => vec3.create(0, 0, 0);

function lowestY(mesh: MeshBuffer): number {
  let min = Infinity;
  for (let i = 0; i < vertexCountOf(mesh); i++) {
    min = Math.min(min, positionOf(mesh, i)[1]);
  }
  return min;
}

describe("generateSphere", () => {
  const sphere = generateSphere({ latitudeSegments: 4, longitudeSegments: 6 });

  it("should build a grid with a duplicated seam column", () => {
    expect(vertexCountOf(sphere)).toBe(35);
    expect(sphere.indices).toHaveLength(144);
  });

  it("should repeat seam positions exactly with u one apart", () => {
    for (let k = 0; k <= 4; k++) {
      const first = k * 7;
      const seam = first + 6;
      expect(toArray(positionOf(sphere, seam))).toEqual(
        toArray(positionOf(sphere, first)),
      );
      expect(uvOf(sphere, first)[0] - uvOf(sphere, seam)[0]).toBe(1);
    }
  });

  it("should place vertices at radius along their normals", () => {
    const big = generateSphere({ radius: 2 });
    for (let i = 0; i < vertexCountOf(big); i++) {
      const p = positionOf(big, i);
      const n = normalOf(big, i);
      for (let c = 0; c < 3; c++) {
        expect(p[c]).toBeCloseTo(n[c] * 2, 5);
      }
    }
  });

  it("should cover the bands above the equator with upperHalf", () => {
    expect(sphere.subRanges).toEqual([
      { name: "upperHalf", offset: 72, count: 72 },
    ]);
    const upper = { ...sphere, indices: sphere.indices.slice(72) };
    const lower = { ...sphere, indices: sphere.indices.slice(0, 72) };
    expect(facesOf(upper).every((f) => f.centroid[1] > 0)).toBe(true);
    expect(facesOf(lower).every((f) => f.centroid[1] < 0)).toBe(true);
  });

  it("should wind every face outward", () => {
    expect(inwardFaces(generateSphere(), origin)).toEqual([]);
  });
});

describe("generateHemisphere", () => {
  it("should keep half the latitude bands", () => {
    const dome = generateHemisphere({
      latitudeSegments: 5,
      longitudeSegments: 4,
    });
    expect(vertexCountOf(dome)).toBe(15);
    expect(dome.indices).toHaveLength(48);
  });

  it("should stop short of the equator for odd segment counts", () => {
    expect(lowestY(generateHemisphere({ latitudeSegments: 5 }))).toBeCloseTo(
      Math.cos((2 * Math.PI) / 5),
      5,
    );
    expect(lowestY(generateHemisphere({ latitudeSegments: 4 }))).toBeCloseTo(
      0,
      6,
    );
  });

  it("should wind every face outward", () => {
    expect(inwardFaces(generateHemisphere(), origin)).toEqual([]);
  });
});

describe("generateTorus", () => {
  const torus = generateTorus({ mainSegments: 8, tubeSegments: 6 });

  it("should build a seam-duplicated grid", () => {
    expect(vertexCountOf(torus)).toBe(63);
    expect(torus.indices).toHaveLength(288);
    expect(torus.subRanges).toEqual([{ name: "half", offset: 0, count: 144 }]);
  });

  it("should start on the outer equator", () => {
    expect(toArray(positionOf(torus, 0))).toEqual([1.25, 0, 0]);
    const [u, v] = uvOf(torus, 9);
    expect(u).toBeCloseTo(1 / 8, 6);
    expect(v).toBeCloseTo(2 / 6, 6);
  });

  it("should wind every face away from the tube center", () => {
    const tubeCenter = (c: Vec3) => {
      const length = Math.hypot(c[0], c[1]);
      return vec3.create(c[0] / length, c[1] / length, 0);
    };
    expect(inwardFaces(generateTorus(), tubeCenter)).toEqual([]);
  });
});

describe("generateThickTorus", () => {
  it("should fall back to a thin tube when the thickness exceeds one", () => {
    const thick = generateThickTorus({ thickness: 2 });
    const expected = deindexMesh(
      generateTorus({
        mainRadius: 1,
        tubeRadius: 0.1,
        mainSegments: 30,
        tubeSegments: 30,
      }),
    );
    expect(thick.indices).toHaveLength(0);
    expect(vertexCountOf(thick)).toBe(5400);
    expect(Array.from(thick.vertices)).toEqual(Array.from(expected.vertices));
  });
});

describe("generateTaperedTorus", () => {
  const arc = generateTaperedTorus({
    sweepRadians: Math.PI,
    mainSegments: 4,
    tubeSegments: 4,
  });

  it("should shrink the tube from start to end", () => {
    expect(positionOf(arc, 0)[0]).toBeCloseTo(1.3, 5);
    expect(positionOf(arc, 20)[0]).toBeCloseTo(-1.05, 5);
  });

  it("should clamp the sweep to one turn", () => {
    expect(
      Array.from(generateTaperedTorus({ sweepRadians: 10 }).vertices),
    ).toEqual(
      Array.from(generateTaperedTorus({ sweepRadians: Math.PI * 2 }).vertices),
    );
  });
});

describe("generateSuperellipsoid", () => {
  it("should be a unit sphere with unit exponents", () => {
    const mesh = generateSuperellipsoid();
    expect(vertexCountOf(mesh)).toBe(625);
    expect(mesh.indices).toHaveLength(3456);
    for (let i = 0; i < 625; i++) {
      const p = positionOf(mesh, i);
      const n = normalOf(mesh, i);
      for (let c = 0; c < 3; c++) {
        expect(n[c]).toBeCloseTo(p[c], 5);
      }
    }
    expect(inwardFaces(mesh, origin)).toEqual([]);
  });

  it("should give an ellipsoid its exact normals", () => {
    const mesh = generateSuperellipsoid({ scaleX: 2 });
    const p = positionOf(mesh, 300);
    const n = normalOf(mesh, 300);
    expect(p[0]).toBeCloseTo(-2, 5);
    expect(n[0]).toBeCloseTo(-1, 5);
    expect(n[1]).toBeCloseTo(0, 5);
    expect(n[2]).toBeCloseTo(0, 5);
    expect(inwardFaces(mesh, origin)).toEqual([]);
  });
});

describe("signedPow", () => {
  it("should keep the sign of the base", () => {
    expect(signedPow(-8, 1 / 3)).toBeCloseTo(-2, 12);
    expect(signedPow(4, 0.5)).toBe(2);
    expect(signedPow(0, 2)).toBe(0);
  });
});
