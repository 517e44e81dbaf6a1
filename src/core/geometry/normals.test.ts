// src/core/geometry/normals.test.ts
import { describe, expect, it } from "vitest";
import { Vec3, vec3 } from "wgpu-matrix";
import {
  accumulateAreaWeightedNormals,
  analyticNormal,
  frameRelativeNormal,
  unitNormal,
} from "@/core/geometry/normals";

function expectVec(actual: Vec3, expected: readonly number[], digits = 5) {
  expect(actual[0]).toBeCloseTo(expected[0], digits);
  expect(actual[1]).toBeCloseTo(expected[1], digits);
  expect(actual[2]).toBeCloseTo(expected[2], digits);
}

describe("unitNormal", () => {
  it("should normalize the direction", () => {
    expectVec(unitNormal(vec3.create(3, 0, 4), vec3.create(0, 1, 0)), [
      0.6, 0, 0.8,
    ]);
  });

  it("should keep very short directions", () => {
    expectVec(unitNormal(vec3.create(1e-6, 0, 0), vec3.create(0, 1, 0)), [
      1, 0, 0,
    ]);
  });

  it("should use the normalized fallback for a zero direction", () => {
    expectVec(unitNormal(vec3.create(0, 0, 0), vec3.create(0, 2, 0)), [
      0, 1, 0,
    ]);
  });
});

describe("analyticNormal", () => {
  it("should normalize the components", () => {
    expectVec(analyticNormal(3, 4, 0), [0.6, 0.8, 0]);
  });
});

describe("frameRelativeNormal", () => {
  const normal = vec3.create(0, 1, 0);
  const binormal = vec3.create(0, 0, 1);

  it("should start on the frame normal and turn toward minus binormal", () => {
    expectVec(frameRelativeNormal(normal, binormal, 0), [0, 1, 0]);
    expectVec(frameRelativeNormal(normal, binormal, Math.PI / 2), [0, 0, -1]);
  });

  it("should tilt toward the normal axis when the section is flattened", () => {
    expectVec(frameRelativeNormal(normal, binormal, Math.PI / 4, 0.5), [
      0, 0.894427, -0.447214,
    ]);
  });
});

describe("accumulateAreaWeightedNormals", () => {
  // Vertex 0 is shared by a large face facing +Y (area 2) and a small face
  // facing +X (area 0.5).
  const positions = [
    vec3.create(0, 0, 0),
    vec3.create(0, 0, 2),
    vec3.create(2, 0, 0),
    vec3.create(0, 1, 0),
    vec3.create(0, 0, 1),
    vec3.create(5, 5, 5),
  ];
  const indices = [0, 1, 2, 0, 3, 4];

  it("should weight shared vertices by face area", () => {
    const normals = accumulateAreaWeightedNormals(positions, indices);
    const s = Math.sqrt(17);
    expectVec(normals[0], [1 / s, 4 / s, 0]);
    expectVec(normals[1], [0, 1, 0]);
    expectVec(normals[3], [1, 0, 0]);
  });

  it("should give untouched vertices the fallback", () => {
    const normals = accumulateAreaWeightedNormals(positions, indices, {
      fallback: vec3.create(0, 0, 1),
    });
    expectVec(normals[5], [0, 0, 1]);
  });

  it("should merge seam pairs before normalizing", () => {
    const normals = accumulateAreaWeightedNormals(positions, indices, {
      seams: [[1, 3]],
    });
    const s = Math.sqrt(17);
    expectVec(normals[1], [1 / s, 4 / s, 0]);
    expect(Array.from(normals[1])).toEqual(Array.from(normals[3]));
  });
});
