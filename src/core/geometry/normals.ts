// src/core/geometry/normals.ts
import { Vec3, vec3 } from "wgpu-matrix";

/**
 * How a generator derives its vertex normals.
 *
 * - `analytic`: closed form from the parametric surface or its symmetry.
 * - `area-weighted`: sum of adjacent face normals scaled by face area.
 * - `frame-relative`: radial offset inside a propagated orthonormal frame.
 */
export type NormalStrategy = "analytic" | "area-weighted" | "frame-relative";

const DEGENERATE_LENGTH = 1e-12;

/**
 * Normalizes `direction`, or returns the normalized `fallback` when the
 * direction has no usable length.
 *
 * @remarks
 * Unlike `vec3.normalize`, this keeps very short but valid directions (such as
 * the accumulated normals of a tiny mesh) instead of zeroing them.
 */
export function unitNormal(direction: Vec3, fallback: Vec3): Vec3 {
  const length = vec3.length(direction);
  if (length <= DEGENERATE_LENGTH) {
    return vec3.scale(fallback, 1 / vec3.length(fallback));
  }
  return vec3.scale(direction, 1 / length);
}

/**
 * Analytic normal from unnormalized components.
 */
export function analyticNormal(
  x: number,
  y: number,
  z: number,
  fallback: Vec3 = vec3.create(0, 1, 0),
): Vec3 {
  return unitNormal(vec3.create(x, y, z), fallback);
}

/**
 * Normal of a point on a cross-section swept along a frame.
 *
 * @remarks
 * The cross-section point is `normal * cos * (1 - flatten) - binormal * sin`,
 * so its outward direction is `normal * cos - binormal * sin * (1 - flatten)`.
 */
export function frameRelativeNormal(
  normal: Vec3,
  binormal: Vec3,
  angle: number,
  flatten = 0,
): Vec3 {
  const direction = vec3.addScaled(
    vec3.scale(normal, Math.cos(angle)),
    binormal,
    -Math.sin(angle) * (1 - flatten),
  );
  return unitNormal(direction, normal);
}

export interface AccumulateOptions {
  /**
   * Pairs of vertices that share a position across a duplicated seam; their
   * sums are merged before normalization.
   */
  seams?: readonly (readonly [number, number])[];
  /** Used for vertices that touch only zero-area triangles. */
  fallback?: Vec3;
}

/**
 * Computes per-vertex normals as the area-weighted sum of adjacent face
 * normals.
 *
 * @remarks
 * The unnormalized cross product of two triangle edges has a length of twice
 * the triangle area, so summing it directly weights each face by its area.
 * Each sum is normalized once, after all faces are accumulated.
 *
 * @param positions Vertex positions.
 * @param indices Triangle list indices into `positions`.
 * @returns One unit normal per position.
 */
export function accumulateAreaWeightedNormals(
  positions: readonly Vec3[],
  indices: readonly number[],
  options: AccumulateOptions = {},
): Vec3[] {
  const { seams = [], fallback = vec3.create(0, 1, 0) } = options;
  const sums = positions.map(() => vec3.create(0, 0, 0));

  for (let t = 0; t + 2 < indices.length; t += 3) {
    const a = indices[t];
    const b = indices[t + 1];
    const c = indices[t + 2];
    const pa = positions[a];
    const faceNormal = vec3.cross(
      vec3.subtract(positions[b], pa),
      vec3.subtract(positions[c], pa),
    );
    vec3.add(sums[a], faceNormal, sums[a]);
    vec3.add(sums[b], faceNormal, sums[b]);
    vec3.add(sums[c], faceNormal, sums[c]);
  }

  for (const [a, b] of seams) {
    const merged = vec3.add(sums[a], sums[b]);
    vec3.copy(merged, sums[a]);
    vec3.copy(merged, sums[b]);
  }

  return sums.map((sum) => unitNormal(sum, fallback));
}
