// src/core/geometry/frames.ts
import { quat, Vec3, vec3 } from "wgpu-matrix";
import { clampRange } from "@/core/geometry/clamp";

/**
 * An orthonormal basis attached to one sample of a centerline.
 * `binormal` is always `cross(tangent, normal)`.
 */
export interface Frame {
  origin: Vec3;
  tangent: Vec3;
  normal: Vec3;
  binormal: Vec3;
}

const PARALLEL_EPSILON = 1e-5;

/**
 * Builds the first frame's normal and binormal from a reference up vector.
 *
 * @param tangent Unit tangent.
 * @param up Reference direction; replaced by a coordinate axis when it is
 *   parallel to the tangent.
 */
export function initialBasis(
  tangent: Vec3,
  up: Vec3,
): { normal: Vec3; binormal: Vec3 } {
  let side = vec3.cross(tangent, up);
  if (vec3.length(side) < PARALLEL_EPSILON) {
    const alternate =
      Math.abs(tangent[0]) < 0.9 ? vec3.create(1, 0, 0) : vec3.create(0, 1, 0);
    side = vec3.cross(tangent, alternate);
  }
  const binormal = vec3.normalize(side);
  const normal = vec3.normalize(vec3.cross(binormal, tangent));
  return { normal, binormal };
}

/**
 * Propagates a frame along a sampled curve by parallel transport.
 *
 * @remarks
 * The first frame comes from {@link initialBasis}. Every following normal is
 * the previous normal rotated through the angle between the two tangents,
 * about their cross product, then re-orthogonalized against the new tangent.
 * The cross-section therefore never twists about the curve.
 *
 * @param origins Centerline samples.
 * @param tangents Tangents at each sample; need not be normalized.
 * @param up Reference direction for the first frame.
 */
export function propagateFrames(
  origins: readonly Vec3[],
  tangents: readonly Vec3[],
  up: Vec3,
): Frame[] {
  const frames: Frame[] = [];

  for (let i = 0; i < origins.length; i++) {
    const tangent = vec3.normalize(tangents[i]);

    if (i === 0) {
      const { normal, binormal } = initialBasis(tangent, up);
      frames.push({ origin: origins[i], tangent, normal, binormal });
      continue;
    }

    const previous = frames[i - 1];
    const axis = vec3.cross(previous.tangent, tangent);
    let normal = vec3.clone(previous.normal);
    if (vec3.length(axis) >= PARALLEL_EPSILON) {
      const angle = Math.acos(
        clampRange(vec3.dot(previous.tangent, tangent), -1, 1),
      );
      const rotation = quat.fromAxisAngle(vec3.normalize(axis), angle);
      normal = vec3.transformQuat(previous.normal, rotation);
    }

    // Re-orthogonalize against the new tangent.
    normal = vec3.normalize(
      vec3.addScaled(normal, tangent, -vec3.dot(normal, tangent)),
    );
    const binormal = vec3.cross(tangent, normal);
    frames.push({ origin: origins[i], tangent, normal, binormal });
  }

  return frames;
}

/**
 * Tangents by central differences; one-sided at both ends.
 */
export function centralDifferenceTangents(points: readonly Vec3[]): Vec3[] {
  const last = points.length - 1;
  return points.map((_, i) => {
    const ahead = points[Math.min(i + 1, last)];
    const behind = points[Math.max(i - 1, 0)];
    return vec3.normalize(vec3.subtract(ahead, behind));
  });
}

/**
 * Offset of a cross-section sample from the frame origin, before scaling by
 * the tube radius.
 *
 * @remarks
 * The section runs from `normal` toward `-binormal`, which makes rings laid out
 * along the tangent wind outward under the grid topology. `flatten` squashes
 * the section along the frame normal.
 */
export function crossSectionOffset(
  frame: Frame,
  angle: number,
  flatten = 0,
): Vec3 {
  return vec3.addScaled(
    vec3.scale(frame.normal, Math.cos(angle) * (1 - flatten)),
    frame.binormal,
    -Math.sin(angle),
  );
}
