// src/core/primitives/sineCone.ts
import { Vec3, vec3 } from "wgpu-matrix";
import { MeshBuilder } from "@/core/geometry/meshBuilder";
import { accumulateAreaWeightedNormals } from "@/core/geometry/normals";
import { gridIndices } from "@/core/geometry/topology";
import {
  clampExtent,
  clampRange,
  clampSegments,
  ringAngle,
} from "@/core/geometry/clamp";
import { MeshBuffer } from "@/core/types/mesh";
import { SineConeParameters } from "@/core/types/shapes";

/** Exponent of the radius falloff toward the tip. */
const TAPER_EXPONENT = 0.65;

/**
 * Creates a cone along +X whose centerline wobbles along Y with a sine wave.
 *
 * @remarks
 * Row `i` sits at `x = i * height / heightSegments` with radius
 * `baseRadius * (1 - t)^0.65`, shifted in Y by
 * `amplitude * sin(frequency * t * 2PI + phase)`. `flatten` squashes the
 * section in Y. The deformation has no convenient closed-form normal, so
 * normals are accumulated from the area-weighted face normals, with the
 * duplicated seam columns merged.
 */
export function generateSineCone(params: SineConeParameters = {}): MeshBuffer {
  const {
    baseRadius = 0.5,
    height = 2,
    flatten = 0,
    amplitude = 0.1,
    frequency = 2,
    phase = 0,
    radialSegments = 24,
    heightSegments = 24,
  } = params;
  const radius0 = clampExtent(baseRadius);
  const h = clampExtent(height);
  const squash = 1 - clampRange(flatten, 0, 0.9);
  const columns = clampSegments(radialSegments);
  const rows = clampSegments(heightSegments);
  const amp = Number.isFinite(amplitude) ? amplitude : 0;
  const freq = Number.isFinite(frequency) ? frequency : 0;
  const shift = Number.isFinite(phase) ? phase : 0;

  const positions: Vec3[] = [];
  const uvs: [number, number][] = [];
  for (let i = 0; i <= rows; i++) {
    const t = i / rows;
    const radius = radius0 * Math.pow(1 - t, TAPER_EXPONENT);
    const wobble = amp * Math.sin(freq * t * Math.PI * 2 + shift);
    for (let j = 0; j <= columns; j++) {
      const angle = ringAngle(j, columns);
      positions.push(
        vec3.create(
          t * h,
          Math.cos(angle) * radius * squash + wobble,
          -Math.sin(angle) * radius,
        ),
      );
      uvs.push([j / columns, t]);
    }
  }

  const indices = gridIndices(0, rows + 1, columns + 1);
  const seams: [number, number][] = [];
  for (let i = 0; i <= rows; i++) {
    seams.push([i * (columns + 1), i * (columns + 1) + columns]);
  }
  const normals = accumulateAreaWeightedNormals(positions, indices, {
    seams,
    fallback: vec3.create(1, 0, 0),
  });

  const builder = new MeshBuilder();
  positions.forEach((position, k) => {
    builder.addVertex(position, normals[k], uvs[k][0], uvs[k][1]);
  });
  builder.addIndices(indices);

  return builder.build();
}
