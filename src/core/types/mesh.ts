// src/core/types/mesh.ts
import { Vec3 } from "wgpu-matrix";

/**
 * Primitive assembly modes a render backend must support.
 */
export type PrimitiveTopology =
  | "triangle-list"
  | "triangle-strip"
  | "triangle-fan";

/**
 * A single vertex as read back from an interleaved buffer.
 */
export interface Vertex {
  position: Vec3;
  normal: Vec3;
  uv: [number, number];
}

/**
 * A named slice of a mesh used for partial draws (one box face, a cap, the
 * sides of a cone).
 *
 * @remarks
 * `offset` and `count` are measured in indices for indexed meshes and in
 * vertices for non-indexed meshes.
 */
export interface SubRange {
  name: string;
  offset: number;
  count: number;
}

/**
 * Host-side output of a primitive generator.
 *
 * @remarks
 * `vertices` is interleaved with a stride of 8 floats (position, normal, uv).
 * `indices` is empty when the shape is drawn as a non-indexed list or strip.
 */
export interface MeshBuffer {
  vertices: Float32Array;
  indices: Uint32Array;
  topology: PrimitiveTopology;
  subRanges: SubRange[];
}
