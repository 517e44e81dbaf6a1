// src/core/types/gpu.ts
import { Vec3 } from "wgpu-matrix";
import { PrimitiveTopology, SubRange } from "@/core/types/mesh";
import { DynamicShapeKind } from "@/core/types/shapes";
import { AttributeLayout } from "@/core/utils/layout";

/**
 * Axis-aligned bounding box in local mesh space.
 */
export interface AABB {
  min: Vec3;
  max: Vec3;
}

/** Identifier of a vertex/index buffer pair owned by a render backend. */
export type BufferId = number;

export type PolygonMode = "fill" | "line";

/**
 * The GPU-facing collaborator of the mesh registry.
 *
 * @remarks
 * All calls must come from the thread that owns the render context. An empty
 * index array means the mesh is drawn without an index buffer.
 */
export interface RenderBackend {
  createBuffers(
    label: string,
    vertices: Float32Array,
    indices: Uint32Array,
  ): BufferId;
  /** Replaces the contents of existing buffers, growing them if needed. */
  updateBuffers(
    buffers: BufferId,
    vertices: Float32Array,
    indices: Uint32Array,
  ): void;
  destroyBuffers(buffers: BufferId): void;
  bindAttributeLayout(layout: AttributeLayout): void;
  drawIndexed(
    buffers: BufferId,
    topology: PrimitiveTopology,
    indexCount: number,
    byteOffset: number,
  ): void;
  drawArrays(
    buffers: BufferId,
    topology: PrimitiveTopology,
    firstVertex: number,
    vertexCount: number,
  ): void;
  setPolygonMode(mode: PolygonMode): void;
}

/**
 * A mesh resident in backend buffers, with the counts and ranges needed to
 * issue draws against it.
 */
export interface Mesh {
  id: number;
  key: string;
  buffers: BufferId;
  vertexCount: number;
  /** Zero for non-indexed meshes. */
  indexCount: number;
  topology: PrimitiveTopology;
  subRanges: readonly SubRange[];
  aabb: AABB;
}

/** A mesh generated and uploaded once. */
export interface StaticMeshEntry {
  kind: "static";
  mesh: Mesh;
}

/**
 * A mesh regenerated on every draw into the same buffers. `mesh` stays null
 * until the first draw.
 */
export interface DynamicMeshEntry {
  kind: "dynamic";
  shape: DynamicShapeKind;
  mesh: Mesh | null;
  regenerations: number;
}

export type MeshEntry = StaticMeshEntry | DynamicMeshEntry;

