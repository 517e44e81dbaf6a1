// src/core/resources/meshFactory.ts
import { AABB, Mesh, RenderBackend } from "@/core/types/gpu";
import { MeshBuffer } from "@/core/types/mesh";
import { FLOATS_PER_VERTEX } from "@/core/utils/layout";
import { vec3 } from "wgpu-matrix";

/**
 * Computes the axis-aligned bounding box from interleaved vertex data.
 * @param vertices Interleaved vertices, positions in the first three floats
 *   of every stride
 * @returns AABB with min and max corners
 */
export function computeAABB(vertices: Float32Array): AABB {
  if (vertices.length === 0) {
    return { min: vec3.create(0, 0, 0), max: vec3.create(0, 0, 0) };
  }
  let minX = Infinity,
    minY = Infinity,
    minZ = Infinity;
  let maxX = -Infinity,
    maxY = -Infinity,
    maxZ = -Infinity;
  for (let i = 0; i < vertices.length; i += FLOATS_PER_VERTEX) {
    const x = vertices[i],
      y = vertices[i + 1],
      z = vertices[i + 2];
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
    if (z < minZ) minZ = z;
    if (z > maxZ) maxZ = z;
  }
  return {
    min: vec3.create(minX, minY, minZ),
    max: vec3.create(maxX, maxY, maxZ),
  };
}

/**
 * Checks that a buffer is internally consistent before it reaches the
 * backend.
 *
 * @remarks
 * Throws on a partial vertex, an index past the last vertex or a sub-range
 * that runs past the end of the data it addresses. With `debug` set, the
 * counts are also logged in a console group.
 */
export function validateMeshBuffer(
  key: string,
  buffer: MeshBuffer,
  debug = false,
): void {
  if (buffer.vertices.length % FLOATS_PER_VERTEX !== 0) {
    throw new Error(
      `[MeshFactory] Mesh "${key}" has ${buffer.vertices.length} floats, not a multiple of ${FLOATS_PER_VERTEX}`,
    );
  }
  const vertexCount = buffer.vertices.length / FLOATS_PER_VERTEX;

  let maxIndex = -1;
  for (const index of buffer.indices) {
    if (index > maxIndex) maxIndex = index;
  }
  if (maxIndex >= vertexCount) {
    throw new Error(
      `[MeshFactory] Index out of bounds in mesh "${key}": max index ${maxIndex} >= vertex count ${vertexCount}`,
    );
  }

  const extent =
    buffer.indices.length > 0 ? buffer.indices.length : vertexCount;
  for (const range of buffer.subRanges) {
    if (range.offset < 0 || range.count < 0) {
      throw new Error(
        `[MeshFactory] Sub-range "${range.name}" of mesh "${key}" is negative`,
      );
    }
    if (range.offset + range.count > extent) {
      throw new Error(
        `[MeshFactory] Sub-range "${range.name}" of mesh "${key}" ends at ${
          range.offset + range.count
        }, past ${extent}`,
      );
    }
  }

  if (!debug) return;
  console.group(`[MeshFactory] Validating mesh data for "${key}"`);
  console.log(
    `Vertices: ${buffer.vertices.length} floats (${vertexCount} vertices)`,
  );
  if (buffer.indices.length > 0) {
    console.log(`Indices: ${buffer.indices.length}, max ${maxIndex}`);
  } else {
    console.log(`Indices: Not provided.`);
  }
  console.log(
    `Sub-ranges: ${
      buffer.subRanges.map((r) => `${r.name}[${r.offset}+${r.count}]`).join(
        ", ",
      ) || "none"
    }`,
  );
  console.groupEnd();
}

/**
 * A stateless factory for turning host-side mesh buffers into backend-resident
 * meshes.
 *
 * @remarks
 * Validation runs before any backend call, so a rejected buffer never
 * allocates.
 */
export class MeshFactory {
  /**
   * Uploads a new mesh.
   *
   * @param backend The render backend that owns the buffers.
   * @param id Registry-assigned mesh id.
   * @param key A unique key to identify the mesh for debugging.
   * @param buffer Generated vertex and index data.
   * @param debug Logs validation details when set.
   */
  public static createMesh(
    backend: RenderBackend,
    id: number,
    key: string,
    buffer: MeshBuffer,
    debug = false,
  ): Mesh {
    validateMeshBuffer(key, buffer, debug);
    const buffers = backend.createBuffers(key, buffer.vertices, buffer.indices);
    return {
      id,
      key,
      buffers,
      vertexCount: buffer.vertices.length / FLOATS_PER_VERTEX,
      indexCount: buffer.indices.length,
      topology: buffer.topology,
      subRanges: buffer.subRanges,
      aabb: computeAABB(buffer.vertices),
    };
  }

  /**
   * Replaces the contents of an uploaded mesh, keeping its buffers and id.
   *
   * @returns A new Mesh describing the replaced data.
   */
  public static updateMesh(
    backend: RenderBackend,
    mesh: Mesh,
    buffer: MeshBuffer,
    debug = false,
  ): Mesh {
    validateMeshBuffer(mesh.key, buffer, debug);
    backend.updateBuffers(mesh.buffers, buffer.vertices, buffer.indices);
    return {
      ...mesh,
      vertexCount: buffer.vertices.length / FLOATS_PER_VERTEX,
      indexCount: buffer.indices.length,
      topology: buffer.topology,
      subRanges: buffer.subRanges,
      aabb: computeAABB(buffer.vertices),
    };
  }
}
