// src/core/geometry/meshBuilder.ts
import { Vec3, vec3 } from "wgpu-matrix";
import {
  MeshBuffer,
  PrimitiveTopology,
  SubRange,
  Vertex,
} from "@/core/types/mesh";
import { FLOATS_PER_VERTEX } from "@/core/utils/layout";
import { RingSpan } from "@/core/geometry/topology";

interface PendingRange {
  name: string;
  vertexStart: number;
  indexStart: number;
  vertexEnd: number;
  indexEnd: number;
}

/**
 * Accumulates interleaved vertices, indices and named sub-ranges for one mesh.
 *
 * @remarks
 * Vertex indices are assigned in insertion order. Ranges are recorded in both
 * vertex and index units; {@link MeshBuilder.build} keeps the unit that matches
 * the finished mesh (indices when it has any, vertices otherwise).
 */
export class MeshBuilder {
  private vertices: number[] = [];
  private indices: number[] = [];
  private ranges: PendingRange[] = [];
  private openRange: PendingRange | null = null;

  /** Number of vertices added so far. */
  public get vertexCount(): number {
    return this.vertices.length / FLOATS_PER_VERTEX;
  }

  /** Number of indices added so far. */
  public get indexCount(): number {
    return this.indices.length;
  }

  /**
   * Appends one vertex.
   * @returns The index of the new vertex.
   */
  public addVertex(position: Vec3, normal: Vec3, u: number, v: number): number {
    const index = this.vertexCount;
    this.vertices.push(
      position[0],
      position[1],
      position[2],
      normal[0],
      normal[1],
      normal[2],
      u,
      v,
    );
    return index;
  }

  /**
   * Appends a ring of vertices produced by `sample` for `i` in `[0, count)`.
   * @returns The span the ring occupies.
   */
  public addRing(
    count: number,
    sample: (i: number) => { position: Vec3; normal: Vec3; u: number; v: number },
  ): RingSpan {
    const start = this.vertexCount;
    for (let i = 0; i < count; i++) {
      const { position, normal, u, v } = sample(i);
      this.addVertex(position, normal, u, v);
    }
    return { start, count };
  }

  public addTriangle(a: number, b: number, c: number): this {
    this.indices.push(a, b, c);
    return this;
  }

  public addIndices(indices: readonly number[]): this {
    for (const index of indices) {
      this.indices.push(index);
    }
    return this;
  }

  /**
   * Starts a named range at the current vertex and index counts.
   * @throws If another range is still open.
   */
  public beginRange(name: string): this {
    if (this.openRange) {
      throw new Error(
        `[MeshBuilder] Range "${this.openRange.name}" is still open`,
      );
    }
    this.openRange = {
      name,
      vertexStart: this.vertexCount,
      indexStart: this.indexCount,
      vertexEnd: this.vertexCount,
      indexEnd: this.indexCount,
    };
    return this;
  }

  /**
   * Closes the range opened by {@link MeshBuilder.beginRange}.
   */
  public endRange(): this {
    if (!this.openRange) {
      throw new Error("[MeshBuilder] No range is open");
    }
    this.openRange.vertexEnd = this.vertexCount;
    this.openRange.indexEnd = this.indexCount;
    this.ranges.push(this.openRange);
    this.openRange = null;
    return this;
  }

  /**
   * Records a range directly in the final unit of the mesh.
   */
  public addRange(name: string, offset: number, count: number): this {
    this.ranges.push({
      name,
      vertexStart: offset,
      indexStart: offset,
      vertexEnd: offset + count,
      indexEnd: offset + count,
    });
    return this;
  }

  /**
   * Freezes the builder into a {@link MeshBuffer}.
   */
  public build(topology: PrimitiveTopology = "triangle-list"): MeshBuffer {
    if (this.openRange) {
      throw new Error(
        `[MeshBuilder] Range "${this.openRange.name}" was never closed`,
      );
    }
    const indexed = this.indices.length > 0;
    const subRanges: SubRange[] = this.ranges.map((range) =>
      indexed
        ? {
            name: range.name,
            offset: range.indexStart,
            count: range.indexEnd - range.indexStart,
          }
        : {
            name: range.name,
            offset: range.vertexStart,
            count: range.vertexEnd - range.vertexStart,
          },
    );
    return {
      vertices: new Float32Array(this.vertices),
      indices: new Uint32Array(this.indices),
      topology,
      subRanges,
    };
  }
}

/**
 * Expands an indexed triangle list into a non-indexed one.
 *
 * @remarks
 * Sub-ranges keep their offsets and counts, since index `i` of the source
 * becomes vertex `i` of the result.
 */
export function deindexMesh(mesh: MeshBuffer): MeshBuffer {
  const vertices = new Float32Array(mesh.indices.length * FLOATS_PER_VERTEX);
  for (let i = 0; i < mesh.indices.length; i++) {
    const source = mesh.indices[i] * FLOATS_PER_VERTEX;
    vertices.set(
      mesh.vertices.subarray(source, source + FLOATS_PER_VERTEX),
      i * FLOATS_PER_VERTEX,
    );
  }
  return {
    vertices,
    indices: new Uint32Array(0),
    topology: mesh.topology,
    subRanges: mesh.subRanges.map((range) => ({ ...range })),
  };
}

/**
 * Reads vertex `index` back out of an interleaved buffer.
 */
export function readVertex(mesh: MeshBuffer, index: number): Vertex {
  const base = index * FLOATS_PER_VERTEX;
  const v = mesh.vertices;
  return {
    position: vec3.create(v[base], v[base + 1], v[base + 2]),
    normal: vec3.create(v[base + 3], v[base + 4], v[base + 5]),
    uv: [v[base + 6], v[base + 7]],
  };
}

/**
 * Lists the triangles of a triangle-list mesh as vertex index triples,
 * following the index buffer when there is one.
 */
export function triangleIndices(mesh: MeshBuffer): [number, number, number][] {
  const count =
    mesh.indices.length > 0
      ? mesh.indices.length
      : mesh.vertices.length / FLOATS_PER_VERTEX;
  const at = (i: number): number =>
    mesh.indices.length > 0 ? mesh.indices[i] : i;
  const triangles: [number, number, number][] = [];
  for (let i = 0; i + 2 < count; i += 3) {
    triangles.push([at(i), at(i + 1), at(i + 2)]);
  }
  return triangles;
}
