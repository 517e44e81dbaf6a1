// src/core/rendering/recordingBackend.ts
import { BufferId, PolygonMode, RenderBackend } from "@/core/types/gpu";
import { PrimitiveTopology } from "@/core/types/mesh";
import {
  AttributeLayout,
  FLOATS_PER_VERTEX,
  getLayoutKey,
} from "@/core/utils/layout";

export type BackendCall =
  | {
      type: "createBuffers";
      buffers: BufferId;
      label: string;
      vertexFloats: number;
      indexCount: number;
    }
  | {
      type: "updateBuffers";
      buffers: BufferId;
      vertexFloats: number;
      indexCount: number;
    }
  | { type: "destroyBuffers"; buffers: BufferId }
  | { type: "bindAttributeLayout"; layoutKey: string }
  | {
      type: "drawIndexed";
      buffers: BufferId;
      topology: PrimitiveTopology;
      indexCount: number;
      byteOffset: number;
    }
  | {
      type: "drawArrays";
      buffers: BufferId;
      topology: PrimitiveTopology;
      firstVertex: number;
      vertexCount: number;
    }
  | { type: "setPolygonMode"; mode: PolygonMode };

export type BackendCallType = BackendCall["type"];

interface BufferContents {
  vertices: Float32Array;
  indices: Uint32Array;
}

/**
 * A render backend that keeps buffer contents in memory and records every
 * call in order. Used headless and in tests.
 */
export class RecordingBackend implements RenderBackend {
  public readonly calls: BackendCall[] = [];
  public polygonMode: PolygonMode = "fill";
  private nextBufferId = 1;
  private buffers = new Map<BufferId, BufferContents>();

  public createBuffers(
    label: string,
    vertices: Float32Array,
    indices: Uint32Array,
  ): BufferId {
    const buffers = this.nextBufferId++;
    this.buffers.set(buffers, {
      vertices: vertices.slice(),
      indices: indices.slice(),
    });
    this.calls.push({
      type: "createBuffers",
      buffers,
      label,
      vertexFloats: vertices.length,
      indexCount: indices.length,
    });
    return buffers;
  }

  public updateBuffers(
    buffers: BufferId,
    vertices: Float32Array,
    indices: Uint32Array,
  ): void {
    this.requireBuffers(buffers);
    this.buffers.set(buffers, {
      vertices: vertices.slice(),
      indices: indices.slice(),
    });
    this.calls.push({
      type: "updateBuffers",
      buffers,
      vertexFloats: vertices.length,
      indexCount: indices.length,
    });
  }

  public destroyBuffers(buffers: BufferId): void {
    this.requireBuffers(buffers);
    this.buffers.delete(buffers);
    this.calls.push({ type: "destroyBuffers", buffers });
  }

  public bindAttributeLayout(layout: AttributeLayout): void {
    this.calls.push({
      type: "bindAttributeLayout",
      layoutKey: getLayoutKey(layout),
    });
  }

  public drawIndexed(
    buffers: BufferId,
    topology: PrimitiveTopology,
    indexCount: number,
    byteOffset: number,
  ): void {
    const contents = this.requireBuffers(buffers);
    const end = byteOffset / Uint32Array.BYTES_PER_ELEMENT + indexCount;
    if (end > contents.indices.length) {
      throw new Error(
        `[RecordingBackend] Indexed draw reads to ${end}, buffer ${buffers} holds ${contents.indices.length}`,
      );
    }
    this.calls.push({
      type: "drawIndexed",
      buffers,
      topology,
      indexCount,
      byteOffset,
    });
  }

  public drawArrays(
    buffers: BufferId,
    topology: PrimitiveTopology,
    firstVertex: number,
    vertexCount: number,
  ): void {
    const contents = this.requireBuffers(buffers);
    const stored = contents.vertices.length / FLOATS_PER_VERTEX;
    const end = firstVertex + vertexCount;
    if (end > stored) {
      throw new Error(
        `[RecordingBackend] Array draw reads to ${end}, buffer ${buffers} holds ${stored}`,
      );
    }
    this.calls.push({
      type: "drawArrays",
      buffers,
      topology,
      firstVertex,
      vertexCount,
    });
  }

  public setPolygonMode(mode: PolygonMode): void {
    this.polygonMode = mode;
    this.calls.push({ type: "setPolygonMode", mode });
  }

  /**
   * Returns the recorded calls of one type, in order.
   */
  public callsOfType<T extends BackendCallType>(
    type: T,
  ): Extract<BackendCall, { type: T }>[] {
    return this.calls.filter(
      (call): call is Extract<BackendCall, { type: T }> => call.type === type,
    );
  }

  public getContents(buffers: BufferId): BufferContents | undefined {
    return this.buffers.get(buffers);
  }

  public get liveBufferCount(): number {
    return this.buffers.size;
  }

  private requireBuffers(buffers: BufferId): BufferContents {
    const contents = this.buffers.get(buffers);
    if (!contents) {
      throw new Error(`[RecordingBackend] Unknown buffers ${buffers}`);
    }
    return contents;
  }
}
