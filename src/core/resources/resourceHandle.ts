// src/core/resources/resourceHandle.ts
import { MeshEntry } from "@/core/types/gpu";

/**
 * An enumeration of all managed resource types.
 */
export enum ResourceType {
  Mesh,
  DynamicMesh,
}

/**
 * A type-safe, serializable identifier for a cached resource.
 *
 * @remarks
 * Combines a string-based key with phantom generic type T for compile-time safety.
 * The generic T represents the primary form of the resource.
 */
export class ResourceHandle<T> {
  public readonly key: string;
  public readonly type: ResourceType;
  private __phantom: T | undefined;

  private constructor(type: ResourceType, key: string) {
    this.type = type;
    this.key = key;
  }

  /**
   * Creates a handle for a mesh that is generated once.
   *
   * @remarks
   * The key follows the format "TYPE:path", for example
   * "PRIM:cone:radius=1,slices=3".
   *
   * @param key The mesh identifier
   */
  public static forMesh(key: string): ResourceHandle<MeshEntry> {
    return new ResourceHandle<MeshEntry>(ResourceType.Mesh, key);
  }

  /**
   * Creates a handle for a mesh that is regenerated on every draw.
   *
   * @param key A key unique within the owning registry
   */
  public static forDynamicMesh(key: string): ResourceHandle<MeshEntry> {
    return new ResourceHandle<MeshEntry>(ResourceType.DynamicMesh, key);
  }

  /**
   * Returns a string representation for debugging.
   */
  public toString(): string {
    return `${ResourceType[this.type]}:${this.key}`;
  }
}
