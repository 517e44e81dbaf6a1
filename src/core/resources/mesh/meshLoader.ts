// src/core/resources/mesh/meshLoader.ts
import { MeshBuffer } from "@/core/types/mesh";

/**
 * Defines the contract for a mesh loader.
 * Loaders are responsible for parsing a resource path and returning a
 * host-side MeshBuffer.
 */
export interface IMeshLoader {
  /**
   * Builds mesh data from a given resource path or identifier.
   *
   * @remarks
   * The path is the part of the resource key after the prefix (ie
   * "cone:radius=1,slices=3"). Generation is synchronous; there is no I/O.
   *
   * @param path - The resource path or identifier.
   * @returns The generated buffer, or null if the path names nothing this
   *   loader knows.
   */
  load(path: string): MeshBuffer | null;
}
