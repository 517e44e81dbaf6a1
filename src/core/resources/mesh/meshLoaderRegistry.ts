// src/core/resources/mesh/meshLoaderRegistry.ts
import { IMeshLoader } from "@/core/resources/mesh/meshLoader";

/**
 * A mesh key split at its first colon.
 */
export interface MeshKeyParts {
  /** Upper-cased prefix, e.g. "PRIM". */
  prefix: string;
  /** Everything after the first colon, e.g. "cone:slices=3". */
  path: string;
}

/**
 * A mesh key together with the loader that owns its prefix.
 */
export interface ResolvedMeshKey extends MeshKeyParts {
  /** Null when nothing is registered for the prefix. */
  loader: IMeshLoader | null;
}

/**
 * Splits "PRIM:cone:slices=3" into `PRIM` and `cone:slices=3`. A key without
 * a colon is all prefix.
 */
export function splitMeshKey(key: string): MeshKeyParts {
  const separator = key.indexOf(":");
  if (separator === -1) {
    return { prefix: key.toUpperCase(), path: "" };
  }
  return {
    prefix: key.substring(0, separator).toUpperCase(),
    path: key.substring(separator + 1),
  };
}

/**
 * Maps key prefixes to the loaders that build meshes for them. Prefixes are
 * case-insensitive, and registering a prefix again replaces its loader.
 */
export class MeshLoaderRegistry {
  private loaders = new Map<string, IMeshLoader>();

  public register(prefix: string, loader: IMeshLoader): void {
    this.loaders.set(prefix.toUpperCase(), loader);
  }

  public has(prefix: string): boolean {
    return this.loaders.has(prefix.toUpperCase());
  }

  /**
   * Finds the loader for a full mesh key and the path it should be given.
   */
  public resolve(key: string): ResolvedMeshKey {
    const parts = splitMeshKey(key);
    return { ...parts, loader: this.loaders.get(parts.prefix) ?? null };
  }
}
