// src/core/resources/resourceCache.ts
import { ResourceHandle } from "@/core/resources/resourceHandle";

/**
 * A keyed store for resources addressed by {@link ResourceHandle}.
 *
 * `T` The type of the resource being cached
 */
export class ResourceCache<T> {
  private cache = new Map<string, T>();

  /**
   * Gets a resource by its handle.
   * @param handle The resource handle
   * @returns The cached resource or null
   */
  public get(handle: ResourceHandle<T>): T | null {
    return this.cache.get(handle.key) ?? null;
  }

  /**
   * Stores a resource under the handle's key, replacing any previous one.
   */
  public set(handle: ResourceHandle<T>, resource: T): void {
    this.cache.set(handle.key, resource);
  }

  public has(handle: ResourceHandle<T>): boolean {
    return this.cache.has(handle.key);
  }

  /**
   * Removes a resource from cache.
   * @returns True if removed
   */
  public delete(handle: ResourceHandle<T>): boolean {
    return this.cache.delete(handle.key);
  }

  public clear(): void {
    this.cache.clear();
  }

  public get size(): number {
    return this.cache.size;
  }

  /**
   * Gets every cached resource, in insertion order.
   */
  public getAll(): T[] {
    return Array.from(this.cache.values());
  }
}
