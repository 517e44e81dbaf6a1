// src/core/resources/meshRegistry.ts
import { generateShape, primitiveKey } from "@/core/primitives";
import { IMeshLoader } from "@/core/resources/mesh/meshLoader";
import { MeshLoaderRegistry } from "@/core/resources/mesh/meshLoaderRegistry";
import { MeshFactory } from "@/core/resources/meshFactory";
import { ResourceCache } from "@/core/resources/resourceCache";
import { ResourceHandle } from "@/core/resources/resourceHandle";
import { Mesh, MeshEntry, RenderBackend } from "@/core/types/gpu";
import { MeshBuffer, SubRange } from "@/core/types/mesh";
import {
  DynamicShapeKind,
  ShapeKind,
  ShapeParameterMap,
} from "@/core/types/shapes";
import {
  AttributeLayout,
  DEFAULT_ATTRIBUTE_LAYOUT,
  getLayoutKey,
} from "@/core/utils/layout";
import { PrimitiveMeshLoader } from "@/loaders/mesh/primitiveMeshLoader";

export type MeshHandle = ResourceHandle<MeshEntry>;

/**
 * A handle to a mesh that is regenerated from `shape` on every draw.
 */
export interface DynamicMeshHandle<K extends DynamicShapeKind> {
  readonly shape: K;
  readonly handle: MeshHandle;
}

export interface MeshRegistryOptions {
  /** Vertex layout bound before the first upload. */
  layout?: AttributeLayout;
  /** Logs validation and layout binding when set. */
  debug?: boolean;
}

export interface DrawOptions {
  /** Sub-range name(s) to draw. The whole mesh is drawn when omitted. */
  range?: string | readonly string[];
  /** Draws in line mode, restoring fill afterwards. */
  wireframe?: boolean;
}

/**
 * Owns every mesh uploaded to one render context.
 *
 * @remarks
 * Static meshes are generated once per distinct key and cached; loading the
 * same shape with the same parameters returns an equal handle without a
 * second upload. Dynamic meshes keep one set of buffers whose contents are
 * replaced on each draw. The attribute layout is bound once, before the first
 * upload or draw, and again only after {@link MeshRegistry.resetContext}.
 */
export class MeshRegistry {
  private backend: RenderBackend;
  private layout: AttributeLayout;
  private debug: boolean;
  private layoutBound = false;
  private nextMeshId = 0;
  private nextDynamicId = 0;

  private meshCache = new ResourceCache<MeshEntry>();
  private meshLoaderRegistry = new MeshLoaderRegistry();

  constructor(backend: RenderBackend, options: MeshRegistryOptions = {}) {
    const { layout = DEFAULT_ATTRIBUTE_LAYOUT, debug = false } = options;
    this.backend = backend;
    this.layout = layout;
    this.debug = debug;
    this.meshLoaderRegistry.register("PRIM", new PrimitiveMeshLoader());
  }

  public get isLayoutBound(): boolean {
    return this.layoutBound;
  }

  /**
   * Registers a loader for keys with the given prefix ("PRIM" is built in).
   */
  public registerLoader(prefix: string, loader: IMeshLoader): void {
    this.meshLoaderRegistry.register(prefix, loader);
  }

  /**
   * Generates and uploads a primitive, or returns the handle of an identical
   * one already loaded.
   *
   * @remarks
   * The generator receives `params` directly, so the uploaded data always
   * equals `generateShape(shape, params)`, including for values such as `NaN`
   * that a key string cannot carry.
   */
  public load<K extends ShapeKind>(
    shape: K,
    params?: ShapeParameterMap[K],
  ): MeshHandle {
    const key = primitiveKey(shape, params);
    const handle = ResourceHandle.forMesh(key);
    if (this.meshCache.has(handle)) {
      return handle;
    }

    const mesh = this.upload(key, generateShape(shape, params));
    this.meshCache.set(handle, { kind: "static", mesh });
    return handle;
  }

  /**
   * Loads a mesh by its full key, e.g. "PRIM:cone:radius=1,slices=3".
   *
   * @throws If no loader handles the prefix or the loader rejects the path.
   */
  public loadByKey(key: string): MeshHandle {
    const handle = ResourceHandle.forMesh(key);
    if (this.meshCache.has(handle)) {
      return handle;
    }

    const { prefix, path, loader } = this.meshLoaderRegistry.resolve(key);
    if (!loader) {
      throw new Error(`[MeshRegistry] Unsupported mesh handle type: ${prefix}`);
    }

    const buffer = loader.load(path);
    if (!buffer) {
      throw new Error(`[MeshRegistry] Failed to load mesh data for key: ${key}`);
    }

    const mesh = this.upload(key, buffer);
    this.meshCache.set(handle, { kind: "static", mesh });
    return handle;
  }

  /**
   * Registers a dynamic mesh. Nothing is uploaded until the first
   * {@link MeshRegistry.drawDynamic}.
   */
  public createDynamic<K extends DynamicShapeKind>(
    shape: K,
  ): DynamicMeshHandle<K> {
    const handle = ResourceHandle.forDynamicMesh(
      `DYN:${shape}#${this.nextDynamicId++}`,
    );
    this.meshCache.set(handle, {
      kind: "dynamic",
      shape,
      mesh: null,
      regenerations: 0,
    });
    return { shape, handle };
  }

  /**
   * Draws a loaded mesh, whole or by named sub-ranges.
   *
   * @throws If the handle was never loaded, was released, or names an
   *   unknown sub-range.
   */
  public draw(handle: MeshHandle, options: DrawOptions = {}): void {
    this.drawMesh(this.getMesh(handle), options);
  }

  /**
   * Draws a loaded mesh in line mode.
   *
   * @deprecated Use `draw(handle, { wireframe: true })`.
   */
  public drawLines(handle: MeshHandle): void {
    this.draw(handle, { wireframe: true });
  }

  /**
   * Regenerates a dynamic mesh from `params`, replaces its buffer contents
   * and draws it.
   */
  public drawDynamic<K extends DynamicShapeKind>(
    dynamic: DynamicMeshHandle<K>,
    params: ShapeParameterMap[K],
    options: DrawOptions = {},
  ): void {
    const entry = this.meshCache.get(dynamic.handle);
    if (!entry || entry.kind !== "dynamic") {
      throw new Error(
        `[MeshRegistry] Dynamic mesh ${dynamic.handle.toString()} is not registered`,
      );
    }

    const buffer = generateShape(dynamic.shape, params);
    entry.regenerations++;
    entry.mesh = entry.mesh
      ? MeshFactory.updateMesh(this.backend, entry.mesh, buffer, this.debug)
      : this.upload(dynamic.handle.key, buffer);

    this.drawMesh(entry.mesh, options);
  }

  /**
   * Gets the uploaded mesh behind a handle.
   *
   * @throws If the handle is unknown or a dynamic mesh has not been drawn yet.
   */
  public getMesh(handle: MeshHandle): Mesh {
    const entry = this.meshCache.get(handle);
    if (!entry) {
      throw new Error(
        `[MeshRegistry] Mesh ${handle.toString()} has not been loaded`,
      );
    }
    if (!entry.mesh) {
      throw new Error(
        `[MeshRegistry] Dynamic mesh ${handle.toString()} has not been drawn yet`,
      );
    }
    return entry.mesh;
  }

  public getSubRanges(handle: MeshHandle): readonly SubRange[] {
    return this.getMesh(handle).subRanges;
  }

  /**
   * Number of times a dynamic mesh has been regenerated.
   */
  public getRegenerationCount(
    dynamic: DynamicMeshHandle<DynamicShapeKind>,
  ): number {
    const entry = this.meshCache.get(dynamic.handle);
    return entry && entry.kind === "dynamic" ? entry.regenerations : 0;
  }

  public has(handle: MeshHandle): boolean {
    return this.meshCache.has(handle);
  }

  public get size(): number {
    return this.meshCache.size;
  }

  /**
   * Destroys a mesh's buffers and forgets it. Unknown handles are ignored.
   */
  public release(handle: MeshHandle): void {
    const entry = this.meshCache.get(handle);
    if (!entry) return;
    if (entry.mesh) {
      this.backend.destroyBuffers(entry.mesh.buffers);
    }
    this.meshCache.delete(handle);
  }

  /**
   * Destroys every mesh. The layout stays bound.
   */
  public clear(): void {
    for (const entry of this.meshCache.getAll()) {
      if (entry.mesh) {
        this.backend.destroyBuffers(entry.mesh.buffers);
      }
    }
    this.meshCache.clear();
  }

  /**
   * Forgets every mesh and the layout binding after the render context was
   * lost. Buffers are not destroyed since they died with the context.
   */
  public resetContext(): void {
    console.warn(
      `[MeshRegistry] Render context reset, dropping ${this.meshCache.size} meshes`,
    );
    this.meshCache.clear();
    this.layoutBound = false;
  }

  private bindLayout(): void {
    if (this.layoutBound) return;
    this.backend.bindAttributeLayout(this.layout);
    this.layoutBound = true;
    if (this.debug) {
      console.log(
        `[MeshRegistry] Bound attribute layout ${getLayoutKey(this.layout)}`,
      );
    }
  }

  private upload(key: string, buffer: MeshBuffer): Mesh {
    this.bindLayout();
    return MeshFactory.createMesh(
      this.backend,
      this.nextMeshId++,
      key,
      buffer,
      this.debug,
    );
  }

  private drawMesh(mesh: Mesh, options: DrawOptions): void {
    this.bindLayout();
    const ranges = this.resolveRanges(mesh, options.range);

    if (options.wireframe) {
      this.backend.setPolygonMode("line");
    }
    try {
      for (const range of ranges) {
        if (mesh.indexCount > 0) {
          this.backend.drawIndexed(
            mesh.buffers,
            mesh.topology,
            range.count,
            range.offset * Uint32Array.BYTES_PER_ELEMENT,
          );
        } else {
          this.backend.drawArrays(
            mesh.buffers,
            mesh.topology,
            range.offset,
            range.count,
          );
        }
      }
    } finally {
      if (options.wireframe) {
        this.backend.setPolygonMode("fill");
      }
    }
  }

  private resolveRanges(
    mesh: Mesh,
    range: DrawOptions["range"],
  ): readonly SubRange[] {
    if (range === undefined) {
      return [
        {
          name: "all",
          offset: 0,
          count: mesh.indexCount > 0 ? mesh.indexCount : mesh.vertexCount,
        },
      ];
    }
    const names = typeof range === "string" ? [range] : range;
    return names.map((name) => {
      const found = mesh.subRanges.find((r) => r.name === name);
      if (!found) {
        throw new Error(
          `[MeshRegistry] Mesh "${mesh.key}" has no sub-range "${name}"`,
        );
      }
      return found;
    });
  }
}
