// src/index.ts
export * from "@/core/types/mesh";
export * from "@/core/types/shapes";
export type {
  AABB,
  BufferId,
  Mesh,
  MeshEntry,
  PolygonMode,
  RenderBackend,
} from "@/core/types/gpu";
export * from "@/core/utils/layout";
export {
  generateShape,
  primitiveKey,
  shapeGenerators,
  shapeNormalStrategies,
  isShapeKind,
  SHAPE_KINDS,
  DYNAMIC_SHAPE_KINDS,
} from "@/core/primitives";
export type { ShapeGenerator } from "@/core/primitives";
export {
  deindexMesh,
  readVertex,
  triangleIndices,
} from "@/core/geometry/meshBuilder";
export { MeshRegistry } from "@/core/resources/meshRegistry";
export type {
  DrawOptions,
  DynamicMeshHandle,
  MeshHandle,
  MeshRegistryOptions,
} from "@/core/resources/meshRegistry";
export { computeAABB, validateMeshBuffer } from "@/core/resources/meshFactory";
export type { IMeshLoader } from "@/core/resources/mesh/meshLoader";
export { RecordingBackend } from "@/core/rendering/recordingBackend";
export type { BackendCall } from "@/core/rendering/recordingBackend";
