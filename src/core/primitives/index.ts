// src/core/primitives/index.ts
import { MeshBuffer } from "@/core/types/mesh";
import {
  DynamicShapeKind,
  ShapeKind,
  ShapeParameterMap,
} from "@/core/types/shapes";
import {
  generateBox,
  generateFin,
  generatePlane,
  generatePrism,
  generatePyramid3,
  generatePyramid4,
} from "@/core/primitives/flat";
import {
  generateCone,
  generateCylinder,
  generatePartialCone,
  generateTaperedCylinder,
  generateTube,
} from "@/core/primitives/axisymmetric";
import {
  generateHemisphere,
  generateSphere,
  generateSuperellipsoid,
  generateTaperedTorus,
  generateThickTorus,
  generateTorus,
} from "@/core/primitives/parametric";
import {
  generateCurvedCone,
  generateSpiral,
  generateSpring,
} from "@/core/primitives/swept";
import { generateSineCone } from "@/core/primitives/sineCone";
import { NormalStrategy } from "@/core/geometry/normals";

export type ShapeGenerator<K extends ShapeKind> = (
  params?: ShapeParameterMap[K],
) => MeshBuffer;

type ShapeGeneratorTable = { [K in ShapeKind]: ShapeGenerator<K> };

/**
 * Every primitive generator, keyed by shape kind.
 */
export const shapeGenerators: ShapeGeneratorTable = {
  box: generateBox,
  plane: generatePlane,
  cone: generateCone,
  cylinder: generateCylinder,
  taperedCylinder: generateTaperedCylinder,
  tube: generateTube,
  partialCone: generatePartialCone,
  prism: generatePrism,
  pyramid3: generatePyramid3,
  pyramid4: generatePyramid4,
  fin: generateFin,
  sphere: generateSphere,
  hemisphere: generateHemisphere,
  torus: generateTorus,
  thickTorus: generateThickTorus,
  spring: generateSpring,
  curvedCone: generateCurvedCone,
  taperedTorus: generateTaperedTorus,
  spiral: generateSpiral,
  sineCone: generateSineCone,
  superellipsoid: generateSuperellipsoid,
};

/**
 * Which normal policy each generator applies.
 */
export const shapeNormalStrategies: Readonly<
  Record<ShapeKind, NormalStrategy>
> = {
  box: "analytic",
  plane: "analytic",
  cone: "analytic",
  cylinder: "analytic",
  taperedCylinder: "analytic",
  tube: "analytic",
  partialCone: "analytic",
  prism: "analytic",
  pyramid3: "analytic",
  pyramid4: "analytic",
  fin: "analytic",
  sphere: "analytic",
  hemisphere: "analytic",
  torus: "analytic",
  thickTorus: "analytic",
  spring: "frame-relative",
  curvedCone: "frame-relative",
  taperedTorus: "analytic",
  spiral: "frame-relative",
  sineCone: "area-weighted",
  superellipsoid: "analytic",
};

export const SHAPE_KINDS = Object.keys(shapeGenerators).filter(isShapeKind);

export const DYNAMIC_SHAPE_KINDS: readonly DynamicShapeKind[] = [
  "partialCone",
  "curvedCone",
  "taperedTorus",
  "spiral",
  "sineCone",
  "superellipsoid",
];

export function isShapeKind(name: string): name is ShapeKind {
  return Object.prototype.hasOwnProperty.call(shapeGenerators, name);
}

/**
 * Runs the generator registered for `kind`.
 */
export function generateShape<K extends ShapeKind>(
  kind: K,
  params?: ShapeParameterMap[K],
): MeshBuffer {
  const generator: ShapeGenerator<K> = shapeGenerators[kind];
  return generator(params);
}

/**
 * Builds the canonical primitive key for a shape, e.g.
 * `PRIM:cone:height=2,radius=1`. Parameters are sorted by name and undefined
 * values are dropped, so equal parameter sets always yield the same key.
 */
export function primitiveKey<K extends ShapeKind>(
  kind: K,
  params?: ShapeParameterMap[K],
): string {
  const entries: string[] = [];
  for (const [name, value] of Object.entries(params ?? {})) {
    if (typeof value === "number") {
      entries.push(`${name}=${value}`);
    }
  }
  entries.sort();
  return `PRIM:${kind}:${entries.join(",")}`;
}
