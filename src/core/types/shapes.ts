// src/core/types/shapes.ts

// Parameter objects are plain type aliases so they can be serialized into
// primitive keys. Every field is optional; generators fill in defaults.

export type BoxParameters = {
  /** Edge length. Defaults to 1. */
  size?: number;
};

export type PlaneParameters = {
  width?: number;
  depth?: number;
};

export type ConeParameters = {
  radius?: number;
  height?: number;
  slices?: number;
};

export type CylinderParameters = {
  radius?: number;
  height?: number;
  slices?: number;
};

export type TaperedCylinderParameters = {
  bottomRadius?: number;
  topRadius?: number;
  height?: number;
  slices?: number;
};

export type TubeParameters = {
  outerRadius?: number;
  innerRadius?: number;
  height?: number;
  slices?: number;
};

export type PartialConeParameters = {
  radius?: number;
  height?: number;
  slices?: number;
  /** Angular extent of the wall in degrees, centered on +X. */
  arcDegrees?: number;
};

export type PrismParameters = {
  size?: number;
};

export type Pyramid3Parameters = {
  size?: number;
};

export type Pyramid4Parameters = {
  baseSize?: number;
  height?: number;
};

export type FinParameters = {
  baseLength?: number;
  topLength?: number;
  height?: number;
  thickness?: number;
};

export type SphereParameters = {
  latitudeSegments?: number;
  longitudeSegments?: number;
  radius?: number;
};

export type HemisphereParameters = SphereParameters;

export type TorusParameters = {
  mainRadius?: number;
  tubeRadius?: number;
  mainSegments?: number;
  tubeSegments?: number;
};

export type ThickTorusParameters = {
  /** Tube radius; values above 1 fall back to 0.1. */
  thickness?: number;
  segments?: number;
};

export type SpringParameters = {
  mainRadius?: number;
  tubeRadius?: number;
  loops?: number;
  tubeSegments?: number;
  segmentsPerLoop?: number;
  length?: number;
};

export type CurvedConeParameters = {
  slices?: number;
  curveSteps?: number;
  radius?: number;
  /** Arc length of the centerline. */
  height?: number;
  bendRadius?: number;
};

export type TaperedTorusParameters = {
  mainRadius?: number;
  tubeRadiusStart?: number;
  tubeRadiusEnd?: number;
  mainSegments?: number;
  tubeSegments?: number;
  sweepRadians?: number;
};

export type SpiralParameters = {
  tubeRadius?: number;
  /** Squash of the cross-section along the frame normal, in [0, 0.9]. */
  flatten?: number;
  loopSpacing?: number;
  loops?: number;
  tubeSegments?: number;
  spiralSegments?: number;
};

export type SineConeParameters = {
  baseRadius?: number;
  height?: number;
  flatten?: number;
  amplitude?: number;
  frequency?: number;
  phase?: number;
  radialSegments?: number;
  heightSegments?: number;
};

export type SuperellipsoidParameters = {
  scaleX?: number;
  scaleY?: number;
  scaleZ?: number;
  verticalExponent?: number;
  horizontalExponent?: number;
  uSegments?: number;
  vSegments?: number;
};

/**
 * Maps every shape kind to its parameter object.
 */
export interface ShapeParameterMap {
  box: BoxParameters;
  plane: PlaneParameters;
  cone: ConeParameters;
  cylinder: CylinderParameters;
  taperedCylinder: TaperedCylinderParameters;
  tube: TubeParameters;
  partialCone: PartialConeParameters;
  prism: PrismParameters;
  pyramid3: Pyramid3Parameters;
  pyramid4: Pyramid4Parameters;
  fin: FinParameters;
  sphere: SphereParameters;
  hemisphere: HemisphereParameters;
  torus: TorusParameters;
  thickTorus: ThickTorusParameters;
  spring: SpringParameters;
  curvedCone: CurvedConeParameters;
  taperedTorus: TaperedTorusParameters;
  spiral: SpiralParameters;
  sineCone: SineConeParameters;
  superellipsoid: SuperellipsoidParameters;
}

export type ShapeKind = keyof ShapeParameterMap;

/**
 * Shapes that are regenerated on every draw against one persistent handle.
 */
export type DynamicShapeKind =
  | "partialCone"
  | "curvedCone"
  | "taperedTorus"
  | "spiral"
  | "sineCone"
  | "superellipsoid";
