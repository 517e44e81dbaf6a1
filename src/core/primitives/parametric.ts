// src/core/primitives/parametric.ts
import { vec3 } from "wgpu-matrix";
import { MeshBuilder, deindexMesh } from "@/core/geometry/meshBuilder";
import { analyticNormal } from "@/core/geometry/normals";
import { gridIndices } from "@/core/geometry/topology";
import {
  clampExtent,
  clampRange,
  clampSegments,
  ringAngle,
} from "@/core/geometry/clamp";
import { MeshBuffer } from "@/core/types/mesh";
import {
  HemisphereParameters,
  SphereParameters,
  SuperellipsoidParameters,
  TaperedTorusParameters,
  ThickTorusParameters,
  TorusParameters,
} from "@/core/types/shapes";

const MIN_EXPONENT = 0.1;

/**
 * Adds `bands + 1` rows of latitude samples running from the lowest band up
 * to the north pole, each with `columns + 1` longitude samples.
 *
 * @remarks
 * Row `k` sits at polar angle `(bands - k) * PI / divisor`. Rows run upward so
 * the grid topology winds outward. The last column repeats the first position
 * with `u` 0 instead of 1.
 */
function addLatitudeRows(
  builder: MeshBuilder,
  bands: number,
  divisor: number,
  columns: number,
  radius: number,
): number {
  const start = builder.vertexCount;
  for (let k = 0; k <= bands; k++) {
    const theta = ((bands - k) * Math.PI) / divisor;
    const sinTheta = Math.sin(theta);
    const cosTheta = Math.cos(theta);
    for (let lon = 0; lon <= columns; lon++) {
      const phi = ringAngle(lon, columns);
      const normal = analyticNormal(
        sinTheta * Math.cos(phi),
        cosTheta,
        sinTheta * Math.sin(phi),
      );
      builder.addVertex(
        vec3.scale(normal, radius),
        normal,
        1 - lon / columns,
        k / bands,
      );
    }
  }
  return start;
}

/**
 * Creates a UV sphere centered on the origin.
 *
 * @remarks
 * `(latitudeSegments + 1) * (longitudeSegments + 1)` vertices. The seam
 * column is duplicated so `u` runs from 1 to 0 without wrapping. The sub-range
 * `upperHalf` covers the bands above the equator.
 *
 * @param params Segment counts (default 18 each) and radius (default 1).
 */
export function generateSphere(params: SphereParameters = {}): MeshBuffer {
  const { latitudeSegments = 18, longitudeSegments = 18, radius = 1 } = params;
  const bands = clampSegments(latitudeSegments);
  const columns = clampSegments(longitudeSegments);
  const builder = new MeshBuilder();

  const start = addLatitudeRows(
    builder,
    bands,
    bands,
    columns,
    clampExtent(radius),
  );
  builder.addIndices(gridIndices(start, bands + 1, columns + 1));

  const upperBands = Math.floor(bands / 2);
  builder.addRange(
    "upperHalf",
    (bands - upperBands) * columns * 6,
    upperBands * columns * 6,
  );

  return builder.build();
}

/**
 * Creates the upper half of a UV sphere, open at the equator.
 *
 * @remarks
 * Samples `floor(latitudeSegments / 2)` bands with the polar angle step of the
 * full sphere, so an odd segment count stops just short of the equator.
 */
export function generateHemisphere(
  params: HemisphereParameters = {},
): MeshBuffer {
  const { latitudeSegments = 18, longitudeSegments = 18, radius = 1 } = params;
  const divisor = clampSegments(latitudeSegments);
  const bands = Math.floor(divisor / 2);
  const columns = clampSegments(longitudeSegments);
  const builder = new MeshBuilder();

  const start = addLatitudeRows(
    builder,
    bands,
    divisor,
    columns,
    clampExtent(radius),
  );
  builder.addIndices(gridIndices(start, bands + 1, columns + 1));

  return builder.build();
}

interface TorusGrid {
  mainRadius: number;
  mainSegments: number;
  tubeSegments: number;
  /** Main angle of row `i`. */
  mainAngle: (i: number) => number;
  /** Tube radius of row `i`. */
  tubeRadius: (i: number) => number;
  uv: (i: number, j: number) => [number, number];
}

/**
 * Adds a torus-shaped grid in the XY plane around the Z axis. Rows follow the
 * main circle, columns go around the tube.
 */
function addTorusGrid(builder: MeshBuilder, grid: TorusGrid): void {
  const { mainRadius, mainSegments, tubeSegments } = grid;
  const start = builder.vertexCount;

  for (let i = 0; i <= mainSegments; i++) {
    const theta = grid.mainAngle(i);
    const cosTheta = Math.cos(theta);
    const sinTheta = Math.sin(theta);
    const center = vec3.create(mainRadius * cosTheta, mainRadius * sinTheta, 0);
    const tube = grid.tubeRadius(i);

    for (let j = 0; j <= tubeSegments; j++) {
      const phi = ringAngle(j, tubeSegments);
      const normal = analyticNormal(
        Math.cos(phi) * cosTheta,
        Math.cos(phi) * sinTheta,
        Math.sin(phi),
      );
      const [u, v] = grid.uv(i, j);
      builder.addVertex(vec3.addScaled(center, normal, tube), normal, u, v);
    }
  }

  builder.addIndices(gridIndices(start, mainSegments + 1, tubeSegments + 1));
}

/**
 * Creates a torus lying in the XY plane.
 *
 * @remarks
 * Both the main circle and the tube duplicate their seam. The sub-range
 * `half` covers the first half of the main circle.
 */
export function generateTorus(params: TorusParameters = {}): MeshBuffer {
  const {
    mainRadius = 1,
    tubeRadius = 0.25,
    mainSegments = 18,
    tubeSegments = 18,
  } = params;
  const main = clampSegments(mainSegments);
  const tube = clampSegments(tubeSegments);
  const r = clampExtent(tubeRadius);
  const builder = new MeshBuilder();

  addTorusGrid(builder, {
    mainRadius: clampExtent(mainRadius),
    mainSegments: main,
    tubeSegments: tube,
    mainAngle: (i) => ringAngle(i, main),
    tubeRadius: () => r,
    uv: (i, j) => [i / main, j / tube],
  });
  builder.addRange("half", 0, Math.floor(main / 2) * tube * 6);

  return builder.build();
}

/**
 * Creates a unit torus with a configurable tube thickness, expanded into a
 * non-indexed triangle list.
 *
 * @remarks
 * Thickness above 1 would swallow the hole and falls back to 0.1.
 */
export function generateThickTorus(
  params: ThickTorusParameters = {},
): MeshBuffer {
  const { thickness = 0.4, segments = 30 } = params;
  const tubeRadius = thickness > 1 ? 0.1 : clampExtent(thickness);
  return deindexMesh(
    generateTorus({
      mainRadius: 1,
      tubeRadius,
      mainSegments: segments,
      tubeSegments: segments,
    }),
  );
}

/**
 * Creates a torus arc whose tube radius shrinks (or grows) linearly along the
 * main sweep.
 *
 * @remarks
 * The sweep is clamped to one full turn. Normals ignore the taper.
 */
export function generateTaperedTorus(
  params: TaperedTorusParameters = {},
): MeshBuffer {
  const {
    mainRadius = 1,
    tubeRadiusStart = 0.3,
    tubeRadiusEnd = 0.05,
    mainSegments = 36,
    tubeSegments = 18,
    sweepRadians = Math.PI * 2,
  } = params;
  const main = clampSegments(mainSegments);
  const tube = clampSegments(tubeSegments);
  const r0 = clampExtent(tubeRadiusStart);
  const r1 = clampExtent(tubeRadiusEnd);
  const sweep = clampRange(sweepRadians, 0, Math.PI * 2);
  const builder = new MeshBuilder();

  addTorusGrid(builder, {
    mainRadius: clampExtent(mainRadius),
    mainSegments: main,
    tubeSegments: tube,
    mainAngle: (i) => (i / main) * sweep,
    tubeRadius: (i) => r0 + (r1 - r0) * (i / main),
    uv: (i, j) => [j / tube, i / main],
  });

  return builder.build();
}

/** `sign(x) * |x|^e`. */
export function signedPow(x: number, exponent: number): number {
  return Math.sign(x) * Math.pow(Math.abs(x), exponent);
}

/**
 * Creates a superellipsoid.
 *
 * @remarks
 * The latitude `u` spans `[-PI/2, PI/2]` and the longitude `v` runs from `PI`
 * down to `-PI`. Positions apply {@link signedPow} with the vertical exponent to
 * `u` and the horizontal exponent to `v`, then scale per axis.
 *
 * Normals are an approximation: the exponentiated direction divided by the
 * axis scales, normalized. This is exact for an ellipsoid (both exponents 1)
 * and drifts from the true surface gradient as the exponents move away from 1.
 */
export function generateSuperellipsoid(
  params: SuperellipsoidParameters = {},
): MeshBuffer {
  const {
    scaleX = 1,
    scaleY = 1,
    scaleZ = 1,
    verticalExponent = 1,
    horizontalExponent = 1,
    uSegments = 24,
    vSegments = 24,
  } = params;
  const sx = clampExtent(scaleX);
  const sy = clampExtent(scaleY);
  const sz = clampExtent(scaleZ);
  const e1 = clampExtent(verticalExponent, MIN_EXPONENT);
  const e2 = clampExtent(horizontalExponent, MIN_EXPONENT);
  const rows = clampSegments(uSegments);
  const columns = clampSegments(vSegments);
  const builder = new MeshBuilder();

  for (let i = 0; i <= rows; i++) {
    const u = -Math.PI / 2 + (i / rows) * Math.PI;
    const cu = signedPow(Math.cos(u), e1);
    const su = signedPow(Math.sin(u), e1);

    for (let j = 0; j <= columns; j++) {
      const v = Math.PI - (j / columns) * Math.PI * 2;
      const cv = signedPow(Math.cos(v), e2);
      const sv = signedPow(Math.sin(v), e2);

      const normal = analyticNormal(
        (cu * cv) / sx,
        (cu * sv) / sy,
        su / sz,
        vec3.create(0, 0, Math.sign(u) || 1),
      );
      builder.addVertex(
        vec3.create(sx * cu * cv, sy * cu * sv, sz * su),
        normal,
        j / columns,
        i / rows,
      );
    }
  }
  builder.addIndices(gridIndices(0, rows + 1, columns + 1));

  return builder.build();
}
