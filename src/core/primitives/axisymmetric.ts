// src/core/primitives/axisymmetric.ts
import { Vec3, vec3 } from "wgpu-matrix";
import { MeshBuilder } from "@/core/geometry/meshBuilder";
import { analyticNormal } from "@/core/geometry/normals";
import {
  fanIndices,
  ringWallIndices,
  RingSpan,
} from "@/core/geometry/topology";
import {
  clampExtent,
  clampSegments,
  clampSweepDegrees,
  ringAngle,
} from "@/core/geometry/clamp";
import { MeshBuffer } from "@/core/types/mesh";
import {
  ConeParameters,
  CylinderParameters,
  PartialConeParameters,
  TaperedCylinderParameters,
  TubeParameters,
} from "@/core/types/shapes";

const UP = vec3.create(0, 1, 0);
const DOWN = vec3.create(0, -1, 0);

/**
 * Adds a horizontal ring of `count` vertices at height `y`.
 *
 * @param radius Ring radius.
 * @param angleAt Angle of sample `i`.
 * @param normalAt Normal of sample `i` given its angle.
 * @param uvAt Texture coordinate of sample `i` given its angle.
 */
function addHorizontalRing(
  builder: MeshBuilder,
  count: number,
  radius: number,
  y: number,
  angleAt: (i: number) => number,
  normalAt: (angle: number) => Vec3,
  uvAt: (i: number, angle: number) => [number, number],
): RingSpan {
  return builder.addRing(count, (i) => {
    const angle = angleAt(i);
    const [u, v] = uvAt(i, angle);
    return {
      position: vec3.create(
        radius * Math.cos(angle),
        y,
        radius * Math.sin(angle),
      ),
      normal: normalAt(angle),
      u,
      v,
    };
  });
}

/** Disk uv: the unit circle mapped onto the unit square. */
const diskUV = (_i: number, angle: number): [number, number] => [
  0.5 + 0.5 * Math.cos(angle),
  0.5 + 0.5 * Math.sin(angle),
];

/**
 * Creates a cone standing on the XZ plane with its apex on +Y.
 *
 * @remarks
 * Layout: a bottom center, a ring of `slices` vertices, the apex, then two
 * vertices per slice for the flat-shaded side wall. For `slices = 3` that is
 * 11 vertices and 18 indices. Sub-ranges: `bottom` and `sides`.
 *
 * @param params Radius, height and slice count (default 1, 1, 18).
 */
export function generateCone(params: ConeParameters = {}): MeshBuffer {
  const { radius = 1, height = 1, slices = 18 } = params;
  const r = clampExtent(radius);
  const h = clampExtent(height);
  const n = clampSegments(slices);
  const builder = new MeshBuilder();
  const angleAt = (i: number) => ringAngle(i, n);

  const center = builder.addVertex(vec3.create(0, 0, 0), DOWN, 0.5, 0.5);
  const ring = addHorizontalRing(
    builder,
    n,
    r,
    0,
    angleAt,
    () => DOWN,
    diskUV,
  );
  const apex = builder.addVertex(vec3.create(0, h, 0), UP, 0.5, 0);

  builder.beginRange("bottom");
  builder.addIndices(fanIndices(center, ring, "forward", true));
  builder.endRange();

  builder.beginRange("sides");
  for (let i = 0; i < n; i++) {
    const a0 = angleAt(i);
    const a1 = angleAt(i + 1);
    const mid = ((i + 0.5) / n) * Math.PI * 2;
    // Flat per slice, perpendicular to the slanted wall.
    const normal = analyticNormal(h * Math.cos(mid), r, h * Math.sin(mid));
    const p0 = builder.addVertex(
      vec3.create(r * Math.cos(a0), 0, r * Math.sin(a0)),
      normal,
      i / n,
      1,
    );
    const p1 = builder.addVertex(
      vec3.create(r * Math.cos(a1), 0, r * Math.sin(a1)),
      normal,
      (i + 1) / n,
      1,
    );
    builder.addTriangle(apex, p1, p0);
  }
  builder.endRange();

  return builder.build();
}

/**
 * Creates a closed cylinder from y = 0 to y = height.
 *
 * @remarks
 * Both caps fan from a center vertex over a ring with a duplicated seam
 * vertex, and the side wall joins two more rings of `slices + 1` vertices
 * with radial normals. Sub-ranges: `bottom` (indices `[0, 3n)`), `top`
 * (`[3n, 6n)`) and `sides` (`[6n, 12n)`).
 */
export function generateCylinder(params: CylinderParameters = {}): MeshBuffer {
  const { radius = 1, height = 1, slices = 36 } = params;
  const r = clampExtent(radius);
  const h = clampExtent(height);
  const n = clampSegments(slices);
  const builder = new MeshBuilder();
  const angleAt = (i: number) => ringAngle(i, n);
  const radial = (angle: number) =>
    vec3.create(Math.cos(angle), 0, Math.sin(angle));

  const bottomCenter = builder.addVertex(vec3.create(0, 0, 0), DOWN, 0.5, 0.5);
  const bottomRing = addHorizontalRing(
    builder,
    n + 1,
    r,
    0,
    angleAt,
    () => DOWN,
    diskUV,
  );
  const topCenter = builder.addVertex(vec3.create(0, h, 0), UP, 0.5, 0.5);
  const topRing = addHorizontalRing(
    builder,
    n + 1,
    r,
    h,
    angleAt,
    () => UP,
    diskUV,
  );
  const sideBottom = addHorizontalRing(
    builder,
    n + 1,
    r,
    0,
    angleAt,
    radial,
    (i) => [i / n, 1],
  );
  const sideTop = addHorizontalRing(
    builder,
    n + 1,
    r,
    h,
    angleAt,
    radial,
    (i) => [i / n, 0],
  );

  builder.beginRange("bottom");
  builder.addIndices(fanIndices(bottomCenter, bottomRing, "forward", false));
  builder.endRange();

  builder.beginRange("top");
  builder.addIndices(fanIndices(topCenter, topRing, "reverse", false));
  builder.endRange();

  builder.beginRange("sides");
  builder.addIndices(ringWallIndices(sideBottom, sideTop, false));
  builder.endRange();

  return builder.build();
}

/**
 * Creates a frustum: a cylinder whose top radius differs from its bottom.
 *
 * @remarks
 * Rings hold exactly `slices` vertices and wrap around. Side normals are tilted
 * by the wall slope `(bottomRadius - topRadius) / height` so they stay
 * perpendicular to the slanted wall. Sub-ranges match the cylinder.
 */
export function generateTaperedCylinder(
  params: TaperedCylinderParameters = {},
): MeshBuffer {
  const {
    bottomRadius = 1,
    topRadius = 0.5,
    height = 1,
    slices = 18,
  } = params;
  const rb = clampExtent(bottomRadius);
  const rt = clampExtent(topRadius);
  const h = clampExtent(height);
  const n = clampSegments(slices);
  const slope = (rb - rt) / h;
  const builder = new MeshBuilder();
  const angleAt = (i: number) => ringAngle(i, n);
  const tilted = (angle: number) =>
    analyticNormal(Math.cos(angle), slope, Math.sin(angle));

  const bottomCenter = builder.addVertex(vec3.create(0, 0, 0), DOWN, 0.5, 0.5);
  const bottomRing = addHorizontalRing(
    builder,
    n,
    rb,
    0,
    angleAt,
    () => DOWN,
    diskUV,
  );
  const topCenter = builder.addVertex(vec3.create(0, h, 0), UP, 0.5, 0.5);
  const topRing = addHorizontalRing(
    builder,
    n,
    rt,
    h,
    angleAt,
    () => UP,
    diskUV,
  );
  const sideBottom = addHorizontalRing(
    builder,
    n,
    rb,
    0,
    angleAt,
    tilted,
    (i) => [i / n, 1],
  );
  const sideTop = addHorizontalRing(
    builder,
    n,
    rt,
    h,
    angleAt,
    tilted,
    (i) => [i / n, 0],
  );

  builder.beginRange("bottom");
  builder.addIndices(fanIndices(bottomCenter, bottomRing, "forward", true));
  builder.endRange();

  builder.beginRange("top");
  builder.addIndices(fanIndices(topCenter, topRing, "reverse", true));
  builder.endRange();

  builder.beginRange("sides");
  builder.addIndices(ringWallIndices(sideBottom, sideTop, true));
  builder.endRange();

  return builder.build();
}

/**
 * Creates a hollow tube: outer and inner walls joined by annular caps.
 *
 * @remarks
 * Each of the eight rings has `slices + 1` vertices. Inner wall normals point
 * toward the axis. `innerRadius` is kept below `outerRadius`. Sub-ranges:
 * `outer`, `inner`, `bottom`, `top`.
 */
export function generateTube(params: TubeParameters = {}): MeshBuffer {
  const {
    outerRadius = 2,
    innerRadius = 1.7,
    height = 1,
    slices = 30,
  } = params;
  const ro = clampExtent(outerRadius);
  const ri = Math.min(clampExtent(innerRadius), ro * 0.99);
  const h = clampExtent(height);
  const n = clampSegments(slices);
  const builder = new MeshBuilder();
  const angleAt = (i: number) => ringAngle(i, n);
  const outward = (angle: number) =>
    vec3.create(Math.cos(angle), 0, Math.sin(angle));
  const inward = (angle: number) =>
    vec3.create(-Math.cos(angle), 0, -Math.sin(angle));
  const ring = (
    radius: number,
    y: number,
    normalAt: (angle: number) => Vec3,
    v: number,
  ) =>
    addHorizontalRing(builder, n + 1, radius, y, angleAt, normalAt, (i) => [
      i / n,
      v,
    ]);

  const outerBottom = ring(ro, 0, outward, 1);
  const outerTop = ring(ro, h, outward, 0);
  const innerBottom = ring(ri, 0, inward, 1);
  const innerTop = ring(ri, h, inward, 0);
  const capBottomOuter = ring(ro, 0, () => DOWN, 1);
  const capBottomInner = ring(ri, 0, () => DOWN, 0);
  const capTopOuter = ring(ro, h, () => UP, 1);
  const capTopInner = ring(ri, h, () => UP, 0);

  builder.beginRange("outer");
  builder.addIndices(ringWallIndices(outerBottom, outerTop, false));
  builder.endRange();

  // Walls facing the axis or the ground run their rows in reverse.
  builder.beginRange("inner");
  builder.addIndices(ringWallIndices(innerTop, innerBottom, false));
  builder.endRange();

  builder.beginRange("bottom");
  builder.addIndices(ringWallIndices(capBottomInner, capBottomOuter, false));
  builder.endRange();

  builder.beginRange("top");
  builder.addIndices(ringWallIndices(capTopOuter, capTopInner, false));
  builder.endRange();

  return builder.build();
}

/**
 * Creates the side wall of a cone limited to an arc, centered on +X.
 *
 * @remarks
 * Two rings of `slices + 1` vertices (base and apex) are joined without
 * wrapping, so the first and last angular samples stay unconnected and the
 * silhouette is open. Regenerated per draw in the registry.
 */
export function generatePartialCone(
  params: PartialConeParameters = {},
): MeshBuffer {
  const { radius = 1, height = 1, slices = 18, arcDegrees = 180 } = params;
  const r = clampExtent(radius);
  const h = clampExtent(height);
  const n = clampSegments(slices);
  const arc = (clampSweepDegrees(arcDegrees) * Math.PI) / 180;
  const builder = new MeshBuilder();
  const angleAt = (i: number) => -arc / 2 + (i / n) * arc;
  const slanted = (angle: number) =>
    analyticNormal(Math.cos(angle), r / h, Math.sin(angle));

  const base = addHorizontalRing(
    builder,
    n + 1,
    r,
    0,
    angleAt,
    slanted,
    (i) => [i / n, 1],
  );
  const apex = addHorizontalRing(
    builder,
    n + 1,
    0,
    h,
    angleAt,
    slanted,
    (i) => [i / n, 0],
  );

  builder.beginRange("sides");
  builder.addIndices(ringWallIndices(base, apex, false));
  builder.endRange();

  return builder.build();
}
