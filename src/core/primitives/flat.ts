// src/core/primitives/flat.ts
import { Vec3, vec3 } from "wgpu-matrix";
import { MeshBuilder } from "@/core/geometry/meshBuilder";
import { unitNormal } from "@/core/geometry/normals";
import { clampExtent } from "@/core/geometry/clamp";
import { MeshBuffer } from "@/core/types/mesh";
import {
  BoxParameters,
  FinParameters,
  PlaneParameters,
  PrismParameters,
  Pyramid3Parameters,
  Pyramid4Parameters,
} from "@/core/types/shapes";

type UV = readonly [number, number];

const QUAD_UVS: readonly UV[] = [
  [0, 0],
  [1, 0],
  [1, 1],
  [0, 1],
];

const TRIANGLE_UVS: readonly UV[] = [
  [0, 0],
  [1, 0],
  [0.5, 1],
];

/**
 * Flat normal of the triangle `a, b, c`; counter-clockwise corners face the
 * viewer.
 */
function faceNormal(a: Vec3, b: Vec3, c: Vec3): Vec3 {
  return unitNormal(
    vec3.cross(vec3.subtract(b, a), vec3.subtract(c, a)),
    vec3.create(0, 1, 0),
  );
}

/**
 * Adds four vertices and the indices `0,1,2, 2,3,0` for a planar quad.
 */
function addIndexedQuad(
  builder: MeshBuilder,
  corners: readonly [Vec3, Vec3, Vec3, Vec3],
  uvs: readonly UV[] = QUAD_UVS,
): void {
  const normal = faceNormal(corners[0], corners[1], corners[2]);
  const base = builder.vertexCount;
  corners.forEach((corner, i) => {
    builder.addVertex(corner, normal, uvs[i][0], uvs[i][1]);
  });
  builder.addIndices([base, base + 1, base + 2, base + 2, base + 3, base]);
}

/**
 * Adds three vertices of a non-indexed triangle with a flat normal.
 */
function addFlatTriangle(
  builder: MeshBuilder,
  corners: readonly [Vec3, Vec3, Vec3],
  uvs: readonly UV[] = TRIANGLE_UVS,
): void {
  const normal = faceNormal(corners[0], corners[1], corners[2]);
  corners.forEach((corner, i) => {
    builder.addVertex(corner, normal, uvs[i][0], uvs[i][1]);
  });
}

/**
 * Adds a planar quad as two non-indexed triangles (six vertices).
 */
function addFlatQuad(
  builder: MeshBuilder,
  corners: readonly [Vec3, Vec3, Vec3, Vec3],
): void {
  const [a, b, c, d] = corners;
  addFlatTriangle(builder, [a, b, c], [QUAD_UVS[0], QUAD_UVS[1], QUAD_UVS[2]]);
  addFlatTriangle(builder, [c, d, a], [QUAD_UVS[2], QUAD_UVS[3], QUAD_UVS[0]]);
}

/** Planar uv for a horizontal face of extent `size` centered on the origin. */
function planarUV(position: Vec3, size: number): UV {
  return [position[0] / size + 0.5, position[2] / size + 0.5];
}

type Corner = readonly [number, number, number];

// Corners are counter-clockwise seen from outside, in units of half an edge.
const BOX_FACES: readonly {
  name: string;
  corners: readonly [Corner, Corner, Corner, Corner];
}[] = [
  // prettier-ignore
  { name: "back", corners: [[1, -1, -1], [-1, -1, -1], [-1, 1, -1], [1, 1, -1]] },
  // prettier-ignore
  { name: "bottom", corners: [[-1, -1, -1], [1, -1, -1], [1, -1, 1], [-1, -1, 1]] },
  // prettier-ignore
  { name: "left", corners: [[-1, -1, -1], [-1, -1, 1], [-1, 1, 1], [-1, 1, -1]] },
  // prettier-ignore
  { name: "right", corners: [[1, -1, 1], [1, -1, -1], [1, 1, -1], [1, 1, 1]] },
  // prettier-ignore
  { name: "top", corners: [[-1, 1, 1], [1, 1, 1], [1, 1, -1], [-1, 1, -1]] },
  // prettier-ignore
  { name: "front", corners: [[-1, -1, 1], [1, -1, 1], [1, 1, 1], [-1, 1, 1]] },
];

/**
 * Creates a cube centered on the origin.
 *
 * @remarks
 * Every face owns its four vertices so normals and uvs never blend across an
 * edge: 24 vertices and 36 indices. Each face is also a sub-range named
 * `back`, `bottom`, `left`, `right`, `top` or `front`.
 *
 * @param params Edge length (`size`, default 1).
 */
export function generateBox(params: BoxParameters = {}): MeshBuffer {
  const half = clampExtent(params.size ?? 1) / 2;
  const builder = new MeshBuilder();

  for (const face of BOX_FACES) {
    const [a, b, c, d] = face.corners.map((corner) =>
      vec3.create(corner[0] * half, corner[1] * half, corner[2] * half),
    );
    builder.beginRange(face.name);
    addIndexedQuad(builder, [a, b, c, d]);
    builder.endRange();
  }

  return builder.build();
}

/**
 * Creates a horizontal plane facing +Y.
 */
export function generatePlane(params: PlaneParameters = {}): MeshBuffer {
  const { width = 2, depth = 2 } = params;
  const w = clampExtent(width) / 2;
  const d = clampExtent(depth) / 2;
  const up = vec3.create(0, 1, 0);
  const builder = new MeshBuilder();

  builder.addVertex(vec3.create(-w, 0, d), up, 0, 0);
  builder.addVertex(vec3.create(w, 0, d), up, 1, 0);
  builder.addVertex(vec3.create(w, 0, -d), up, 1, 1);
  builder.addVertex(vec3.create(-w, 0, -d), up, 0, 1);
  builder.addIndices([0, 1, 2, 0, 2, 3]);

  return builder.build();
}

/**
 * Creates a triangular prism standing on the XZ plane.
 *
 * @remarks
 * Drawn as a non-indexed triangle list of 24 vertices: two triangular caps
 * and three rectangular sides, each a vertex sub-range.
 */
export function generatePrism(params: PrismParameters = {}): MeshBuffer {
  const h = clampExtent(params.size ?? 1) / 2;
  const builder = new MeshBuilder();

  // Cross-section corners in ring order; sides between consecutive corners
  // face outward.
  const ring: readonly { name: string; x: number; z: number }[] = [
    { name: "left", x: -h, z: -h },
    { name: "right", x: 0, z: h },
    { name: "back", x: h, z: -h },
  ];
  const at = (i: number, y: number): Vec3 =>
    vec3.create(ring[i].x, y, ring[i].z);

  builder.beginRange("bottom");
  const bottom: [Vec3, Vec3, Vec3] = [at(0, -h), at(2, -h), at(1, -h)];
  addFlatTriangle(
    builder,
    bottom,
    bottom.map((p) => planarUV(p, 2 * h)),
  );
  builder.endRange();

  builder.beginRange("top");
  const top: [Vec3, Vec3, Vec3] = [at(0, h), at(1, h), at(2, h)];
  addFlatTriangle(
    builder,
    top,
    top.map((p) => planarUV(p, 2 * h)),
  );
  builder.endRange();

  for (let i = 0; i < ring.length; i++) {
    const next = (i + 1) % ring.length;
    builder.beginRange(ring[i].name);
    addFlatQuad(builder, [at(i, -h), at(next, -h), at(next, h), at(i, h)]);
    builder.endRange();
  }

  return builder.build();
}

/**
 * Adds the sides of a pyramid whose base ring is given in outward order.
 */
function addPyramidSides(
  builder: MeshBuilder,
  base: readonly Vec3[],
  apex: Vec3,
): void {
  for (let i = 0; i < base.length; i++) {
    addFlatTriangle(builder, [base[i], base[(i + 1) % base.length], apex]);
  }
}

/**
 * Creates a pyramid with a triangular base: 12 non-indexed vertices.
 */
export function generatePyramid3(params: Pyramid3Parameters = {}): MeshBuffer {
  const s = clampExtent(params.size ?? 1);
  const builder = new MeshBuilder();

  const base = [
    vec3.create(-0.5 * s, -0.5 * s, 0.5 * s),
    vec3.create(0.5 * s, -0.5 * s, 0.5 * s),
    vec3.create(0, -0.5 * s, -0.5 * s),
  ];
  const apex = vec3.create(0, 0.5 * s, 0);

  builder.beginRange("bottom");
  const bottom: [Vec3, Vec3, Vec3] = [base[0], base[2], base[1]];
  addFlatTriangle(
    builder,
    bottom,
    bottom.map((p) => planarUV(p, s)),
  );
  builder.endRange();

  builder.beginRange("sides");
  addPyramidSides(builder, base, apex);
  builder.endRange();

  return builder.build();
}

/**
 * Creates a square pyramid centered on the origin: 18 non-indexed vertices.
 */
export function generatePyramid4(params: Pyramid4Parameters = {}): MeshBuffer {
  const { baseSize = 1, height = 1 } = params;
  const size = clampExtent(baseSize);
  const hb = size / 2;
  const hh = clampExtent(height) / 2;
  const builder = new MeshBuilder();

  const base = [
    vec3.create(-hb, -hh, hb),
    vec3.create(hb, -hh, hb),
    vec3.create(hb, -hh, -hb),
    vec3.create(-hb, -hh, -hb),
  ];
  const apex = vec3.create(0, hh, 0);
  const uv = (p: Vec3) => planarUV(p, size);

  builder.beginRange("bottom");
  addFlatTriangle(builder, [base[0], base[3], base[2]], [
    uv(base[0]),
    uv(base[3]),
    uv(base[2]),
  ]);
  addFlatTriangle(builder, [base[0], base[2], base[1]], [
    uv(base[0]),
    uv(base[2]),
    uv(base[1]),
  ]);
  builder.endRange();

  builder.beginRange("sides");
  addPyramidSides(builder, base, apex);
  builder.endRange();

  return builder.build();
}

/**
 * Creates a fin: a right-angled trapezoid extruded along Z.
 *
 * @remarks
 * The trapezoid has its right angle at the origin, a bottom edge of
 * `baseLength` along +X and a top edge of `topLength` at `height`. Sub-ranges:
 * `front` (the -Z face), `back` (+Z) and `sides` (the four thin faces).
 */
export function generateFin(params: FinParameters = {}): MeshBuffer {
  const {
    baseLength = 2.9,
    topLength = 0.75,
    height = 2.5,
    thickness = 0.1,
  } = params;
  const base = clampExtent(baseLength);
  const top = clampExtent(topLength);
  const h = clampExtent(height);
  const t = clampExtent(thickness) / 2;
  const builder = new MeshBuilder();

  const v0 = vec3.create(0, 0, -t);
  const v1 = vec3.create(base, 0, -t);
  const v2 = vec3.create(0, h, -t);
  const v3 = vec3.create(top, h, -t);
  const v4 = vec3.create(0, 0, t);
  const v5 = vec3.create(base, 0, t);
  const v6 = vec3.create(0, h, t);
  const v7 = vec3.create(top, h, t);

  builder.beginRange("front");
  addIndexedQuad(builder, [v0, v2, v3, v1], [
    [0, 0],
    [0, 1],
    [1, 1],
    [1, 0],
  ]);
  builder.endRange();

  builder.beginRange("back");
  addIndexedQuad(builder, [v4, v5, v7, v6]);
  builder.endRange();

  builder.beginRange("sides");
  addIndexedQuad(builder, [v2, v6, v7, v3]);
  addIndexedQuad(builder, [v0, v1, v5, v4]);
  addIndexedQuad(builder, [v0, v4, v6, v2]);
  addIndexedQuad(builder, [v1, v3, v7, v5]);
  builder.endRange();

  return builder.build();
}
