// src/core/geometry/topology.ts

/**
 * A contiguous run of vertices forming one ring (or one grid row).
 */
export interface RingSpan {
  start: number;
  count: number;
}

/**
 * `forward` emits `center, ring[i], ring[i + 1]`; `reverse` swaps the ring
 * vertices. Which one faces outward depends on the direction the ring was
 * sampled in.
 */
export type FanWinding = "forward" | "reverse";

/**
 * Emits a triangle fan around a shared center vertex.
 *
 * @param center Index of the center vertex.
 * @param ring The perimeter ring.
 * @param winding Triangle orientation.
 * @param wrap Whether the last ring vertex connects back to the first. Rings
 *   with a duplicated seam vertex pass `false`.
 * @returns Three indices per slice.
 */
export function fanIndices(
  center: number,
  ring: RingSpan,
  winding: FanWinding,
  wrap: boolean,
): number[] {
  const indices: number[] = [];
  const slices = wrap ? ring.count : ring.count - 1;
  for (let i = 0; i < slices; i++) {
    const current = ring.start + i;
    const next = ring.start + ((i + 1) % ring.count);
    if (winding === "forward") {
      indices.push(center, current, next);
    } else {
      indices.push(center, next, current);
    }
  }
  return indices;
}

/**
 * Emits two triangles per cell of a row-major vertex grid.
 *
 * @remarks
 * Each cell at row `r`, column `c` emits `(r,c), (r+1,c), (r,c+1)` and
 * `(r,c+1), (r+1,c), (r+1,c+1)`.
 *
 * @param start Index of the first grid vertex.
 * @param rows Number of vertex rows.
 * @param columns Number of vertices per row.
 */
export function gridIndices(
  start: number,
  rows: number,
  columns: number,
): number[] {
  const indices: number[] = [];
  for (let r = 0; r < rows - 1; r++) {
    for (let c = 0; c < columns - 1; c++) {
      const a = start + r * columns + c;
      const b = a + columns;
      indices.push(a, b, a + 1);
      indices.push(a + 1, b, b + 1);
    }
  }
  return indices;
}

/**
 * Emits the lateral wall between two rings of equal length.
 *
 * @remarks
 * Same cell shape as {@link gridIndices} with `lower` as row `r` and `upper` as
 * row `r + 1`.
 *
 * @throws If the rings differ in length.
 */
export function ringWallIndices(
  lower: RingSpan,
  upper: RingSpan,
  wrap: boolean,
): number[] {
  if (lower.count !== upper.count) {
    throw new Error(
      `[Topology] Ring wall needs rings of equal length, got ${lower.count} and ${upper.count}`,
    );
  }
  const indices: number[] = [];
  const count = lower.count;
  const columns = wrap ? count : count - 1;
  for (let c = 0; c < columns; c++) {
    const next = (c + 1) % count;
    const l = lower.start + c;
    const u = upper.start + c;
    const ln = lower.start + next;
    const un = upper.start + next;
    indices.push(l, u, ln);
    indices.push(ln, u, un);
  }
  return indices;
}

/**
 * Joins the last ring of one substructure to the first ring of another one
 * that was generated separately (a cap onto a tube, for example).
 *
 * @param from The ring the seam starts at; plays the role of the lower row.
 * @param to The ring the seam ends at.
 */
export function seamStitchIndices(
  from: RingSpan,
  to: RingSpan,
  wrap: boolean,
): number[] {
  if (from.start === to.start) {
    throw new Error("[Topology] Seam stitch needs two distinct rings");
  }
  return ringWallIndices(from, to, wrap);
}
