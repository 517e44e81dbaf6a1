// src/core/geometry/clamp.ts

/** Smallest segment count any generator accepts. */
export const MIN_SEGMENTS = 3;

/** Replacement for non-positive radii, heights and scales. */
export const MIN_EXTENT = 1e-3;

/**
 * Clamps a segment count to an integer no smaller than `min`.
 * Non-finite input falls back to `min`.
 */
export function clampSegments(value: number, min = MIN_SEGMENTS): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.floor(value));
}

/**
 * Clamps a length-like parameter to a small positive value.
 */
export function clampExtent(value: number, min = MIN_EXTENT): number {
  if (!Number.isFinite(value) || value <= 0) return min;
  return value;
}

/**
 * Clamps a sweep angle in degrees to [0, 360].
 */
export function clampSweepDegrees(degrees: number): number {
  if (Number.isNaN(degrees)) return 0;
  return Math.min(360, Math.max(0, degrees));
}

/**
 * Clamps a value to [min, max]; NaN becomes `min`.
 */
export function clampRange(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/**
 * Angle of sample `i` on a closed ring of `segments` samples.
 *
 * @remarks
 * The sample at `i === segments` reuses the angle of sample 0, so a duplicated
 * seam column lands on exactly the same position as the first column.
 */
export function ringAngle(i: number, segments: number): number {
  return ((i % segments) / segments) * Math.PI * 2;
}
