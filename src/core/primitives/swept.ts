// src/core/primitives/swept.ts
import { Vec3, vec3 } from "wgpu-matrix";
import { MeshBuilder } from "@/core/geometry/meshBuilder";
import { frameRelativeNormal, unitNormal } from "@/core/geometry/normals";
import {
  centralDifferenceTangents,
  crossSectionOffset,
  Frame,
  propagateFrames,
} from "@/core/geometry/frames";
import {
  fanIndices,
  gridIndices,
  ringWallIndices,
  RingSpan,
  seamStitchIndices,
} from "@/core/geometry/topology";
import {
  clampExtent,
  clampRange,
  clampSegments,
  ringAngle,
} from "@/core/geometry/clamp";
import { MeshBuffer } from "@/core/types/mesh";
import {
  CurvedConeParameters,
  SpiralParameters,
  SpringParameters,
} from "@/core/types/shapes";

/** Latitude rings in the spiral's start cap, pole excluded. */
const SPIRAL_CAP_RINGS = 8;

const MAX_FLATTEN = 0.9;

interface SweepOptions {
  segments: number;
  radius: (i: number) => number;
  v: (i: number) => number;
  flatten?: number;
  /** Tilt of the normal along the tangent, for tapering tubes. */
  slope?: number;
}

/**
 * Sweeps a circular (optionally flattened) cross-section along `frames`,
 * adding one ring of `segments + 1` vertices per frame and connecting
 * consecutive rings.
 *
 * @returns The span of the first ring.
 */
function sweepCrossSection(
  builder: MeshBuilder,
  frames: readonly Frame[],
  options: SweepOptions,
): RingSpan {
  const { segments, flatten = 0, slope = 0 } = options;
  const start = builder.vertexCount;

  frames.forEach((frame, i) => {
    const radius = options.radius(i);
    const v = options.v(i);
    builder.addRing(segments + 1, (j) => {
      const angle = ringAngle(j, segments);
      const radial = frameRelativeNormal(
        frame.normal,
        frame.binormal,
        angle,
        flatten,
      );
      return {
        position: vec3.addScaled(
          frame.origin,
          crossSectionOffset(frame, angle, flatten),
          radius,
        ),
        normal:
          slope === 0
            ? radial
            : unitNormal(vec3.addScaled(radial, frame.tangent, slope), radial),
        u: j / segments,
        v,
      };
    });
  });

  builder.addIndices(gridIndices(start, frames.length, segments + 1));
  return { start, count: segments + 1 };
}

/**
 * Creates a helical spring around the Z axis.
 *
 * @remarks
 * The helix is sampled `segmentsPerLoop` times per loop and rises `length`
 * over all loops. Frames are propagated by parallel transport so the tube
 * does not twist.
 */
export function generateSpring(params: SpringParameters = {}): MeshBuffer {
  const {
    mainRadius = 1,
    tubeRadius = 0.1,
    loops = 6,
    tubeSegments = 18,
    segmentsPerLoop = 18,
    length = 4,
  } = params;
  const R = clampExtent(mainRadius);
  const r = clampExtent(tubeRadius);
  const loopCount = clampSegments(loops, 1);
  const segments = clampSegments(tubeSegments, 8);
  const perLoop = clampSegments(segmentsPerLoop);
  const samples = loopCount * perLoop;
  const step = (Math.PI * 2) / perLoop;
  const rise = clampExtent(length) / samples;

  const points: Vec3[] = [];
  const tangents: Vec3[] = [];
  for (let i = 0; i <= samples; i++) {
    const angle = i * step;
    points.push(
      vec3.create(R * Math.cos(angle), R * Math.sin(angle), i * rise),
    );
    tangents.push(
      vec3.create(-R * Math.sin(angle) * step, R * Math.cos(angle) * step, rise),
    );
  }

  const builder = new MeshBuilder();
  sweepCrossSection(
    builder,
    propagateFrames(points, tangents, vec3.create(0, 0, 1)),
    {
      segments,
      radius: () => r,
      v: (i) => i / samples,
    },
  );
  return builder.build();
}

/**
 * Creates a cone whose axis bends along a circular arc in the XY plane,
 * tapering to a point at the far end.
 *
 * @remarks
 * The centerline starts at the origin heading +X and curls toward +Y with
 * radius `bendRadius`; its arc length is `height`. Normals lean along the
 * tangent by the taper slope `radius / height`.
 */
export function generateCurvedCone(
  params: CurvedConeParameters = {},
): MeshBuffer {
  const {
    slices = 18,
    curveSteps = 12,
    radius = 0.5,
    height = 2,
    bendRadius = 2,
  } = params;
  const n = clampSegments(slices);
  const steps = clampSegments(curveSteps, 1);
  const r = clampExtent(radius);
  const h = clampExtent(height);
  const bend = clampExtent(bendRadius);
  const bendAngle = h / bend;

  const points: Vec3[] = [];
  const tangents: Vec3[] = [];
  for (let s = 0; s <= steps; s++) {
    const theta = (s / steps) * bendAngle;
    points.push(
      vec3.create(bend * Math.sin(theta), bend * (1 - Math.cos(theta)), 0),
    );
    tangents.push(vec3.create(Math.cos(theta), Math.sin(theta), 0));
  }

  const builder = new MeshBuilder();
  sweepCrossSection(
    builder,
    propagateFrames(points, tangents, vec3.create(0, 1, 0)),
    {
      segments: n,
      radius: (s) => r * (1 - s / steps),
      v: (s) => s / steps,
      slope: r / h,
    },
  );
  return builder.build();
}

/**
 * Creates a tube following an Archimedean spiral in the XY plane, with a
 * hemispherical cap closing its inner end.
 *
 * @remarks
 * The spiral radius grows by `loopSpacing` per turn. Sampling starts half a
 * turn in, where the radius is already non-zero. The cap is built as its own
 * set of rings around the first frame and seam-stitched onto the first tube
 * ring. Sub-ranges: `tube` and `cap`.
 */
export function generateSpiral(params: SpiralParameters = {}): MeshBuffer {
  const {
    tubeRadius = 0.1,
    flatten = 0,
    loopSpacing = 0.3,
    loops = 3,
    tubeSegments = 16,
    spiralSegments = 120,
  } = params;
  const tr = clampExtent(tubeRadius);
  const squash = clampRange(flatten, 0, MAX_FLATTEN);
  const spacing = clampExtent(loopSpacing);
  const turns = Number.isFinite(loops) ? Math.max(1, loops) : 1;
  const segments = clampSegments(tubeSegments);
  const spiralSteps = clampSegments(spiralSegments);

  const step = (turns * Math.PI * 2) / spiralSteps;
  const first = Math.floor(Math.PI / step);
  const points: Vec3[] = [];
  for (let i = first; i <= spiralSteps; i++) {
    const theta = i * step;
    const radius = (spacing * theta) / (Math.PI * 2);
    points.push(
      vec3.create(radius * Math.cos(theta), radius * Math.sin(theta), 0),
    );
  }
  const frames = propagateFrames(
    points,
    centralDifferenceTangents(points),
    vec3.create(1, 0, 0),
  );

  const builder = new MeshBuilder();
  const last = frames.length - 1;

  builder.beginRange("tube");
  const firstTubeRing = sweepCrossSection(builder, frames, {
    segments,
    radius: () => tr,
    v: (i) => i / last,
    flatten: squash,
  });
  builder.endRange();

  builder.beginRange("cap");
  const start = frames[0];
  const back = vec3.negate(start.tangent);
  const pole = builder.addVertex(
    vec3.addScaled(start.origin, back, tr),
    back,
    0.5,
    -1,
  );

  const capRings: RingSpan[] = [];
  for (let k = 1; k < SPIRAL_CAP_RINGS; k++) {
    const polar = (k * Math.PI) / (2 * SPIRAL_CAP_RINGS);
    const along = Math.cos(polar);
    const across = Math.sin(polar);
    capRings.push(
      builder.addRing(segments + 1, (j) => {
        const angle = ringAngle(j, segments);
        const offset = vec3.addScaled(
          vec3.scale(crossSectionOffset(start, angle, squash), across),
          back,
          along,
        );
        const radial = frameRelativeNormal(
          start.normal,
          start.binormal,
          angle,
          squash,
        );
        return {
          position: vec3.addScaled(start.origin, offset, tr),
          normal: unitNormal(
            vec3.addScaled(vec3.scale(radial, across), back, along),
            back,
          ),
          u: j / segments,
          v: -along,
        };
      }),
    );
  }

  builder.addIndices(fanIndices(pole, capRings[0], "forward", false));
  for (let k = 0; k + 1 < capRings.length; k++) {
    builder.addIndices(ringWallIndices(capRings[k], capRings[k + 1], false));
  }
  builder.addIndices(
    seamStitchIndices(capRings[capRings.length - 1], firstTubeRing, false),
  );
  builder.endRange();

  return builder.build();
}
