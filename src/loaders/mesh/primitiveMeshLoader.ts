// src/loaders/mesh/primitiveMeshLoader.ts
import { IMeshLoader } from "@/core/resources/mesh/meshLoader";
import { MeshBuffer } from "@/core/types/mesh";
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

/**
 * Parses parameters from a primitive handle key.
 * Example: "size=2.5,slices=3" -> Map { "size": 2.5, "slices": 3 }
 */
export function parsePrimParams(key: string): Map<string, number> {
  const params = new Map<string, number>();
  if (!key) return params;

  key.split(",").forEach((part) => {
    const [name, value] = part.split("=");
    if (name && value) {
      const numValue = parseFloat(value);
      if (!isNaN(numValue)) {
        params.set(name.trim(), numValue);
      }
    }
  });
  return params;
}

/**
 * Loader for procedural primitive meshes like boxes, cones, springs, etc.
 *
 * @remarks
 * Parameters missing from the key are left undefined so each generator
 * applies its own default.
 */
export class PrimitiveMeshLoader implements IMeshLoader {
  /**
   * Generates a single procedural primitive mesh.
   *
   * @param path - The primitive definition (e.g., "cone:radius=1,slices=3").
   * @returns The MeshBuffer for the primitive, or null for an unknown kind.
   */
  public load(path: string): MeshBuffer | null {
    const separator = path.indexOf(":");
    const name = separator === -1 ? path : path.substring(0, separator);
    const params = parsePrimParams(
      separator === -1 ? "" : path.substring(separator + 1),
    );

    switch (name) {
      case "box":
        return generateBox({ size: params.get("size") });
      case "plane":
        return generatePlane({
          width: params.get("width"),
          depth: params.get("depth"),
        });
      case "cone":
        return generateCone({
          radius: params.get("radius"),
          height: params.get("height"),
          slices: params.get("slices"),
        });
      case "cylinder":
        return generateCylinder({
          radius: params.get("radius"),
          height: params.get("height"),
          slices: params.get("slices"),
        });
      case "taperedCylinder":
        return generateTaperedCylinder({
          bottomRadius: params.get("bottomRadius"),
          topRadius: params.get("topRadius"),
          height: params.get("height"),
          slices: params.get("slices"),
        });
      case "tube":
        return generateTube({
          outerRadius: params.get("outerRadius"),
          innerRadius: params.get("innerRadius"),
          height: params.get("height"),
          slices: params.get("slices"),
        });
      case "partialCone":
        return generatePartialCone({
          radius: params.get("radius"),
          height: params.get("height"),
          slices: params.get("slices"),
          arcDegrees: params.get("arcDegrees"),
        });
      case "prism":
        return generatePrism({ size: params.get("size") });
      case "pyramid3":
        return generatePyramid3({ size: params.get("size") });
      case "pyramid4":
        return generatePyramid4({
          baseSize: params.get("baseSize"),
          height: params.get("height"),
        });
      case "fin":
        return generateFin({
          baseLength: params.get("baseLength"),
          topLength: params.get("topLength"),
          height: params.get("height"),
          thickness: params.get("thickness"),
        });
      case "sphere":
        return generateSphere({
          latitudeSegments: params.get("latitudeSegments"),
          longitudeSegments: params.get("longitudeSegments"),
          radius: params.get("radius"),
        });
      case "hemisphere":
        return generateHemisphere({
          latitudeSegments: params.get("latitudeSegments"),
          longitudeSegments: params.get("longitudeSegments"),
          radius: params.get("radius"),
        });
      case "torus":
        return generateTorus({
          mainRadius: params.get("mainRadius"),
          tubeRadius: params.get("tubeRadius"),
          mainSegments: params.get("mainSegments"),
          tubeSegments: params.get("tubeSegments"),
        });
      case "thickTorus":
        return generateThickTorus({
          thickness: params.get("thickness"),
          segments: params.get("segments"),
        });
      case "spring":
        return generateSpring({
          mainRadius: params.get("mainRadius"),
          tubeRadius: params.get("tubeRadius"),
          loops: params.get("loops"),
          tubeSegments: params.get("tubeSegments"),
          segmentsPerLoop: params.get("segmentsPerLoop"),
          length: params.get("length"),
        });
      case "curvedCone":
        return generateCurvedCone({
          slices: params.get("slices"),
          curveSteps: params.get("curveSteps"),
          radius: params.get("radius"),
          height: params.get("height"),
          bendRadius: params.get("bendRadius"),
        });
      case "taperedTorus":
        return generateTaperedTorus({
          mainRadius: params.get("mainRadius"),
          tubeRadiusStart: params.get("tubeRadiusStart"),
          tubeRadiusEnd: params.get("tubeRadiusEnd"),
          mainSegments: params.get("mainSegments"),
          tubeSegments: params.get("tubeSegments"),
          sweepRadians: params.get("sweepRadians"),
        });
      case "spiral":
        return generateSpiral({
          tubeRadius: params.get("tubeRadius"),
          flatten: params.get("flatten"),
          loopSpacing: params.get("loopSpacing"),
          loops: params.get("loops"),
          tubeSegments: params.get("tubeSegments"),
          spiralSegments: params.get("spiralSegments"),
        });
      case "sineCone":
        return generateSineCone({
          baseRadius: params.get("baseRadius"),
          height: params.get("height"),
          flatten: params.get("flatten"),
          amplitude: params.get("amplitude"),
          frequency: params.get("frequency"),
          phase: params.get("phase"),
          radialSegments: params.get("radialSegments"),
          heightSegments: params.get("heightSegments"),
        });
      case "superellipsoid":
        return generateSuperellipsoid({
          scaleX: params.get("scaleX"),
          scaleY: params.get("scaleY"),
          scaleZ: params.get("scaleZ"),
          verticalExponent: params.get("verticalExponent"),
          horizontalExponent: params.get("horizontalExponent"),
          uSegments: params.get("uSegments"),
          vSegments: params.get("vSegments"),
        });
      default:
        console.error(`[PrimitiveMeshLoader] Unknown primitive type: ${name}`);
        return null;
    }
  }
}
