// src/core/utils/layout.ts

/** Number of floats in one interleaved vertex record. */
export const FLOATS_PER_VERTEX = 8;

export type VertexFormat = "float32x2" | "float32x3";

export interface VertexAttribute {
  name: "position" | "normal" | "uv";
  shaderLocation: number;
  format: VertexFormat;
  /** Byte offset inside one vertex record. */
  offset: number;
}

/**
 * Describes how an interleaved vertex buffer is read by the vertex stage.
 */
export interface AttributeLayout {
  /** Byte stride between consecutive vertices. */
  arrayStride: number;
  attributes: readonly VertexAttribute[];
}

/**
 * The fixed layout every primitive generator writes: position at float 0,
 * normal at float 3, uv at float 6.
 */
export const DEFAULT_ATTRIBUTE_LAYOUT: AttributeLayout = {
  arrayStride: FLOATS_PER_VERTEX * Float32Array.BYTES_PER_ELEMENT,
  attributes: [
    { name: "position", shaderLocation: 0, format: "float32x3", offset: 0 },
    { name: "normal", shaderLocation: 1, format: "float32x3", offset: 12 },
    { name: "uv", shaderLocation: 2, format: "float32x2", offset: 24 },
  ],
};

/**
 * Generates a stable string key from an attribute layout.
 * Two layouts with the same key are interchangeable for binding purposes.
 *
 * @param layout - The layout to serialize.
 * @returns A unique string representation of the layout.
 */
export const getLayoutKey = (layout: AttributeLayout): string => {
  const attributes: string[] = [];
  for (const attr of layout.attributes) {
    attributes.push(`${attr.shaderLocation}:${attr.format}:${attr.offset}`);
  }
  return `${layout.arrayStride}:${attributes.join(",")}`;
};
