import type { RgbFloats } from "../widgets/style.js";

export type Vec3 = readonly [x: number, y: number, z: number];

export type Vertex = Readonly<{
  position: Vec3;
  color: RgbFloats;
}>;

/**
 * Indexed triangle geometry for one rectangle: four corners and two
 * triangles. Pixel space unless converted with `toClipSpace`.
 */
export type RectMesh = Readonly<{
  vertices: readonly Vertex[];
  indices: readonly number[];
}>;

/** Interleaved buffers ready for upload, laid out as `VERTEX_LAYOUT`. */
export type PackedMesh = Readonly<{
  vertices: Float32Array;
  indices: Uint16Array;
}>;
