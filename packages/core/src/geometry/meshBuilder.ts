/**
 * packages/core/src/geometry/meshBuilder.ts — Rectangle geometry emission.
 *
 * Pure functions: no layout knowledge, no backend state. A rectangle is four
 * corners in the order top-left, top-right, bottom-left, bottom-right and two
 * counter-clockwise triangles (0,2,1) and (3,1,2).
 */

import { TesselError, VERTEX_FLOATS } from "../abi.js";
import type { Point, Size } from "../layout/types.js";
import { type Rgb24, rgbToFloats } from "../widgets/style.js";
import type { PackedMesh, RectMesh, Vertex } from "./types.js";

export const RECT_INDICES: readonly number[] = Object.freeze([0, 2, 1, 3, 1, 2]);

/** Build the mesh for an axis-aligned rectangle in pixel space (y grows downward). */
export function emitRectangle(position: Point, size: Size, color: Rgb24): RectMesh {
  const c = rgbToFloats(color);
  const { x, y } = position;
  const vertices: Vertex[] = [
    { position: [x, y, 0], color: c },
    { position: [x + size.w, y, 0], color: c },
    { position: [x, y + size.h, 0], color: c },
    { position: [x + size.w, y + size.h, 0], color: c },
  ];
  return { vertices, indices: RECT_INDICES };
}

/**
 * Map pixel-space vertices into normalized device coordinates for a viewport:
 * (0, 0) becomes (-1, 1) and (w, h) becomes (1, -1).
 */
export function toClipSpace(mesh: RectMesh, viewport: Size): RectMesh {
  if (!(viewport.w > 0) || !(viewport.h > 0)) {
    throw new TesselError(
      "TESSEL_GEOMETRY_ERROR",
      `toClipSpace: viewport must be positive, got ${String(viewport.w)}x${String(viewport.h)}`,
    );
  }
  const vertices = mesh.vertices.map((v): Vertex => {
    const [x, y, z] = v.position;
    return { position: [(2 * x) / viewport.w - 1, 1 - (2 * y) / viewport.h, z], color: v.color };
  });
  return { vertices, indices: mesh.indices };
}

/** Interleave a mesh into upload-ready buffers. */
export function packMesh(mesh: RectMesh): PackedMesh {
  const vertices = new Float32Array(mesh.vertices.length * VERTEX_FLOATS);
  let o = 0;
  for (const v of mesh.vertices) {
    vertices[o++] = v.position[0];
    vertices[o++] = v.position[1];
    vertices[o++] = v.position[2];
    vertices[o++] = v.color[0];
    vertices[o++] = v.color[1];
    vertices[o++] = v.color[2];
  }
  return { vertices, indices: Uint16Array.from(mesh.indices) };
}
