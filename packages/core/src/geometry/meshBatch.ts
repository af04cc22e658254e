/**
 * packages/core/src/geometry/meshBatch.ts — Accumulates rectangles into one buffer pair.
 *
 * Usage pattern:
 *   1. Call addRect()/addMesh() for every rectangle of a frame
 *   2. Call build() to produce interleaved vertex and Uint16 index buffers
 *   3. Call reset() to reuse the batch for the next frame
 *
 * Error handling: add calls record the first error internally and become
 * no-ops afterwards; build() reports it. Callers batch without per-call checks.
 */

import {
  INDICES_PER_RECT,
  MAX_U16_INDEX,
  VERTEX_FLOATS,
  VERTICES_PER_RECT,
} from "../abi.js";
import { isI32 } from "../layout/engine/bounds.js";
import type { Point, Size } from "../layout/types.js";
import type { Rgb24 } from "../widgets/style.js";
import { emitRectangle } from "./meshBuilder.js";
import type { RectMesh } from "./types.js";

export type MeshBatchErrorCode = "MESH_TOO_LARGE" | "MESH_BAD_PARAMS";

export type MeshBatchError = Readonly<{ code: MeshBatchErrorCode; detail: string }>;

export type MeshBatchResult =
  | Readonly<{ ok: true; vertices: Float32Array; indices: Uint16Array; rectCount: number }>
  | Readonly<{ ok: false; error: MeshBatchError }>;

export type MeshBatchOpts = Readonly<{
  /** Cap on rectangles per batch. Bounded by what a Uint16 index can address. */
  maxRects?: number;
  /** Reject non-int32 or negative rectangle params. Default true. */
  validateParams?: boolean;
}>;

/** Largest rectangle count whose vertices a Uint16 index buffer can address. */
export const MAX_RECTS_PER_BATCH = Math.floor((MAX_U16_INDEX + 1) / VERTICES_PER_RECT);

export class MeshBatch {
  private readonly maxRects: number;
  private readonly validateParams: boolean;
  private vertices: number[] = [];
  private indices: number[] = [];
  private rectCount = 0;
  private error: MeshBatchError | null = null;

  constructor(opts: MeshBatchOpts = {}) {
    const maxRects = opts.maxRects ?? MAX_RECTS_PER_BATCH;
    if (!Number.isInteger(maxRects) || maxRects <= 0 || maxRects > MAX_RECTS_PER_BATCH) {
      throw new RangeError(
        `MeshBatch: maxRects must be an integer in [1, ${String(MAX_RECTS_PER_BATCH)}]`,
      );
    }
    this.maxRects = maxRects;
    this.validateParams = opts.validateParams !== false;
  }

  get count(): number {
    return this.rectCount;
  }

  addRect(position: Point, size: Size, color: Rgb24): void {
    if (this.error) return;
    if (this.validateParams) {
      if (!isI32(position.x) || !isI32(position.y)) {
        this.fail("MESH_BAD_PARAMS", "addRect: position must be int32");
        return;
      }
      if (!isI32(size.w) || !isI32(size.h) || size.w < 0 || size.h < 0) {
        this.fail("MESH_BAD_PARAMS", "addRect: size must be non-negative int32");
        return;
      }
    }
    this.addMesh(emitRectangle(position, size, color));
  }

  addMesh(mesh: RectMesh): void {
    if (this.error) return;
    if (
      mesh.vertices.length !== VERTICES_PER_RECT ||
      mesh.indices.length !== INDICES_PER_RECT
    ) {
      this.fail("MESH_BAD_PARAMS", "addMesh: expected a single rectangle mesh");
      return;
    }
    if (this.rectCount >= this.maxRects) {
      this.fail("MESH_TOO_LARGE", `addMesh: batch is full (${String(this.maxRects)} rects)`);
      return;
    }

    const base = this.rectCount * VERTICES_PER_RECT;
    for (const v of mesh.vertices) {
      this.vertices.push(v.position[0], v.position[1], v.position[2]);
      this.vertices.push(v.color[0], v.color[1], v.color[2]);
    }
    for (const i of mesh.indices) this.indices.push(base + i);
    this.rectCount++;
  }

  build(): MeshBatchResult {
    if (this.error) return { ok: false, error: this.error };
    const vertices = new Float32Array(this.rectCount * VERTICES_PER_RECT * VERTEX_FLOATS);
    vertices.set(this.vertices);
    return {
      ok: true,
      vertices,
      indices: Uint16Array.from(this.indices),
      rectCount: this.rectCount,
    };
  }

  reset(): void {
    this.vertices = [];
    this.indices = [];
    this.rectCount = 0;
    this.error = null;
  }

  private fail(code: MeshBatchErrorCode, detail: string): void {
    this.error = { code, detail };
  }
}
