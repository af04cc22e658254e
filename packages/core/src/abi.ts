/**
 * packages/core/src/abi.ts — Geometry buffer layout and error codes.
 *
 * Why: Pins the vertex format every rendering backend receives and defines the
 * error type thrown for API misuse. Layout failures caused by node props are
 * returned as `LayoutResult` values instead (see layout/validateProps.ts).
 */

// =============================================================================
// Vertex layout
// =============================================================================

/** Floats per vertex: position (x, y, z) then color (r, g, b). */
export const VERTEX_FLOATS = 6;
export const VERTEX_STRIDE_BYTES = VERTEX_FLOATS * 4;
export const VERTICES_PER_RECT = 4;
export const INDICES_PER_RECT = 6;

/** Largest vertex index a Uint16 index buffer can address. */
export const MAX_U16_INDEX = 0xffff;

export type VertexAttributeFormat = "float32x3";

export type VertexAttribute = Readonly<{
  shaderLocation: number;
  offset: number;
  format: VertexAttributeFormat;
}>;

export type VertexBufferLayout = Readonly<{
  arrayStride: number;
  stepMode: "vertex";
  attributes: readonly VertexAttribute[];
}>;

/** Vertex buffer layout matching `packMesh` output. */
export const VERTEX_LAYOUT: VertexBufferLayout = Object.freeze({
  arrayStride: VERTEX_STRIDE_BYTES,
  stepMode: "vertex",
  attributes: Object.freeze([
    Object.freeze({ shaderLocation: 0, offset: 0, format: "float32x3" }),
    Object.freeze({ shaderLocation: 1, offset: 12, format: "float32x3" }),
  ]),
});

// =============================================================================
// TesselError
// =============================================================================

/**
 * Deterministic error codes for all runtime violations.
 * These are surfaced as TesselError instances.
 */
export type TesselErrorCode =
  | "TESSEL_INVALID_PROPS"
  | "TESSEL_INVALID_STATE"
  | "TESSEL_GEOMETRY_ERROR";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class TesselError extends Error {
  override readonly name = "TesselError";
  readonly code: TesselErrorCode;

  constructor(code: TesselErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TesselError);
    }
  }
}
