/**
 * @tessel/core
 *
 * Retained-tree layout engine: sizing policy in, absolute geometry out.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Re-exports from modules
// =============================================================================

export {
  // Vertex layout
  VERTEX_FLOATS,
  VERTEX_STRIDE_BYTES,
  VERTICES_PER_RECT,
  INDICES_PER_RECT,
  VERTEX_LAYOUT,
  type VertexAttribute,
  type VertexBufferLayout,
  // Error types
  TesselError,
  type TesselErrorCode,
} from "./abi.js";

// =============================================================================
// Sizing primitives
// =============================================================================

export {
  type Axis,
  type LayoutMode,
  type Point,
  type Rect,
  type Size,
  type Sizing,
  type FitMode,
  type GrowMode,
  type SizingMode,
  type SizingModeKind,
  DEFAULT_LAYOUT_MODE,
  DEFAULT_SIZING,
  FIT,
  GROW,
  crossAxisOf,
  fixed,
  flipAxis,
  mainAxisOf,
  sizing,
  sizingModeOn,
} from "./layout/types.js";

export { type Length, type LengthUnit, type TaggedLength, inch, mm, px } from "./layout/units.js";

export type { LayoutFatal, LayoutFatalCode, LayoutResult } from "./layout/validateProps.js";

// =============================================================================
// Node specs
// =============================================================================

export { ui } from "./ui.js";
export type {
  ColumnProps,
  ContainerProps,
  LeafProps,
  NodeBoxProps,
  NodeSpec,
  RowProps,
  UiChild,
} from "./widgets/types.js";
export {
  type Rgb24,
  type RgbFloats,
  colors,
  rgb,
  rgbB,
  rgbG,
  rgbR,
  rgbToFloats,
} from "./widgets/style.js";

// =============================================================================
// Layout engine
// =============================================================================

export {
  type ArenaNode,
  type BuildTreeOptions,
  type BuiltTree,
  type ContainerNode,
  type LeafNode,
  type NodeBox,
  type NodeId,
  LayoutArena,
  MAX_TREE_DEPTH,
  buildTree,
} from "./layout/engine/arena.js";
export { fitSizing } from "./layout/engine/fit.js";
export {
  type GrowDistribution,
  type GrowItem,
  type GrowOptions,
  type GrowStats,
  DEFAULT_MAX_GROW_ITERATIONS,
  distributeGrow,
  growSizing,
} from "./layout/engine/grow.js";
export { assignPositions } from "./layout/engine/position.js";
export {
  type LayoutPassOptions,
  type LayoutStats,
  computeLayout,
  forceRootToViewport,
} from "./layout/engine/layoutEngine.js";
export { findInLayoutTree, layoutTreeOf } from "./layout/engine/layoutTree.js";
export type { LayoutTree } from "./layout/engine/types.js";
export { describeLayout } from "./debug/describeLayout.js";

// =============================================================================
// Geometry and rendering
// =============================================================================

export { emitRectangle, packMesh, toClipSpace } from "./geometry/meshBuilder.js";
export {
  type MeshBatchError,
  type MeshBatchErrorCode,
  type MeshBatchOpts,
  type MeshBatchResult,
  MAX_RECTS_PER_BATCH,
  MeshBatch,
} from "./geometry/meshBatch.js";
export type { PackedMesh, RectMesh, Vec3, Vertex } from "./geometry/types.js";
export type { RenderBackend } from "./backend.js";
export { type CoordinateSpace, type DrawTreeOptions, drawTree } from "./renderer/drawTree.js";

// =============================================================================
// Root driver
// =============================================================================

export { createUi, resolveUiConfig } from "./app/createUi.js";
export type { ResolvedUiConfig, Ui, UiConfig, UiLayoutSnapshot } from "./app/types.js";
