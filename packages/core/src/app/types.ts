import type { RenderBackend } from "../backend.js";
import type { LayoutStats } from "../layout/engine/layoutEngine.js";
import type { LayoutTree } from "../layout/engine/types.js";
import type { Rect, Size } from "../layout/types.js";
import type { LayoutResult } from "../layout/validateProps.js";
import type { CoordinateSpace } from "../renderer/drawTree.js";
import type { Rgb24 } from "../widgets/style.js";
import type { NodeSpec } from "../widgets/types.js";

export type UiLayoutSnapshot = Readonly<{
  viewport: Size;
  stats: LayoutStats;
  layoutTimeMs: number;
}>;

export type UiConfig = Readonly<{
  background?: Rgb24;
  viewport?: Size;
  /** Dots per inch used to resolve mm() and inch() lengths. */
  dpi?: number;
  /** Cap on water-filling iterations per container. */
  maxGrowIterations?: number;
  /** Space of meshes handed to the backend. Default "pixels". */
  coordinateSpace?: CoordinateSpace;
  internal_onLayout?: (snapshot: UiLayoutSnapshot) => void;
}>;

export type ResolvedUiConfig = Readonly<{
  background: Rgb24;
  viewport: Size;
  dpi: number;
  maxGrowIterations: number;
  coordinateSpace: CoordinateSpace;
  internal_onLayout?: ((snapshot: UiLayoutSnapshot) => void) | undefined;
}>;

/**
 * Root driver: owns the tree, seeds the root from the viewport and sequences
 * the layout passes and the draw traversal.
 */
export interface Ui {
  /**
   * Replace the tree. `null` clears it. On failure the previous tree is kept
   * and the fatal is returned.
   */
  setRoot(spec: NodeSpec | null): LayoutResult<null>;
  hasRoot(): boolean;
  /** Throws TesselError on a negative or non-integer size. */
  setViewport(size: Size): void;
  getViewport(): Size;
  setBackground(color: Rgb24): void;
  /** Run fit, root forcing, grow and position. `null` value when there is no root. */
  computeLayout(): LayoutResult<LayoutTree | null>;
  /**
   * Clear to the background and submit every node in paint order. Returns rects
   * submitted. In clip space an empty viewport submits nothing.
   */
  draw<Pass>(backend: RenderBackend<Pass>, pass: Pass): number;
  /** computeLayout() followed by draw() when layout succeeds. */
  frame<Pass>(backend: RenderBackend<Pass>, pass: Pass): LayoutResult<LayoutTree | null>;
  /** Rect of the node with `key` as of the last layout. */
  findRect(key: string): Rect | null;
}
