/**
 * packages/core/src/layout/engine/layoutEngine.ts — Per-frame layout sequencing.
 *
 * Why: The three passes depend on each other's output and must run in order:
 *
 *   1. fit (post-order): every node shrinks to its content minimum
 *   2. root forcing: the root takes the viewport on each `grow` axis
 *   3. grow (pre-order): leftover space flows down to `grow` children
 *   4. position (pre-order): children are stacked from each padded origin
 *
 * Invariants:
 *   - All sizes and coordinates are int32 pixels
 *   - `min <= size <= max` on both axes at every node after each pass
 *   - The arena's structure is never modified
 */

import type { Point, Size } from "../types.js";
import type { LayoutResult } from "../validateProps.js";
import type { LayoutArena, NodeId } from "./arena.js";
import { isI32 } from "./bounds.js";
import { fitSizing } from "./fit.js";
import { type GrowOptions, createGrowStats, growSizing } from "./grow.js";
import { modeOn, setClampedSizeOn } from "./nodeBox.js";
import { assignPositions } from "./position.js";
import { fail, ok } from "./result.js";

export type LayoutPassOptions = GrowOptions &
  Readonly<{
    /** Root top-left corner. Defaults to (0, 0). */
    origin?: Point;
  }>;

export type LayoutStats = Readonly<{
  nodeCount: number;
  growIterations: number;
  overflowingContainers: number;
  unconsumed: number;
}>;

/** Seed the root from outside the tree on each axis where it is `grow`. */
export function forceRootToViewport(arena: LayoutArena, root: NodeId, viewport: Size): void {
  const box = arena.get(root).box;
  if (modeOn(box, "horizontal").kind === "grow") setClampedSizeOn(box, "horizontal", viewport.w);
  if (modeOn(box, "vertical").kind === "grow") setClampedSizeOn(box, "vertical", viewport.h);
}

function isViewportDimension(n: number): boolean {
  return isI32(n) && n >= 0;
}

/** Run fit, root forcing, grow and position over the tree rooted at `root`. */
export function computeLayout(
  arena: LayoutArena,
  root: NodeId,
  viewport: Size,
  opts: LayoutPassOptions = {},
): LayoutResult<LayoutStats> {
  if (!arena.has(root)) {
    return fail("TESSEL_INVALID_STATE", `layout: root id ${String(root)} is not in the arena`);
  }
  if (!isViewportDimension(viewport.w) || !isViewportDimension(viewport.h)) {
    return fail(
      "TESSEL_INVALID_PROPS",
      `layout: viewport must be non-negative int32 pixels, got ${String(viewport.w)}x${String(viewport.h)}`,
    );
  }
  const origin = opts.origin ?? { x: 0, y: 0 };
  if (!isI32(origin.x) || !isI32(origin.y)) {
    return fail("TESSEL_INVALID_PROPS", "layout: origin must be int32 pixels");
  }

  fitSizing(arena, root);
  forceRootToViewport(arena, root, viewport);
  const stats = growSizing(arena, root, opts, createGrowStats());

  const rootBox = arena.get(root).box;
  rootBox.x = origin.x;
  rootBox.y = origin.y;
  assignPositions(arena, root);

  return ok({
    nodeCount: arena.nodeCount,
    growIterations: stats.iterations,
    overflowingContainers: stats.overflowingContainers,
    unconsumed: stats.unconsumed,
  });
}
