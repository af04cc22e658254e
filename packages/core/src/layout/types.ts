/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Every sizing computation is written once per axis and applied to the
 * main and cross axis by substitution. These are the values that make that
 * possible. All coordinates are integer pixels.
 */

import type { Length } from "./units.js";

/** Rectangle with position (x,y) and dimensions (w,h) in pixels. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in pixels. */
export type Size = Readonly<{ w: number; h: number }>;

/** Top-left position in pixels. */
export type Point = Readonly<{ x: number; y: number }>;

/** Layout axis. */
export type Axis = "horizontal" | "vertical";

/** Returns the orthogonal axis. */
export function flipAxis(axis: Axis): Axis {
  return axis === "horizontal" ? "vertical" : "horizontal";
}

/**
 * Per-axis sizing policy.
 *
 *   - fixed: the dimension is frozen at `value`
 *   - fit: the dimension is the content minimum
 *   - grow: the dimension claims leftover space from the parent
 *
 * Node props carry `SizingMode<Length>`; `buildTree` resolves fixed lengths
 * to pixels, so the engine only sees `SizingMode` (pixels).
 */
export type SizingMode<V extends Length = number> =
  | Readonly<{ kind: "fixed"; value: V }>
  | FitMode
  | GrowMode;

export type FitMode = Readonly<{ kind: "fit" }>;
export type GrowMode = Readonly<{ kind: "grow" }>;

export type SizingModeKind = SizingMode["kind"];

export const FIT: FitMode = Object.freeze({ kind: "fit" });
export const GROW: GrowMode = Object.freeze({ kind: "grow" });

/** Fixed size in pixels, or in physical units through `mm()`/`inch()`. */
export function fixed(value: Length): SizingMode<Length> {
  return Object.freeze({ kind: "fixed", value });
}

/** Sizing policy for both axes. */
export type Sizing<V extends Length = number> = Readonly<{
  width: SizingMode<V>;
  height: SizingMode<V>;
}>;

export const DEFAULT_SIZING: Sizing = Object.freeze({ width: FIT, height: FIT });

/** `sizing(mode)` applies one mode to both axes. */
export function sizing(both: SizingMode<Length>): Sizing<Length>;
export function sizing(width: SizingMode<Length>, height: SizingMode<Length>): Sizing<Length>;
export function sizing(width: SizingMode<Length>, height?: SizingMode<Length>): Sizing<Length> {
  return Object.freeze({ width, height: height ?? width });
}

export function sizingModeOn(s: Sizing, axis: Axis): SizingMode {
  return axis === "horizontal" ? s.width : s.height;
}

/** Stacking direction of a container's children. */
export type LayoutMode = "leftToRight" | "topToBottom";

export const DEFAULT_LAYOUT_MODE: LayoutMode = "leftToRight";

export function mainAxisOf(mode: LayoutMode): Axis {
  return mode === "leftToRight" ? "horizontal" : "vertical";
}

export function crossAxisOf(mode: LayoutMode): Axis {
  return flipAxis(mainAxisOf(mode));
}
