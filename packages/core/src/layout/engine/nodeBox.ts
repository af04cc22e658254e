import type { Axis, SizingMode } from "../types.js";
import { sizingModeOn } from "../types.js";
import type { NodeBox } from "./arena.js";
import { clampToRange } from "./bounds.js";

/* Per-axis views of a NodeBox so each pass is written once per axis. */

export function sizeOn(box: NodeBox, axis: Axis): number {
  return axis === "horizontal" ? box.width : box.height;
}

export function setSizeOn(box: NodeBox, axis: Axis, value: number): void {
  if (axis === "horizontal") box.width = value;
  else box.height = value;
}

export function minOn(box: NodeBox, axis: Axis): number {
  return axis === "horizontal" ? box.minWidth : box.minHeight;
}

export function maxOn(box: NodeBox, axis: Axis): number | null {
  return axis === "horizontal" ? box.maxWidth : box.maxHeight;
}

export function modeOn(box: NodeBox, axis: Axis): SizingMode {
  return sizingModeOn(box.sizing, axis);
}

export function positionOn(box: NodeBox, axis: Axis): number {
  return axis === "horizontal" ? box.x : box.y;
}

export function setPositionOn(box: NodeBox, axis: Axis, value: number): void {
  if (axis === "horizontal") box.x = value;
  else box.y = value;
}

/** Write `value` clamped to the box's own `[min, max]` on `axis`. */
export function setClampedSizeOn(box: NodeBox, axis: Axis, value: number): void {
  setSizeOn(box, axis, clampToRange(value, minOn(box, axis), maxOn(box, axis)));
}
