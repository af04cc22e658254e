/**
 * Fit pass (post-order): every node's size becomes its content minimum.
 *
 * Containers sum their children along the main axis (plus gaps) and take the
 * largest child on the cross axis, then add padding on both sides. Leaves have
 * no measurable content and start at their declared minimum. `fixed` wins over
 * content on its axis. Every result is clamped to the node's own `[min, max]`.
 */

import type { Axis } from "../types.js";
import { flipAxis, mainAxisOf } from "../types.js";
import type { LayoutArena, NodeBox, NodeId } from "./arena.js";
import { minOn, modeOn, setClampedSizeOn, sizeOn } from "./nodeBox.js";

function resolveAxis(box: NodeBox, axis: Axis, content: number): void {
  const mode = modeOn(box, axis);
  setClampedSizeOn(box, axis, mode.kind === "fixed" ? mode.value : content);
}

export function fitSizing(arena: LayoutArena, id: NodeId): void {
  const node = arena.get(id);
  const box = node.box;

  if (node.kind === "leaf") {
    resolveAxis(box, "horizontal", minOn(box, "horizontal"));
    resolveAxis(box, "vertical", minOn(box, "vertical"));
    return;
  }

  const main = mainAxisOf(node.layoutMode);
  const cross = flipAxis(main);

  let mainAccum = 0;
  let crossMax = 0;
  for (const childId of node.children) {
    fitSizing(arena, childId);
    const child = arena.get(childId).box;
    mainAccum += sizeOn(child, main);
    crossMax = Math.max(crossMax, sizeOn(child, cross));
  }
  if (node.children.length > 0) {
    mainAccum += (node.children.length - 1) * node.childGap;
  }

  resolveAxis(box, main, mainAccum + 2 * node.padding);
  resolveAxis(box, cross, crossMax + 2 * node.padding);
}
