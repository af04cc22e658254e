import { flipAxis, mainAxisOf } from "../types.js";
import type { LayoutArena, NodeId } from "./arena.js";
import { positionOn, setPositionOn, sizeOn } from "./nodeBox.js";

/**
 * Position pass (pre-order). Children are placed along the main axis from the
 * container's padded origin, separated by `childGap`. Every child shares the
 * container's padded cross coordinate; there is no cross-axis alignment.
 */
export function assignPositions(arena: LayoutArena, id: NodeId): void {
  const node = arena.get(id);
  if (node.kind === "leaf") return;

  const main = mainAxisOf(node.layoutMode);
  const cross = flipAxis(main);
  const crossStart = positionOn(node.box, cross) + node.padding;
  let cursor = positionOn(node.box, main) + node.padding;

  for (const childId of node.children) {
    const child = arena.get(childId).box;
    setPositionOn(child, main, cursor);
    setPositionOn(child, cross, crossStart);
    cursor += sizeOn(child, main) + node.childGap;
    assignPositions(arena, childId);
  }
}
