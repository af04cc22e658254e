import type { LayoutArena, NodeId } from "./arena.js";
import type { LayoutTree } from "./types.js";

/** Snapshot the current geometry of the subtree rooted at `id`. */
export function layoutTreeOf(arena: LayoutArena, id: NodeId): LayoutTree {
  const node = arena.get(id);
  const { box } = node;
  const children =
    node.kind === "container"
      ? Object.freeze(node.children.map((childId) => layoutTreeOf(arena, childId)))
      : Object.freeze([]);
  return Object.freeze({
    id: node.id,
    kind: node.kind,
    key: node.key,
    rect: Object.freeze({ x: box.x, y: box.y, w: box.width, h: box.height }),
    color: box.color,
    children,
  });
}

/** Depth-first search by key within a snapshot. */
export function findInLayoutTree(tree: LayoutTree, key: string): LayoutTree | null {
  if (tree.key === key) return tree;
  for (const child of tree.children) {
    const hit = findInLayoutTree(child, key);
    if (hit !== null) return hit;
  }
  return null;
}
