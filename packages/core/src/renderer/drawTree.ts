/**
 * Draw traversal (pre-order): a node is painted before its children and
 * children in list order, so later siblings paint over earlier ones.
 */

import type { RenderBackend } from "../backend.js";
import { emitRectangle, toClipSpace } from "../geometry/meshBuilder.js";
import type { LayoutArena, NodeId } from "../layout/engine/arena.js";
import type { Size } from "../layout/types.js";

/** Coordinate space of submitted meshes. */
export type CoordinateSpace = "pixels" | "clip";

export type DrawTreeOptions = Readonly<{
  space?: CoordinateSpace;
  /** Required for `space: "clip"`. */
  viewport?: Size;
}>;

/** Emit every node's rectangle through `backend`; returns the number submitted. */
export function drawTree<Pass>(
  arena: LayoutArena,
  root: NodeId,
  backend: RenderBackend<Pass>,
  pass: Pass,
  opts: DrawTreeOptions = {},
): number {
  const space = opts.space ?? "pixels";
  const viewport = opts.viewport ?? { w: 0, h: 0 };
  let submitted = 0;

  const stack: NodeId[] = [root];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) continue;
    const node = arena.get(id);
    const { box } = node;

    const mesh = emitRectangle({ x: box.x, y: box.y }, { w: box.width, h: box.height }, box.color);
    backend.submit(space === "clip" ? toClipSpace(mesh, viewport) : mesh, pass);
    submitted++;

    if (node.kind === "container") {
      for (let i = node.children.length - 1; i >= 0; i--) {
        const childId = node.children[i];
        if (childId !== undefined) stack.push(childId);
      }
    }
  }
  return submitted;
}
