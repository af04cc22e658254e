import type { LayoutTree } from "../layout/engine/types.js";

/**
 * Indented text dump of a layout snapshot, one node per line:
 *
 *   container#root @0,0 800x600
 *     leaf#a @16,16 246x568
 */
export function describeLayout(tree: LayoutTree): string {
  const lines: string[] = [];
  const visit = (node: LayoutTree, depth: number): void => {
    const key = node.key === null ? "" : `#${node.key}`;
    const { x, y, w, h } = node.rect;
    lines.push(
      `${"  ".repeat(depth)}${node.kind}${key} @${String(x)},${String(y)} ${String(w)}x${String(h)}`,
    );
    for (const child of node.children) visit(child, depth + 1);
  };
  visit(tree, 0);
  return lines.join("\n");
}
