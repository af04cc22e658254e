import type { Rgb24 } from "../../widgets/style.js";
import type { Rect } from "../types.js";
import type { NodeId } from "./arena.js";

/**
 * Immutable snapshot of layout results mirroring the arena structure.
 * Each node contains its positioned rectangle and children.
 */
export type LayoutTree = Readonly<{
  id: NodeId;
  kind: "leaf" | "container";
  key: string | null;
  rect: Rect;
  color: Rgb24;
  children: readonly LayoutTree[];
}>;
