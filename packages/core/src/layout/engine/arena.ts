/**
 * packages/core/src/layout/engine/arena.ts — Node storage for the layout passes.
 *
 * Why: The passes mutate sizes and positions in place every frame. Nodes live
 * in one flat arena addressed by integer ids; a container lists child ids and
 * every node records its parent id. Traversal always goes through `children`;
 * `parent` exists for lookup and diagnostics.
 *
 * Invariants:
 *   - ids are dense, assigned in pre-order, and stable for the arena's lifetime
 *   - the arena never gains or loses nodes after `buildTree` returns
 *   - keys are unique within an arena
 */

import { TesselError } from "../../abi.js";
import type { NodeSpec } from "../../widgets/types.js";
import type { Rgb24 } from "../../widgets/style.js";
import type { LayoutMode, Sizing } from "../types.js";
import { DEFAULT_DPI } from "../units.js";
import {
  type LayoutResult,
  type ValidatedBoxProps,
  validateBoxProps,
  validateContainerProps,
} from "../validateProps.js";
import { fail, ok } from "./result.js";

export type NodeId = number;

/** Sizing and geometry record shared by every node kind. */
export type NodeBox = {
  width: number;
  height: number;
  readonly minWidth: number;
  readonly minHeight: number;
  readonly maxWidth: number | null;
  readonly maxHeight: number | null;
  /** Top-left corner; meaningful only after the position pass. */
  x: number;
  y: number;
  readonly sizing: Sizing;
  readonly color: Rgb24;
};

type NodeCommon = Readonly<{
  id: NodeId;
  parent: NodeId | null;
  key: string | null;
  box: NodeBox;
}>;

export type LeafNode = NodeCommon & Readonly<{ kind: "leaf" }>;

export type ContainerNode = NodeCommon &
  Readonly<{
    kind: "container";
    layoutMode: LayoutMode;
    padding: number;
    childGap: number;
    children: readonly NodeId[];
  }>;

export type ArenaNode = LeafNode | ContainerNode;

export type BuildTreeOptions = Readonly<{
  /** Resolves mm/inch lengths. Defaults to 96. */
  dpi?: number;
}>;

/** A built tree: the arena plus the id of its root. */
export type BuiltTree = Readonly<{ arena: LayoutArena; root: NodeId }>;

export const MAX_TREE_DEPTH = 1024;

export class LayoutArena {
  private readonly nodes: ArenaNode[] = [];
  private readonly keyIndex = new Map<string, NodeId>();

  get nodeCount(): number {
    return this.nodes.length;
  }

  has(id: NodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.nodes.length;
  }

  /** Throws when `id` does not belong to this arena. */
  get(id: NodeId): ArenaNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new TesselError(
        "TESSEL_INVALID_STATE",
        `LayoutArena: unknown node id ${String(id)} (arena has ${String(this.nodes.length)} nodes)`,
      );
    }
    return node;
  }

  findByKey(key: string): NodeId | null {
    return this.keyIndex.get(key) ?? null;
  }

  /** Path from the root, e.g. `container#root > container[3] > leaf#logo[0]`. */
  pathOf(id: NodeId): string {
    const segments: string[] = [];
    let cursor: NodeId | null = id;
    while (cursor !== null) {
      const node = this.get(cursor);
      segments.push(this.pathEntry(node));
      cursor = node.parent;
    }
    return segments.reverse().join(" > ");
  }

  private pathEntry(node: ArenaNode): string {
    const key = node.key === null ? "" : `#${node.key}`;
    if (node.parent === null) return `${node.kind}${key}`;
    const parent = this.get(node.parent);
    const index = parent.kind === "container" ? parent.children.indexOf(node.id) : -1;
    return `${node.kind}${key}[${String(index)}]`;
  }

  /** @internal Used by buildTree only. */
  push(node: ArenaNode): void {
    this.nodes.push(node);
    if (node.key !== null) this.keyIndex.set(node.key, node.id);
  }
}

function createBox(props: ValidatedBoxProps): NodeBox {
  return {
    width: props.minWidth,
    height: props.minHeight,
    minWidth: props.minWidth,
    minHeight: props.minHeight,
    maxWidth: props.maxWidth,
    maxHeight: props.maxHeight,
    x: 0,
    y: 0,
    sizing: props.sizing,
    color: props.color,
  };
}

/**
 * Validate a spec tree and flatten it into a fresh arena.
 * Fails on the first invalid prop, duplicate key or excessive nesting.
 */
export function buildTree(spec: NodeSpec, opts: BuildTreeOptions = {}): LayoutResult<BuiltTree> {
  const dpi = opts.dpi ?? DEFAULT_DPI;
  const arena = new LayoutArena();

  const visit = (
    node: NodeSpec,
    parent: NodeId | null,
    path: string,
    depth: number,
  ): LayoutResult<NodeId> => {
    if (depth > MAX_TREE_DEPTH) {
      return fail(
        "TESSEL_INVALID_STATE",
        `tree nesting exceeds ${String(MAX_TREE_DEPTH)} levels at ${path}`,
      );
    }
    const id = arena.nodeCount;

    if (node.kind === "leaf") {
      const res = validateBoxProps("leaf", node.props, dpi);
      if (!res.ok) return fail(res.fatal.code, `${path}: ${res.fatal.detail}`);
      const keyRes = checkKey(arena, res.value.key, path);
      if (!keyRes.ok) return keyRes;
      arena.push({ kind: "leaf", id, parent, key: res.value.key, box: createBox(res.value) });
      return ok(id);
    }

    const res = validateContainerProps(node.props, dpi);
    if (!res.ok) return fail(res.fatal.code, `${path}: ${res.fatal.detail}`);
    const keyRes = checkKey(arena, res.value.key, path);
    if (!keyRes.ok) return keyRes;

    const children: NodeId[] = [];
    arena.push({
      kind: "container",
      id,
      parent,
      key: res.value.key,
      box: createBox(res.value),
      layoutMode: res.value.layoutMode,
      padding: res.value.padding,
      childGap: res.value.childGap,
      children,
    });

    for (const child of node.children) {
      // Holes are skipped; the path index follows the arena's child order.
      if (child === undefined) continue;
      const index = String(children.length);
      const childRes = visit(child, id, `${path} > ${child.kind}[${index}]`, depth + 1);
      if (!childRes.ok) return childRes;
      children.push(childRes.value);
    }
    Object.freeze(children);
    return ok(id);
  };

  const rootRes = visit(spec, null, spec.kind, 0);
  if (!rootRes.ok) return rootRes;
  return ok({ arena, root: rootRes.value });
}

function checkKey(arena: LayoutArena, key: string | null, path: string): LayoutResult<null> {
  if (key !== null && arena.findByKey(key) !== null) {
    return fail("TESSEL_INVALID_PROPS", `${path}: duplicate key "${key}"`);
  }
  return ok(null);
}
