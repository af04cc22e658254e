/**
 * packages/core/src/widgets/ui.ts — Node spec factory functions.
 *
 * Why: Provides a convenient API for building spec trees without manually
 * constructing discriminated union objects.
 */

import type {
  ColumnProps,
  ContainerProps,
  LeafProps,
  NodeSpec,
  RowProps,
  UiChild,
} from "./types.js";

function filterChildren(children: readonly UiChild[]): readonly NodeSpec[] {
  const out: NodeSpec[] = [];
  for (const child of children) {
    if (child) out.push(child);
  }
  return Object.freeze(out);
}

function leaf(props: LeafProps = {}): NodeSpec {
  return { kind: "leaf", props };
}

function container(props: ContainerProps = {}, children: readonly UiChild[] = []): NodeSpec {
  return { kind: "container", props, children: filterChildren(children) };
}

export const ui = {
  leaf,
  container,

  /**
   * Container stacking its children left to right.
   *
   * @example
   * ```ts
   * ui.row({ sizing: sizing(GROW), padding: 16, childGap: 16 }, [
   *   ui.leaf({ sizing: sizing(GROW), color: colors.green }),
   *   ui.leaf({ sizing: sizing(GROW), color: colors.purple }),
   * ])
   * ```
   */
  row(props: RowProps = {}, children: readonly UiChild[] = []): NodeSpec {
    return container({ ...props, layoutMode: "leftToRight" }, children);
  },

  /** Container stacking its children top to bottom. */
  column(props: ColumnProps = {}, children: readonly UiChild[] = []): NodeSpec {
    return container({ ...props, layoutMode: "topToBottom" }, children);
  },
} as const;
