/**
 * packages/core/src/widgets/types.ts — Node spec type definitions.
 *
 * Why: Callers describe a tree declaratively as immutable specs. The specs are
 * validated and flattened into a layout arena by `buildTree`; the engine never
 * mutates them.
 *
 * Node kinds:
 *   - leaf: a sized primitive with no children
 *   - container: stacks its children along its layout mode's main axis
 */

import type { LayoutMode, Sizing } from "../layout/types.js";
import type { Length } from "../layout/units.js";
import type { Rgb24 } from "./style.js";

/** Props shared by every node kind. */
export type NodeBoxProps = Readonly<{
  /** Lookup key, unique within a tree. */
  key?: string;
  sizing?: Sizing<Length>;
  minWidth?: Length;
  minHeight?: Length;
  maxWidth?: Length;
  maxHeight?: Length;
  color?: Rgb24;
}>;

export type LeafProps = NodeBoxProps;

export type ContainerProps = NodeBoxProps &
  Readonly<{
    layoutMode?: LayoutMode;
    /** Uniform inset on all four sides. */
    padding?: Length;
    /** Space between consecutive children on the main axis. */
    childGap?: Length;
  }>;

export type RowProps = Omit<ContainerProps, "layoutMode">;
export type ColumnProps = Omit<ContainerProps, "layoutMode">;

export type NodeSpec =
  | Readonly<{ kind: "leaf"; props: LeafProps }>
  | Readonly<{ kind: "container"; props: ContainerProps; children: readonly NodeSpec[] }>;

/** Children may include falsy entries so callers can write `cond && ui.leaf(...)`. */
export type UiChild = NodeSpec | false | null | undefined;
