/**
 * Grow pass (pre-order): hands leftover space to `grow` children.
 *
 * Main axis uses water-filling: the smallest growable children are raised
 * together until they either reach the next-smallest tier or the space runs
 * out, then the loop repeats with the enlarged tie set. A child that reaches
 * its max leaves the growable set for good. Space left once every growable
 * child is capped stays unconsumed.
 *
 * Cross axis needs no distribution: each `grow` child takes the container's
 * inner cross size.
 */

import { DEV_MODE, warnDev } from "../../dev.js";
import { flipAxis, mainAxisOf } from "../types.js";
import type { LayoutArena, NodeId } from "./arena.js";
import { maxOn, minOn, modeOn, setClampedSizeOn, setSizeOn, sizeOn } from "./nodeBox.js";

export type GrowItem = Readonly<{
  size: number;
  min: number;
  max: number | null;
  grow: boolean;
}>;

export type GrowDistribution = Readonly<{
  sizes: readonly number[];
  /** `available - Σ sizes` after distribution. Negative when minimums overflow. */
  remaining: number;
  iterations: number;
  /** True when the loop stopped on the iteration cap rather than converging. */
  exhausted: boolean;
}>;

export const DEFAULT_MAX_GROW_ITERATIONS = 10_000;

/** Split `total` into `count` integer shares; the first `total % count` get one extra. */
export function splitEvenly(total: number, count: number): number[] {
  const base = Math.floor(total / count);
  const extra = total - base * count;
  const out = new Array<number>(count).fill(base);
  for (let i = 0; i < extra; i++) out[i] = base + 1;
  return out;
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/**
 * Distribute `available - Σ size` among the items flagged `grow`.
 * Items keep their order; ties are resolved toward lower indices.
 */
export function distributeGrow(
  available: number,
  items: readonly GrowItem[],
  maxIterations: number = DEFAULT_MAX_GROW_ITERATIONS,
): GrowDistribution {
  const sizes = items.map((it) => it.size);
  let growable: number[] = [];
  for (let i = 0; i < items.length; i++) {
    if (items[i]?.grow === true) growable.push(i);
  }

  let remaining = available - sum(sizes);
  let iterations = 0;
  let exhausted = false;

  while (remaining > 0 && growable.length > 0) {
    if (iterations >= maxIterations) {
      exhausted = true;
      break;
    }
    iterations++;

    let floor = Number.POSITIVE_INFINITY;
    for (const i of growable) floor = Math.min(floor, sizes[i] ?? 0);

    const tied: number[] = [];
    let next: number | null = null;
    for (const i of growable) {
      const size = sizes[i] ?? 0;
      if (size === floor) tied.push(i);
      else if (next === null || size < next) next = size;
    }
    // floor comes from a non-empty growable set, so at least one child is tied.
    if (tied.length === 0) break;

    const budget = next === null ? remaining : Math.min(remaining, (next - floor) * tied.length);
    const shares = splitEvenly(budget, tied.length);

    const capped = new Set<number>();
    for (let k = 0; k < tied.length; k++) {
      const i = tied[k];
      const item = i === undefined ? undefined : items[i];
      if (i === undefined || item === undefined) continue;
      let grown = Math.max((sizes[i] ?? 0) + (shares[k] ?? 0), item.min);
      if (item.max !== null && grown >= item.max) {
        grown = item.max;
        capped.add(i);
      }
      sizes[i] = grown;
    }
    if (capped.size > 0) growable = growable.filter((i) => !capped.has(i));

    remaining = available - sum(sizes);
  }

  return { sizes, remaining, iterations, exhausted };
}

export type GrowOptions = Readonly<{
  maxIterations?: number;
}>;

/** Counters accumulated over one grow pass. */
export type GrowStats = {
  iterations: number;
  /** Containers whose children's minimums exceed the inner main size. */
  overflowingContainers: number;
  /** Space left unconsumed because every growable child hit its max. */
  unconsumed: number;
};

export function createGrowStats(): GrowStats {
  return { iterations: 0, overflowingContainers: 0, unconsumed: 0 };
}

export function growSizing(
  arena: LayoutArena,
  id: NodeId,
  opts: GrowOptions = {},
  stats: GrowStats = createGrowStats(),
): GrowStats {
  const node = arena.get(id);
  if (node.kind === "leaf" || node.children.length === 0) return stats;

  const main = mainAxisOf(node.layoutMode);
  const cross = flipAxis(main);
  const box = node.box;
  const count = node.children.length;

  const items: GrowItem[] = [];
  for (const childId of node.children) {
    const child = arena.get(childId).box;
    items.push({
      size: sizeOn(child, main),
      min: minOn(child, main),
      max: maxOn(child, main),
      grow: modeOn(child, main).kind === "grow",
    });
  }

  const available = sizeOn(box, main) - 2 * node.padding - (count - 1) * node.childGap;
  const dist = distributeGrow(available, items, opts.maxIterations);
  stats.iterations += dist.iterations;

  if (dist.remaining < 0) {
    stats.overflowingContainers++;
    if (DEV_MODE) {
      warnDev(
        `[tessel][layout] children overflow ${arena.pathOf(id)} by ${String(-dist.remaining)}px on the ${main} axis.`,
      );
    }
  } else if (dist.remaining > 0 && items.some((it) => it.grow)) {
    stats.unconsumed += dist.remaining;
  }
  if (dist.exhausted && DEV_MODE) {
    warnDev(
      `[tessel][layout] grow distribution for ${arena.pathOf(id)} stopped after ${String(dist.iterations)} iterations with ${String(dist.remaining)}px left.`,
    );
  }

  const innerCross = sizeOn(box, cross) - 2 * node.padding;
  for (let i = 0; i < count; i++) {
    const childId = node.children[i];
    if (childId === undefined) continue;
    const child = arena.get(childId).box;
    setSizeOn(child, main, dist.sizes[i] ?? sizeOn(child, main));
    if (modeOn(child, cross).kind === "grow") {
      setClampedSizeOn(child, cross, innerCross);
    }
    growSizing(arena, childId, opts, stats);
  }

  return stats;
}
