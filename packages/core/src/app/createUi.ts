/**
 * packages/core/src/app/createUi.ts — Root/viewport driver.
 *
 * Why: The root is the only node sized from outside the tree. The driver owns
 * the built arena, re-seeds the root from the viewport on every layout and
 * runs the passes and the draw traversal in order, once per frame.
 *
 * Invariants:
 *   - "No root" is an explicit state: layout yields `null`, draw only clears
 *   - A failed setRoot() keeps the previous tree
 *   - Layout never changes the tree's structure
 */

import { TesselError } from "../abi.js";
import type { RenderBackend } from "../backend.js";
import { DEV_MODE, warnDev } from "../dev.js";
import { type BuiltTree, buildTree } from "../layout/engine/arena.js";
import { isI32 } from "../layout/engine/bounds.js";
import { DEFAULT_MAX_GROW_ITERATIONS } from "../layout/engine/grow.js";
import { computeLayout } from "../layout/engine/layoutEngine.js";
import { findInLayoutTree, layoutTreeOf } from "../layout/engine/layoutTree.js";
import type { LayoutTree } from "../layout/engine/types.js";
import type { Rect, Size } from "../layout/types.js";
import { DEFAULT_DPI } from "../layout/units.js";
import type { LayoutResult } from "../layout/validateProps.js";
import { drawTree } from "../renderer/drawTree.js";
import { type Rgb24, isRgb24, rgb } from "../widgets/style.js";
import type { NodeSpec } from "../widgets/types.js";
import type { ResolvedUiConfig, Ui, UiConfig } from "./types.js";

/** Default configuration values. */
const DEFAULT_CONFIG: ResolvedUiConfig = Object.freeze({
  background: rgb(0, 0, 0),
  viewport: Object.freeze({ w: 0, h: 0 }),
  dpi: DEFAULT_DPI,
  maxGrowIterations: DEFAULT_MAX_GROW_ITERATIONS,
  coordinateSpace: "pixels",
});

function invalidProps(detail: string): never {
  throw new TesselError("TESSEL_INVALID_PROPS", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

function requirePositiveFinite(name: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0) invalidProps(`${name} must be a positive finite number`);
  return v;
}

function requireColor(name: string, v: number): Rgb24 {
  if (!isRgb24(v)) invalidProps(`${name} must be an Rgb24 (0x000000..0xffffff)`);
  return v;
}

function requireViewport(name: string, size: Size): Size {
  if (!isI32(size.w) || !isI32(size.h) || size.w < 0 || size.h < 0) {
    invalidProps(
      `${name} must be non-negative int32 pixels, got ${String(size.w)}x${String(size.h)}`,
    );
  }
  return Object.freeze({ w: size.w, h: size.h });
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveUiConfig(config: UiConfig | undefined): ResolvedUiConfig {
  if (!config) return DEFAULT_CONFIG;
  const background =
    config.background === undefined
      ? DEFAULT_CONFIG.background
      : requireColor("background", config.background);
  const viewport =
    config.viewport === undefined
      ? DEFAULT_CONFIG.viewport
      : requireViewport("viewport", config.viewport);
  const dpi =
    config.dpi === undefined ? DEFAULT_CONFIG.dpi : requirePositiveFinite("dpi", config.dpi);
  const maxGrowIterations =
    config.maxGrowIterations === undefined
      ? DEFAULT_CONFIG.maxGrowIterations
      : requirePositiveInt("maxGrowIterations", config.maxGrowIterations);
  const coordinateSpace = config.coordinateSpace ?? DEFAULT_CONFIG.coordinateSpace;
  if (coordinateSpace !== "pixels" && coordinateSpace !== "clip") {
    invalidProps('coordinateSpace must be "pixels" or "clip"');
  }
  const internal_onLayout =
    typeof config.internal_onLayout === "function" ? config.internal_onLayout : undefined;

  return Object.freeze({
    background,
    viewport,
    dpi,
    maxGrowIterations,
    coordinateSpace,
    internal_onLayout,
  });
}

function nowMs(): number {
  const perf = (globalThis as { performance?: { now?: () => number } }).performance;
  const perfNow = perf?.now;
  if (typeof perfNow === "function") return perfNow.call(perf);
  return Date.now();
}

export function createUi(config?: UiConfig): Ui {
  const cfg = resolveUiConfig(config);
  let tree: BuiltTree | null = null;
  let viewport: Size = cfg.viewport;
  let background: Rgb24 = cfg.background;
  let lastLayout: LayoutTree | null = null;
  let warnedNoRoot = false;
  let warnedEmptyClip = false;

  function computeLayoutNow(): LayoutResult<LayoutTree | null> {
    if (tree === null) {
      lastLayout = null;
      return { ok: true, value: null };
    }
    const start = nowMs();
    const res = computeLayout(tree.arena, tree.root, viewport, {
      maxIterations: cfg.maxGrowIterations,
    });
    if (!res.ok) return res;
    lastLayout = layoutTreeOf(tree.arena, tree.root);
    cfg.internal_onLayout?.({ viewport, stats: res.value, layoutTimeMs: nowMs() - start });
    return { ok: true, value: lastLayout };
  }

  function drawNow<Pass>(backend: RenderBackend<Pass>, pass: Pass): number {
    backend.clear(background, pass);
    let submitted = 0;
    if (tree === null) {
      if (DEV_MODE && !warnedNoRoot) {
        warnedNoRoot = true;
        warnDev("[tessel][ui] draw() called with no root; only the background was cleared.");
      }
    } else if (cfg.coordinateSpace === "clip" && (viewport.w === 0 || viewport.h === 0)) {
      // Clip space has no mapping for an empty viewport.
      if (DEV_MODE && !warnedEmptyClip) {
        warnedEmptyClip = true;
        warnDev(
          `[tessel][ui] clip-space draw skipped: viewport is ${String(viewport.w)}x${String(viewport.h)}; call setViewport() first.`,
        );
      }
    } else {
      submitted = drawTree(tree.arena, tree.root, backend, pass, {
        space: cfg.coordinateSpace,
        viewport,
      });
    }
    backend.present?.(pass);
    return submitted;
  }

  return {
    setRoot(spec: NodeSpec | null): LayoutResult<null> {
      if (spec === null) {
        tree = null;
        lastLayout = null;
        return { ok: true, value: null };
      }
      const res = buildTree(spec, { dpi: cfg.dpi });
      if (!res.ok) return res;
      tree = res.value;
      lastLayout = null;
      warnedNoRoot = false;
      return { ok: true, value: null };
    },

    hasRoot(): boolean {
      return tree !== null;
    },

    setViewport(size: Size): void {
      viewport = requireViewport("setViewport(size)", size);
    },

    getViewport(): Size {
      return viewport;
    },

    setBackground(color: Rgb24): void {
      background = requireColor("setBackground(color)", color);
    },

    computeLayout: computeLayoutNow,

    draw: drawNow,

    frame<Pass>(backend: RenderBackend<Pass>, pass: Pass): LayoutResult<LayoutTree | null> {
      const res = computeLayoutNow();
      if (res.ok) drawNow(backend, pass);
      return res;
    },

    findRect(key: string): Rect | null {
      if (lastLayout === null) return null;
      return findInLayoutTree(lastLayout, key)?.rect ?? null;
    },
  };
}
