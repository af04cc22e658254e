/**
 * packages/core/src/layout/validateProps.ts — Node prop validation.
 *
 * Why: Specs are caller data and may carry anything at runtime. Every prop the
 * engine reads is checked and normalized here, once per tree build, so the
 * layout passes can assume int32 pixels and `min <= max`.
 */

import type { LayoutMode, Sizing, SizingMode } from "./types.js";
import { DEFAULT_LAYOUT_MODE, DEFAULT_SIZING, FIT, GROW } from "./types.js";
import { type Rgb24, isRgb24 } from "../widgets/style.js";
import { isTaggedLength, lengthToPixels } from "./units.js";
import { isI32 } from "./engine/bounds.js";

export type LayoutFatalCode = "TESSEL_INVALID_PROPS" | "TESSEL_INVALID_STATE";

/** Fatal error for invalid node props or an inconsistent tree. */
export type LayoutFatal = Readonly<{ code: LayoutFatalCode; detail: string }>;

/**
 * Layout operation result: success with value, or failure with fatal error.
 * Used throughout the layout system to propagate validation failures upward.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: LayoutFatal }>;

/* --- Validated Props Types (defaults applied, pixels resolved) --- */

export type ValidatedBoxProps = Readonly<{
  key: string | null;
  sizing: Sizing;
  minWidth: number;
  minHeight: number;
  maxWidth: number | null;
  maxHeight: number | null;
  color: Rgb24;
}>;

export type ValidatedContainerProps = ValidatedBoxProps &
  Readonly<{
    layoutMode: LayoutMode;
    padding: number;
    childGap: number;
  }>;

const DEFAULT_COLOR: Rgb24 = 0;

function invalid(detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code: "TESSEL_INVALID_PROPS", detail } };
}

function describeReceivedType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function invalidProp(
  kind: string,
  name: string,
  expected: string,
  received: unknown,
): LayoutResult<never> {
  const shown = typeof received === "object" ? JSON.stringify(received) : String(received);
  return invalid(
    `Invalid prop "${name}" on <${kind}>: expected ${expected}, ` +
      `got ${describeReceivedType(received)} (${shown})`,
  );
}

function isNonNegativeI32(n: number): boolean {
  return isI32(n) && n >= 0;
}

function requireLength(
  kind: string,
  name: string,
  v: unknown,
  def: number,
  dpi: number,
): LayoutResult<number> {
  if (v === undefined) return { ok: true, value: def };
  if (typeof v !== "number" && !isTaggedLength(v)) {
    return invalidProp(kind, name, "a length (number, px(), mm() or inch())", v);
  }
  const pixels = lengthToPixels(v, dpi);
  if (!isNonNegativeI32(pixels)) {
    return invalidProp(kind, name, "an int32 >= 0 in pixels", v);
  }
  return { ok: true, value: pixels };
}

function optionalLength(
  kind: string,
  name: string,
  v: unknown,
  dpi: number,
): LayoutResult<number | null> {
  if (v === undefined) return { ok: true, value: null };
  return requireLength(kind, name, v, 0, dpi);
}

function requireSizingMode(
  kind: string,
  name: string,
  v: unknown,
  dpi: number,
): LayoutResult<SizingMode> {
  if (typeof v !== "object" || v === null) {
    return invalidProp(kind, name, 'a sizing mode ("fixed" | "fit" | "grow")', v);
  }
  const modeKind = "kind" in v ? v.kind : undefined;
  if (modeKind === "fit") return { ok: true, value: FIT };
  if (modeKind === "grow") return { ok: true, value: GROW };
  if (modeKind === "fixed") {
    const value = "value" in v ? v.value : undefined;
    if (value === undefined) {
      return invalidProp(kind, `${name}.value`, "a length (number, px(), mm() or inch())", value);
    }
    const pixels = requireLength(kind, `${name}.value`, value, 0, dpi);
    if (!pixels.ok) return pixels;
    return { ok: true, value: Object.freeze({ kind: "fixed", value: pixels.value }) };
  }
  return invalidProp(kind, name, 'a sizing mode ("fixed" | "fit" | "grow")', v);
}

function requireSizing(kind: string, v: unknown, dpi: number): LayoutResult<Sizing> {
  if (v === undefined) return { ok: true, value: DEFAULT_SIZING };
  if (typeof v !== "object" || v === null) {
    return invalidProp(kind, "sizing", "{ width, height }", v);
  }
  const width = requireSizingMode(kind, "sizing.width", "width" in v ? v.width : undefined, dpi);
  if (!width.ok) return width;
  const height = requireSizingMode(kind, "sizing.height", "height" in v ? v.height : undefined, dpi);
  if (!height.ok) return height;
  return { ok: true, value: Object.freeze({ width: width.value, height: height.value }) };
}

function requireMinMax(
  kind: string,
  axisName: "Width" | "Height",
  min: number,
  max: number | null,
): LayoutResult<null> {
  if (max !== null && min > max) {
    return invalid(
      `<${kind}> min${axisName} (${String(min)}) must not exceed max${axisName} (${String(max)})`,
    );
  }
  return { ok: true, value: null };
}

type BoxPropBag = Readonly<{
  key?: unknown;
  sizing?: unknown;
  minWidth?: unknown;
  minHeight?: unknown;
  maxWidth?: unknown;
  maxHeight?: unknown;
  color?: unknown;
}>;

type ContainerPropBag = BoxPropBag &
  Readonly<{
    layoutMode?: unknown;
    padding?: unknown;
    childGap?: unknown;
  }>;

export function validateBoxProps(
  kind: string,
  props: BoxPropBag,
  dpi: number,
): LayoutResult<ValidatedBoxProps> {
  const key = props.key;
  if (key !== undefined && (typeof key !== "string" || key.length === 0)) {
    return invalidProp(kind, "key", "a non-empty string", key);
  }

  const sizingRes = requireSizing(kind, props.sizing, dpi);
  if (!sizingRes.ok) return sizingRes;

  const minWidth = requireLength(kind, "minWidth", props.minWidth, 0, dpi);
  if (!minWidth.ok) return minWidth;
  const minHeight = requireLength(kind, "minHeight", props.minHeight, 0, dpi);
  if (!minHeight.ok) return minHeight;
  const maxWidth = optionalLength(kind, "maxWidth", props.maxWidth, dpi);
  if (!maxWidth.ok) return maxWidth;
  const maxHeight = optionalLength(kind, "maxHeight", props.maxHeight, dpi);
  if (!maxHeight.ok) return maxHeight;

  const widthRange = requireMinMax(kind, "Width", minWidth.value, maxWidth.value);
  if (!widthRange.ok) return widthRange;
  const heightRange = requireMinMax(kind, "Height", minHeight.value, maxHeight.value);
  if (!heightRange.ok) return heightRange;

  const color = props.color === undefined ? DEFAULT_COLOR : props.color;
  if (!isRgb24(color)) return invalidProp(kind, "color", "an Rgb24 (0x000000..0xffffff)", color);

  return {
    ok: true,
    value: {
      key: key === undefined ? null : key,
      sizing: sizingRes.value,
      minWidth: minWidth.value,
      minHeight: minHeight.value,
      maxWidth: maxWidth.value,
      maxHeight: maxHeight.value,
      color,
    },
  };
}

export function validateContainerProps(
  props: ContainerPropBag,
  dpi: number,
): LayoutResult<ValidatedContainerProps> {
  const box = validateBoxProps("container", props, dpi);
  if (!box.ok) return box;

  const layoutMode = props.layoutMode === undefined ? DEFAULT_LAYOUT_MODE : props.layoutMode;
  if (layoutMode !== "leftToRight" && layoutMode !== "topToBottom") {
    return invalidProp("container", "layoutMode", '"leftToRight" | "topToBottom"', layoutMode);
  }

  const padding = requireLength("container", "padding", props.padding, 0, dpi);
  if (!padding.ok) return padding;
  const childGap = requireLength("container", "childGap", props.childGap, 0, dpi);
  if (!childGap.ok) return childGap;

  return {
    ok: true,
    value: { ...box.value, layoutMode, padding: padding.value, childGap: childGap.value },
  };
}
