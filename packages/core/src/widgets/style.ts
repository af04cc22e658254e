/**
 * packages/core/src/widgets/style.ts — Color values carried by nodes.
 */

/** Packed RGB color (0x00RRGGBB). */
export type Rgb24 = number;

/** Linear channel triple in [0, 1], the form vertex buffers take. */
export type RgbFloats = readonly [r: number, g: number, b: number];

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. Channels are clamped to [0, 255]. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}

export function rgbR(value: Rgb24): number {
  return (value >>> 16) & 0xff;
}

export function rgbG(value: Rgb24): number {
  return (value >>> 8) & 0xff;
}

export function rgbB(value: Rgb24): number {
  return value & 0xff;
}

export function rgbToFloats(value: Rgb24): RgbFloats {
  return [rgbR(value) / 255, rgbG(value) / 255, rgbB(value) / 255];
}

export function isRgb24(v: unknown): v is Rgb24 {
  return typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 0xffffff;
}

export const colors = Object.freeze({
  black: rgb(0, 0, 0),
  white: rgb(255, 255, 255),
  red: rgb(255, 0, 0),
  green: rgb(0, 128, 0),
  blue: rgb(0, 0, 255),
  aqua: rgb(0, 255, 255),
  purple: rgb(128, 0, 128),
  gray: rgb(128, 128, 128),
});
