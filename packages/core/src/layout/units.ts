/**
 * Lengths in physical units.
 *
 * Node props accept plain numbers (pixels) or a tagged length. Tagged lengths
 * are resolved to integer pixels once, when the tree is built, using the
 * configured dots-per-inch.
 */

export type LengthUnit = "px" | "mm" | "in";

export type TaggedLength = Readonly<{ unit: LengthUnit; value: number }>;

/** Plain numbers are pixels. */
export type Length = number | TaggedLength;

export const DEFAULT_DPI = 96;
const MM_PER_INCH = 25.4;

export function px(value: number): TaggedLength {
  return Object.freeze({ unit: "px", value });
}

export function mm(value: number): TaggedLength {
  return Object.freeze({ unit: "mm", value });
}

export function inch(value: number): TaggedLength {
  return Object.freeze({ unit: "in", value });
}

export function isTaggedLength(v: unknown): v is TaggedLength {
  if (typeof v !== "object" || v === null) return false;
  const unit = "unit" in v ? v.unit : undefined;
  const value = "value" in v ? v.value : undefined;
  return (unit === "px" || unit === "mm" || unit === "in") && typeof value === "number";
}

/**
 * Convert a length to pixels. The result is rounded to the nearest integer
 * and may be non-finite when the input is; callers validate.
 */
export function lengthToPixels(length: Length, dpi: number): number {
  if (typeof length === "number") return length;
  switch (length.unit) {
    case "px":
      return length.value;
    case "in":
      return Math.round(length.value * dpi);
    case "mm":
      return Math.round((length.value / MM_PER_INCH) * dpi);
  }
}
