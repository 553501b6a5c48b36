import { TRANSPARENT_COLORS, INHERITED_COLORS } from "../constants.js";

function normalize(color: string): string {
  return color.trim().toLowerCase();
}

/** True when the color defers to its parent or is unknown */
export function isInheritedColor(color: string | undefined): boolean {
  return color === undefined || INHERITED_COLORS.has(normalize(color));
}

/** True when the color paints nothing (including any zero-alpha rgba/hsla) */
export function isTransparentColor(color: string): boolean {
  const c = normalize(color);
  if (TRANSPARENT_COLORS.has(c)) return true;
  const alpha = /^(?:rgba|hsla)\(.*[,/]\s*(0(?:\.0+)?|0?\.0+)\s*\)$/.exec(c);
  return alpha !== null;
}

/** True when the color is known and actually paints a background */
export function isPaintedColor(color: string | undefined): color is string {
  return color !== undefined && !isInheritedColor(color) && !isTransparentColor(color);
}

/**
 * Two backgrounds form a visual break only when both are painted and differ.
 * Inherited or transparent backgrounds never break.
 */
export function isBackgroundDiscontinuity(a: string | undefined, b: string | undefined): boolean {
  if (!isPaintedColor(a) || !isPaintedColor(b)) return false;
  return normalize(a) !== normalize(b);
}
