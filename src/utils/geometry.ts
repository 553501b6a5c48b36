import type { Box } from "../schema/layout.js";

/** Bottom edge of a box */
export function boxBottom(b: Box): number {
  return b.top + b.height;
}

/** Right edge of a box */
export function boxRight(b: Box): number {
  return b.left + b.width;
}

/**
 * Vertical whitespace between `above` and `below`.
 * Negative when the boxes overlap vertically.
 */
export function verticalGap(above: Box, below: Box): number {
  return below.top - boxBottom(above);
}

/** Smallest box covering both boxes */
export function unionBox(a: Box, b: Box): Box {
  const top = Math.min(a.top, b.top);
  const left = Math.min(a.left, b.left);
  return {
    top,
    left,
    width: Math.max(boxRight(a), boxRight(b)) - left,
    height: Math.max(boxBottom(a), boxBottom(b)) - top,
  };
}
