import type { LayoutElement } from "../schema/layout.js";
import type { DetectOptions } from "../schema/options.js";
import { isPaintedColor } from "../utils/color.js";

/** The rule that removed an element from detection */
export type ExclusionRule =
  | "too_small"
  | "no_content"
  | "inside_styled_wrapper"
  | "inside_wrapper"
  | "unstyled_wrapper";

export interface Exclusion {
  domOrder: number;
  tag: string;
  rule: ExclusionRule;
}

export interface FilterResult {
  /** Surviving elements, in document order */
  kept: LayoutElement[];
  excluded: Exclusion[];
}

type MinSize = Pick<DetectOptions, "minWidthPx" | "minHeightPx">;

export function meetsMinimumSize(el: LayoutElement, options: MinSize): boolean {
  return el.box.width >= options.minWidthPx && el.box.height >= options.minHeightPx;
}

export function hasContent(el: LayoutElement): boolean {
  return el.hasText || el.hasImage || el.hasVideo;
}

/** A painted background or any border sets a wrapper apart from its children */
export function hasDistinguishingStyle(el: LayoutElement): boolean {
  return isPaintedColor(el.style.backgroundColor) || el.style.borderWidth > 0;
}

function compact(text: string): string {
  return text.replace(/\s+/g, "");
}

/**
 * True when `descendants` carry everything `wrapper` shows: the same text
 * (whitespace aside) and any image or video it holds.
 */
export function isCoveredBy(
  wrapper: LayoutElement,
  descendants: readonly LayoutElement[],
): boolean {
  const text = descendants.map((el) => compact(el.text)).join("");
  if (compact(wrapper.text) !== text) return false;
  if (wrapper.hasImage && !descendants.some((el) => el.hasImage)) return false;
  if (wrapper.hasVideo && !descendants.some((el) => el.hasVideo)) return false;
  return true;
}

function* ancestorsOf(
  el: LayoutElement,
  byOrder: ReadonlyMap<number, LayoutElement>,
): Generator<LayoutElement> {
  let parent = el.parentOrder === null ? undefined : byOrder.get(el.parentOrder);
  while (parent) {
    yield parent;
    parent = parent.parentOrder === null ? undefined : byOrder.get(parent.parentOrder);
  }
}

/**
 * Reduce a snapshot to the elements that carry content, in document order.
 *
 * An element must be at least `minWidthPx` × `minHeightPx` and have text,
 * an image or a video. When one qualifying element contains another, only
 * one of them survives: a styled wrapper absorbs everything beneath it, an
 * unstyled wrapper gives way to its descendants when they cover its content
 * and absorbs them otherwise.
 */
export function filterElements(
  elements: readonly LayoutElement[],
  options: MinSize,
): FilterResult {
  const byOrder = new Map<number, LayoutElement>();
  for (const el of elements) byOrder.set(el.domOrder, el);

  const verdicts = new Map<number, ExclusionRule>();
  const qualifying: LayoutElement[] = [];
  for (const el of elements) {
    if (!meetsMinimumSize(el, options)) verdicts.set(el.domOrder, "too_small");
    else if (!hasContent(el)) verdicts.set(el.domOrder, "no_content");
    else qualifying.push(el);
  }
  const qualifies = new Set(qualifying.map((el) => el.domOrder));

  // Qualifying elements grouped under their nearest qualifying ancestor
  const nested = new Map<number, LayoutElement[]>();
  for (const el of qualifying) {
    for (const ancestor of ancestorsOf(el, byOrder)) {
      if (!qualifies.has(ancestor.domOrder)) continue;
      const below = nested.get(ancestor.domOrder) ?? [];
      below.push(el);
      nested.set(ancestor.domOrder, below);
      break;
    }
  }

  const absorbs = (wrapper: LayoutElement): boolean => {
    const below = nested.get(wrapper.domOrder);
    if (below === undefined) return false;
    return hasDistinguishingStyle(wrapper) || !isCoveredBy(wrapper, below);
  };

  for (const el of qualifying) {
    let survivor: LayoutElement | undefined;
    for (const ancestor of ancestorsOf(el, byOrder)) {
      if (qualifies.has(ancestor.domOrder) && absorbs(ancestor)) survivor = ancestor;
    }
    if (survivor) {
      verdicts.set(
        el.domOrder,
        hasDistinguishingStyle(survivor) ? "inside_styled_wrapper" : "inside_wrapper",
      );
    } else if (nested.has(el.domOrder) && !absorbs(el)) {
      verdicts.set(el.domOrder, "unstyled_wrapper");
    }
  }

  const kept: LayoutElement[] = [];
  const excluded: Exclusion[] = [];
  for (const el of elements) {
    const rule = verdicts.get(el.domOrder);
    if (rule) excluded.push({ domOrder: el.domOrder, tag: el.tag, rule });
    else kept.push(el);
  }
  return { kept, excluded };
}
