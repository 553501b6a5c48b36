import type { LayoutElement } from "../schema/layout.js";
import type { DetectOptions } from "../schema/options.js";
import type { Boundary, SectionCandidate, SplitReason } from "../schema/section.js";
import { verticalGap, unionBox } from "../utils/geometry.js";
import { isBackgroundDiscontinuity } from "../utils/color.js";

// ── Boundary detection ──────────────────────────────────────────────

function topBorder(el: LayoutElement): number {
  return el.style.borderTopWidth ?? el.style.borderWidth;
}

function bottomBorder(el: LayoutElement): number {
  return el.style.borderBottomWidth ?? el.style.borderWidth;
}

/**
 * Decide whether `next` starts a new candidate after `prev`.
 *
 * Checks, in order:
 *   1. Vertical overlap → never split
 *   2. Border on the shared edge → "divider" (beats a small gap)
 *   3. Gap above threshold → "gap"
 *   4. Two painted, different backgrounds → "background"
 *
 * Returns at most one reason, so coinciding signals yield one boundary.
 */
export function splitReason(
  prev: LayoutElement,
  next: LayoutElement,
  options: Pick<DetectOptions, "gapThresholdPx">,
): SplitReason | null {
  const gap = verticalGap(prev.box, next.box);
  if (gap < 0) return null;
  if (topBorder(next) > 0 || bottomBorder(prev) > 0) return "divider";
  if (gap > options.gapThresholdPx) return "gap";
  if (isBackgroundDiscontinuity(prev.style.backgroundColor, next.style.backgroundColor)) {
    return "background";
  }
  return null;
}

// ── Sweep ───────────────────────────────────────────────────────────

interface OpenCandidate {
  elements: readonly LayoutElement[];
  last: LayoutElement;
  bounds: SectionCandidate["bounds"];
  boundary: Boundary;
}

interface SweepState {
  current: OpenCandidate | null;
  closed: readonly SectionCandidate[];
}

function open(el: LayoutElement, boundary: Boundary): OpenCandidate {
  return { elements: [el], last: el, bounds: { ...el.box }, boundary };
}

function extend(candidate: OpenCandidate, el: LayoutElement): OpenCandidate {
  return {
    elements: [...candidate.elements, el],
    last: el,
    bounds: unionBox(candidate.bounds, el.box),
    boundary: candidate.boundary,
  };
}

/**
 * Close a candidate onto the list. A candidate reaching above its
 * predecessor's top (content moved upward by positioning) is merged back
 * into it, so candidate tops never decrease.
 */
function seal(closed: readonly SectionCandidate[], candidate: OpenCandidate): SectionCandidate[] {
  let merged: SectionCandidate = {
    elements: candidate.elements,
    bounds: candidate.bounds,
    boundary: candidate.boundary,
  };
  let remaining = closed.length;
  let previous = closed[remaining - 1];
  while (previous && previous.bounds.top > merged.bounds.top) {
    merged = {
      elements: [...previous.elements, ...merged.elements],
      bounds: unionBox(previous.bounds, merged.bounds),
      boundary: previous.boundary,
    };
    remaining -= 1;
    previous = closed[remaining - 1];
  }
  return [...closed.slice(0, remaining), merged];
}

/**
 * Partition filtered elements into contiguous candidates with one
 * left-to-right fold over document order. Every element lands in exactly
 * one candidate; an empty input yields no candidates.
 */
export function groupElements(
  elements: readonly LayoutElement[],
  options: Pick<DetectOptions, "gapThresholdPx">,
): SectionCandidate[] {
  const initial: SweepState = { current: null, closed: [] };

  const final = elements.reduce<SweepState>((state, el) => {
    if (state.current === null) {
      return { current: open(el, "start"), closed: state.closed };
    }
    const reason = splitReason(state.current.last, el, options);
    if (reason === null) {
      return { current: extend(state.current, el), closed: state.closed };
    }
    return { current: open(el, reason), closed: seal(state.closed, state.current) };
  }, initial);

  return final.current === null ? [...final.closed] : seal(final.closed, final.current);
}
