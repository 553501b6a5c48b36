import type { PageSize } from "../schema/layout.js";
import type { ClassifiedCandidate, SectionCandidate, SectionType } from "../schema/section.js";
import {
  HEADER_MAX_TOP_PX,
  HEADER_MAX_HEIGHT_PX,
  HERO_MIN_HEIGHT_PX,
  HERO_MAX_INDEX,
  FOOTER_ELEMENT_MAX_HEIGHT_PX,
  FOOTER_SMALL_ELEMENT_SHARE,
  SIDEBAR_MAX_WIDTH_RATIO,
  SUBSTANTIAL_TEXT_CHARS,
} from "../constants.js";

// ── Context ─────────────────────────────────────────────────────────

/** Everything a rule may look at for one candidate */
export interface ClassificationContext {
  candidate: SectionCandidate;
  index: number;
  count: number;
  page: PageSize;
}

function hasMedia(candidate: SectionCandidate): boolean {
  return candidate.elements.some((el) => el.hasImage || el.hasVideo);
}

function textLength(candidate: SectionCandidate): number {
  return candidate.elements.reduce((n, el) => n + el.text.trim().length, 0);
}

function smallTextOnlyShare(candidate: SectionCandidate): number {
  const small = candidate.elements.filter(
    (el) => !el.hasImage && !el.hasVideo && el.box.height <= FOOTER_ELEMENT_MAX_HEIGHT_PX,
  );
  return small.length / candidate.elements.length;
}

// ── Rules ───────────────────────────────────────────────────────────

export interface ClassificationRule {
  type: SectionType;
  matches: (ctx: ClassificationContext) => boolean;
}

/**
 * Ordered rule table; the first rule that matches names the section.
 *
 *   1. First, short, at the very top     → "header"
 *   2. Among the first two, tall + media → "hero"
 *   3. Last, mostly small text-only      → "footer"
 *   4. Narrow column                     → "sidebar"
 *   5. Several elements or long text     → "content"
 *   6. Fallback                          → "section"
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    type: "header",
    matches: ({ candidate, index }) =>
      index === 0 &&
      candidate.bounds.top < HEADER_MAX_TOP_PX &&
      candidate.bounds.height < HEADER_MAX_HEIGHT_PX,
  },
  {
    type: "hero",
    matches: ({ candidate, index }) =>
      index <= HERO_MAX_INDEX && hasMedia(candidate) && candidate.bounds.height > HERO_MIN_HEIGHT_PX,
  },
  {
    type: "footer",
    matches: ({ candidate, index, count }) =>
      index === count - 1 && smallTextOnlyShare(candidate) > FOOTER_SMALL_ELEMENT_SHARE,
  },
  {
    type: "sidebar",
    matches: ({ candidate, page }) => candidate.bounds.width < SIDEBAR_MAX_WIDTH_RATIO * page.width,
  },
  {
    type: "content",
    matches: ({ candidate }) =>
      candidate.elements.length > 1 || textLength(candidate) >= SUBSTANTIAL_TEXT_CHARS,
  },
  {
    type: "section",
    matches: () => true,
  },
];

export function classifyCandidate(
  ctx: ClassificationContext,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES,
): SectionType {
  return rules.find((rule) => rule.matches(ctx))?.type ?? "section";
}

/** Assign a type to every candidate, each judged independently. */
export function classifyCandidates(
  candidates: readonly SectionCandidate[],
  page: PageSize,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES,
): ClassifiedCandidate[] {
  return candidates.map((candidate, index) => ({
    candidate,
    type: classifyCandidate({ candidate, index, count: candidates.length, page }, rules),
  }));
}
