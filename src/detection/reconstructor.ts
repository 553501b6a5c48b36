import type { ClassifiedCandidate, Section } from "../schema/section.js";

/** Join texts with single spaces, collapsing every whitespace run */
export function normalizeText(parts: readonly string[]): string {
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

/**
 * Materialize classified candidates as output sections. Member markup is
 * kept verbatim, one element per line, with no wrapping container.
 */
export function reconstructSections(classified: readonly ClassifiedCandidate[]): Section[] {
  return classified.map(({ candidate, type }, i) => {
    const { elements } = candidate;
    return {
      id: i + 1,
      type,
      bounds: { ...candidate.bounds },
      content: normalizeText(elements.map((el) => el.text)),
      metadata: {
        hasImages: elements.some((el) => el.hasImage),
        hasVideos: elements.some((el) => el.hasVideo),
        elementCount: elements.length,
      },
      html: elements.map((el) => el.rawHtml).join("\n"),
    };
  });
}
