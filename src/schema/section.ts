import type { Box, LayoutElement } from "./layout.js";

export type SectionType = "header" | "hero" | "content" | "sidebar" | "footer" | "section";

/** Why the grouper opened a candidate */
export type SplitReason = "gap" | "background" | "divider";
export type Boundary = "start" | SplitReason;

/** A contiguous, unclassified run of elements in document order */
export interface SectionCandidate {
  elements: readonly LayoutElement[];
  bounds: Box;
  boundary: Boundary;
}

export interface ClassifiedCandidate {
  candidate: SectionCandidate;
  type: SectionType;
}

export interface SectionMetadata {
  hasImages: boolean;
  hasVideos: boolean;
  elementCount: number;
}

/** A detected, classified section of the page */
export interface Section {
  id: number;
  type: SectionType;
  bounds: Box;
  content: string;
  metadata: SectionMetadata;
  html: string;
}
