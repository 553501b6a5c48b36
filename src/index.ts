// Constants
export {
  DEFAULT_GAP_THRESHOLD_PX,
  DEFAULT_MIN_HEIGHT_PX,
  DEFAULT_MIN_WIDTH_PX,
  HEADER_MAX_TOP_PX,
  HEADER_MAX_HEIGHT_PX,
  HERO_MIN_HEIGHT_PX,
  FOOTER_ELEMENT_MAX_HEIGHT_PX,
  SIDEBAR_MAX_WIDTH_RATIO,
  SUBSTANTIAL_TEXT_CHARS,
  DEFAULT_VIEWPORT,
  DEFAULT_RENDER_TIMEOUT_MS,
} from "./constants.js";

// Errors
export { InvalidLayoutData, RenderFailure } from "./errors.js";
export type { LayoutIssue, RenderFailureKind } from "./errors.js";

// Schema types
export type {
  Box,
  Edges,
  ElementStyle,
  LayoutElement,
  LayoutElementInput,
  LayoutSnapshot,
  LayoutSnapshotInput,
  PageSize,
} from "./schema/layout.js";
export { parseSnapshot, pageSizeOf, LayoutSnapshotSchema, LayoutElementSchema } from "./schema/layout.js";

export type {
  SectionType,
  SplitReason,
  Boundary,
  SectionCandidate,
  ClassifiedCandidate,
  SectionMetadata,
  Section,
} from "./schema/section.js";

export type {
  DetectOptions,
  DetectOptionsInput,
  RenderConfig,
  RenderConfigInput,
} from "./schema/options.js";
export {
  resolveDetectOptions,
  resolveRenderConfig,
  DetectOptionsSchema,
  RenderConfigSchema,
} from "./schema/options.js";

// Core functions
export { detectSections, detectSectionsWithAudit } from "./detection/engine.js";
export type { DetectionResult } from "./detection/engine.js";

// Pipeline stages (for advanced usage)
export { filterElements, isCoveredBy, hasContent, hasDistinguishingStyle, meetsMinimumSize } from "./detection/element-filter.js";
export type { Exclusion, ExclusionRule, FilterResult } from "./detection/element-filter.js";
export { groupElements, splitReason } from "./detection/grouper.js";
export { classifyCandidate, classifyCandidates, CLASSIFICATION_RULES } from "./detection/classifier.js";
export type { ClassificationContext, ClassificationRule } from "./detection/classifier.js";
export { reconstructSections, normalizeText } from "./detection/reconstructor.js";

// Layout provider
export {
  extractLayout,
  extractLayoutFromUrl,
  extractLayoutWithPage,
  measureLayout,
  toRenderFailure,
  isNavigableUrl,
} from "./extraction/layout-extractor.js";
export { launchBrowser } from "./utils/browser.js";

// Output adapters
export { buildReport, formatSectionsText } from "./output/report.js";
export type { DetectionReport } from "./output/report.js";
export { sectionFileName, renderSectionFile, saveSectionFiles } from "./output/section-files.js";

// Geometry utilities
export { boxBottom, boxRight, verticalGap, unionBox } from "./utils/geometry.js";
export { isBackgroundDiscontinuity, isPaintedColor, isTransparentColor } from "./utils/color.js";

// Logging
export { logger, createChildLogger } from "./utils/logger.js";
