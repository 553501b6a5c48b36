/** Vertical whitespace above which two elements start separate sections (px) */
export const DEFAULT_GAP_THRESHOLD_PX = 20;

/** Minimum element height to count as content (px) */
export const DEFAULT_MIN_HEIGHT_PX = 30;

/** Minimum element width to count as content (px) */
export const DEFAULT_MIN_WIDTH_PX = 100;

/** Header: first section, starting and ending near the top of the page (px) */
export const HEADER_MAX_TOP_PX = 150;
export const HEADER_MAX_HEIGHT_PX = 150;

/** Hero: media-bearing section taller than this, among the first two (px) */
export const HERO_MIN_HEIGHT_PX = 300;
export const HERO_MAX_INDEX = 1;

/** Footer members at or below this height count as "small" (px) */
export const FOOTER_ELEMENT_MAX_HEIGHT_PX = 120;

/** Share of small text-only members required for a footer */
export const FOOTER_SMALL_ELEMENT_SHARE = 0.5;

/** Sidebar: narrower than this fraction of the page width */
export const SIDEBAR_MAX_WIDTH_RATIO = 0.3;

/** Text length at which a single-element section counts as content */
export const SUBSTANTIAL_TEXT_CHARS = 100;

/** Computed background values that paint nothing */
export const TRANSPARENT_COLORS: ReadonlySet<string> = new Set([
  "transparent",
  "rgba(0, 0, 0, 0)",
  "rgba(0,0,0,0)",
]);

/** Background values that defer to the parent and carry no signal */
export const INHERITED_COLORS: ReadonlySet<string> = new Set([
  "",
  "inherit",
  "initial",
  "unset",
  "currentcolor",
]);

/** Default browser viewport used by the layout provider (px) */
export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 } as const;

/** Default navigation timeout for the layout provider (ms) */
export const DEFAULT_RENDER_TIMEOUT_MS = 30_000;

/** Characters of section text shown in the text report */
export const TEXT_PREVIEW_CHARS = 100;
