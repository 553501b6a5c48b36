import { parseSnapshot, pageSizeOf } from "../schema/layout.js";
import type { LayoutSnapshotInput } from "../schema/layout.js";
import { resolveDetectOptions } from "../schema/options.js";
import type { DetectOptionsInput } from "../schema/options.js";
import type { Section } from "../schema/section.js";
import { filterElements } from "./element-filter.js";
import type { Exclusion } from "./element-filter.js";
import { groupElements } from "./grouper.js";
import { classifyCandidates } from "./classifier.js";
import { reconstructSections } from "./reconstructor.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "engine" });

export interface DetectionResult {
  sections: Section[];
  /** Elements removed by the filter, with the rule that removed each */
  excluded: Exclusion[];
}

/**
 * Run the full detection pipeline and keep the filter's audit trail.
 * Stages: validate → filter → group → classify → reconstruct.
 * Throws InvalidLayoutData on a malformed snapshot.
 */
export function detectSectionsWithAudit(
  snapshot: LayoutSnapshotInput,
  options?: DetectOptionsInput,
): DetectionResult {
  const layout = parseSnapshot(snapshot);
  const opts = resolveDetectOptions(options);

  // 1. filter
  const { kept, excluded } = filterElements(layout.elements, opts);

  // 2. group
  const candidates = groupElements(kept, opts);

  // 3. classify
  const classified = classifyCandidates(candidates, pageSizeOf(layout));

  // 4. reconstruct
  const sections = reconstructSections(classified);

  log.debug(
    {
      elements: layout.elements.length,
      kept: kept.length,
      excluded: excluded.length,
      sections: sections.length,
    },
    "sections detected",
  );

  return { sections, excluded };
}

/** Detect the ordered sections of a rendered page. */
export function detectSections(
  snapshot: LayoutSnapshotInput,
  options?: DetectOptionsInput,
): Section[] {
  return detectSectionsWithAudit(snapshot, options).sections;
}
