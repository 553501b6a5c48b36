import type { Section, SectionType } from "../schema/section.js";
import { TEXT_PREVIEW_CHARS } from "../constants.js";

/** JSON document returned to API and CLI callers */
export interface DetectionReport {
  url?: string;
  sections: Section[];
  total_sections: number;
  timestamp?: string;
}

export function buildReport(
  sections: Section[],
  source: { url?: string; timestamp?: Date } = {},
): DetectionReport {
  const report: DetectionReport = { sections, total_sections: sections.length };
  if (source.url !== undefined) report.url = source.url;
  if (source.timestamp !== undefined) report.timestamp = source.timestamp.toISOString();
  return report;
}

function yesNo(flag: boolean): string {
  return flag ? "Yes" : "No";
}

/** Human-readable listing of sections followed by a per-type summary */
export function formatSectionsText(sections: readonly Section[]): string {
  const lines: string[] = [`Found ${sections.length} sections:`, ""];

  for (const s of sections) {
    const { top, left, width, height } = s.bounds;
    const preview =
      s.content.length > TEXT_PREVIEW_CHARS ? `${s.content.slice(0, TEXT_PREVIEW_CHARS)}...` : s.content;
    lines.push(
      `  Section ${s.id} (${s.type}):`,
      `    Content: ${preview}`,
      `    Layout: ${Math.round(width)}x${Math.round(height)} at (${Math.round(left)}, ${Math.round(top)})`,
      `    Elements: ${s.metadata.elementCount}`,
      `    Images: ${yesNo(s.metadata.hasImages)}`,
      `    Videos: ${yesNo(s.metadata.hasVideos)}`,
      "",
    );
  }

  const counts = new Map<SectionType, number>();
  for (const s of sections) counts.set(s.type, (counts.get(s.type) ?? 0) + 1);

  lines.push("Summary:");
  for (const [type, count] of counts) lines.push(`  ${type}: ${count}`);
  return lines.join("\n");
}
