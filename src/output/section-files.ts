import * as path from "node:path";
import type { Section } from "../schema/section.js";
import { writeFile } from "../utils/fs-helpers.js";

export function sectionFileName(section: Section): string {
  return `section_${section.id}_${section.type}.html`;
}

function indent(html: string): string {
  return html
    .split("\n")
    .map((line) => (line.trim().length > 0 ? `  ${line}` : line))
    .join("\n");
}

/** Section markup, indented one level inside a container that records its id and type */
export function renderSectionFile(section: Section): string {
  return [
    `<div class="section section-${section.type}" data-section-id="${section.id}">`,
    indent(section.html),
    "</div>",
    "",
  ].join("\n");
}

/** Write one HTML file per section into `dir`; returns the written paths */
export async function saveSectionFiles(dir: string, sections: readonly Section[]): Promise<string[]> {
  const written: string[] = [];
  for (const section of sections) {
    const filePath = path.join(dir, sectionFileName(section));
    await writeFile(filePath, renderSectionFile(section));
    written.push(filePath);
  }
  return written;
}
