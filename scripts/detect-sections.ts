#!/usr/bin/env npx tsx
/**
 * detect-sections.ts: Detect visual sections in a web page.
 *
 * Usage:
 *   npx tsx scripts/detect-sections.ts --url https://example.com
 *   npx tsx scripts/detect-sections.ts --file page.html --output json
 *   npx tsx scripts/detect-sections.ts --file page.html --save-html sections/
 *
 * Output (stdout):
 *   Text listing (default) or the JSON detection report.
 *   Logs go to stderr; set LOG_LEVEL=debug for stage counts.
 *
 * Exit codes:
 *   0  success (zero sections included)
 *   1  render or detection failure
 *   2  usage error or file not found
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  launchBrowser,
  extractLayout,
  extractLayoutFromUrl,
  detectSections,
  buildReport,
  formatSectionsText,
  saveSectionFiles,
  logger,
} from "../src/index.js";
import type { LayoutSnapshot } from "../src/index.js";
import { parseCliArgs, USAGE } from "../src/cli/args.js";
import type { PageSource } from "../src/cli/args.js";

// ── Parse args ──
const parsed = parseCliArgs(process.argv.slice(2));
if (!parsed.ok) {
  console.error(`Error: ${parsed.error}`);
  console.error("");
  console.error(USAGE);
  process.exit(2);
}
const options = parsed.options;

if (options.source.kind === "file" && !fs.existsSync(options.source.path)) {
  console.error(`Error: HTML file not found: ${options.source.path}`);
  process.exit(2);
}

// ── Run ──
async function loadSnapshot(source: PageSource): Promise<LayoutSnapshot> {
  const browser = await launchBrowser();
  try {
    const page = await browser.newPage();
    if (source.kind === "url") {
      return await extractLayoutFromUrl(page, source.url);
    }
    const html = fs.readFileSync(path.resolve(source.path), "utf-8");
    return await extractLayout(page, html);
  } finally {
    await browser.close();
  }
}

async function main() {
  const snapshot = await loadSnapshot(options.source);
  const sections = detectSections(snapshot, options.detect);

  if (options.output === "json") {
    const url = options.source.kind === "url" ? options.source.url : undefined;
    console.log(JSON.stringify(buildReport(sections, { url }), null, 2));
  } else {
    console.log(formatSectionsText(sections));
  }

  if (options.saveHtmlDir) {
    const written = await saveSectionFiles(options.saveHtmlDir, sections);
    logger.info({ dir: options.saveHtmlDir, files: written.length }, "section HTML saved");
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, "section detection failed");
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
