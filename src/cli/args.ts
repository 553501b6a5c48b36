import { DetectOptionsSchema } from "../schema/options.js";
import type { DetectOptions } from "../schema/options.js";

export type OutputFormat = "text" | "json";

export type PageSource = { kind: "url"; url: string } | { kind: "file"; path: string };

export interface CliOptions {
  source: PageSource;
  output: OutputFormat;
  saveHtmlDir?: string;
  detect: DetectOptions;
}

export type CliParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

export const USAGE = [
  "Usage: detect-sections (--url <url> | --file <page.html>) [options]",
  "",
  "Detects visual sections in a rendered web page.",
  "",
  "Options:",
  "  --output text|json     Output format (default: text)",
  "  --save-html <dir>      Save each section's HTML to <dir>",
  "  --gap-threshold <px>   Vertical gap that separates sections (default: 20)",
  "  --min-width <px>       Minimum element width (default: 100)",
  "  --min-height <px>      Minimum element height (default: 30)",
  "",
  "Exit 0 = success, exit 1 = detection failed, exit 2 = usage error.",
].join("\n");

const NUMERIC_FLAGS = {
  "--gap-threshold": "gapThresholdPx",
  "--min-width": "minWidthPx",
  "--min-height": "minHeightPx",
} as const satisfies Record<string, keyof DetectOptions>;

function isNumericFlag(flag: string): flag is keyof typeof NUMERIC_FLAGS {
  return Object.hasOwn(NUMERIC_FLAGS, flag);
}

/** Parse CLI arguments (without the node and script entries). */
export function parseCliArgs(args: readonly string[]): CliParseResult {
  let url: string | undefined;
  let file: string | undefined;
  let output: OutputFormat = "text";
  let saveHtmlDir: string | undefined;
  const thresholds: Partial<Record<keyof DetectOptions, number>> = {};

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];
    if (flag === undefined) continue;
    if (value === undefined || value.startsWith("--")) {
      return { ok: false, error: `Missing value for ${flag}` };
    }
    i++;

    if (flag === "--url") {
      url = value;
    } else if (flag === "--file") {
      file = value;
    } else if (flag === "--output") {
      if (value !== "text" && value !== "json") {
        return { ok: false, error: `Unknown output format: ${value}` };
      }
      output = value;
    } else if (flag === "--save-html") {
      saveHtmlDir = value;
    } else if (isNumericFlag(flag)) {
      thresholds[NUMERIC_FLAGS[flag]] = Number(value);
    } else {
      return { ok: false, error: `Unknown argument: ${flag}` };
    }
  }

  let source: PageSource;
  if (url !== undefined && file === undefined) {
    source = { kind: "url", url };
  } else if (file !== undefined && url === undefined) {
    source = { kind: "file", path: file };
  } else {
    return { ok: false, error: "Exactly one of --url or --file is required" };
  }

  const detect = DetectOptionsSchema.safeParse(thresholds);
  if (!detect.success) {
    const issue = detect.error.issues[0];
    return { ok: false, error: `Invalid threshold ${issue?.path.join(".") ?? ""}: ${issue?.message ?? ""}` };
  }

  const options: CliOptions = { source, output, detect: detect.data };
  if (saveHtmlDir !== undefined) options.saveHtmlDir = saveHtmlDir;
  return { ok: true, options };
}
