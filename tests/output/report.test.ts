import { describe, it, expect } from "vitest";
import { buildReport, formatSectionsText } from "../../src/output/report.js";
import type { Section } from "../../src/schema/section.js";

function section(overrides: Partial<Section> & Pick<Section, "id" | "type">): Section {
  return {
    bounds: { top: 0, left: 0, width: 1280, height: 100 },
    content: "Hello",
    metadata: { hasImages: false, hasVideos: false, elementCount: 1 },
    html: "<p>Hello</p>",
    ...overrides,
  };
}

describe("buildReport", () => {
  it("counts sections and omits unknown source fields", () => {
    const sections = [section({ id: 1, type: "header" })];
    expect(buildReport(sections)).toEqual({ sections, total_sections: 1 });
  });

  it("records the url and an ISO timestamp", () => {
    const report = buildReport([], {
      url: "https://example.test/",
      timestamp: new Date("2026-01-02T03:04:05.000Z"),
    });
    expect(report).toEqual({
      url: "https://example.test/",
      sections: [],
      total_sections: 0,
      timestamp: "2026-01-02T03:04:05.000Z",
    });
  });
});

describe("formatSectionsText", () => {
  it("lists each section and a per-type summary", () => {
    const text = formatSectionsText([
      section({ id: 1, type: "header", bounds: { top: 0, left: 0, width: 1280.4, height: 79.6 } }),
      section({
        id: 2,
        type: "content",
        content: "a".repeat(120),
        bounds: { top: 120, left: 40, width: 800, height: 300 },
        metadata: { hasImages: true, hasVideos: true, elementCount: 3 },
      }),
      section({ id: 3, type: "content", bounds: { top: 500, left: 40, width: 800, height: 200 } }),
    ]);

    expect(text.split("\n")).toEqual([
      "Found 3 sections:",
      "",
      "  Section 1 (header):",
      "    Content: Hello",
      "    Layout: 1280x80 at (0, 0)",
      "    Elements: 1",
      "    Images: No",
      "    Videos: No",
      "",
      "  Section 2 (content):",
      `    Content: ${"a".repeat(100)}...`,
      "    Layout: 800x300 at (40, 120)",
      "    Elements: 3",
      "    Images: Yes",
      "    Videos: Yes",
      "",
      "  Section 3 (content):",
      "    Content: Hello",
      "    Layout: 800x200 at (40, 500)",
      "    Elements: 1",
      "    Images: No",
      "    Videos: No",
      "",
      "Summary:",
      "  header: 1",
      "  content: 2",
    ]);
  });

  it("keeps text of exactly the preview length intact", () => {
    const text = formatSectionsText([section({ id: 1, type: "section", content: "b".repeat(100) })]);
    expect(text.split("\n")[3]).toBe(`    Content: ${"b".repeat(100)}`);
  });

  it("reports an empty page", () => {
    expect(formatSectionsText([])).toBe("Found 0 sections:\n\nSummary:");
  });
});
