import { describe, it, expect } from "vitest";
import { reconstructSections, normalizeText } from "../../src/detection/reconstructor.js";
import { at, makeCandidate } from "../helpers/layout.js";

describe("normalizeText", () => {
  it("joins with single spaces and collapses whitespace", () => {
    expect(normalizeText(["  Hello\n\tworld ", "", "again  "])).toBe("Hello world again");
  });

  it("returns an empty string for no text", () => {
    expect(normalizeText([])).toBe("");
    expect(normalizeText(["", "  "])).toBe("");
  });
});

describe("reconstructSections", () => {
  it("builds numbered sections with union bounds, text, markup and metadata", () => {
    const first = makeCandidate([
      at(0, 0, 60, { text: "Welcome", rawHtml: "<h1>Welcome</h1>", box: { left: 10, width: 300 } }),
      at(1, 70, 200, { text: "", hasImage: true, rawHtml: '<img src="a.png">', box: { left: 0, width: 400 } }),
    ]);
    const second = makeCandidate([
      at(2, 400, 90, { text: "Watch  the\ndemo", hasVideo: true, rawHtml: "<video></video>" }),
    ]);

    const sections = reconstructSections([
      { candidate: first, type: "header" },
      { candidate: second, type: "section" },
    ]);

    expect(sections).toEqual([
      {
        id: 1,
        type: "header",
        bounds: { top: 0, left: 0, width: 400, height: 270 },
        content: "Welcome",
        metadata: { hasImages: true, hasVideos: false, elementCount: 2 },
        html: '<h1>Welcome</h1>\n<img src="a.png">',
      },
      {
        id: 2,
        type: "section",
        bounds: { top: 400, left: 0, width: 800, height: 90 },
        content: "Watch the demo",
        metadata: { hasImages: false, hasVideos: true, elementCount: 1 },
        html: "<video></video>",
      },
    ]);
  });

  it("copies bounds rather than sharing them with the candidate", () => {
    const candidate = makeCandidate([at(0, 0, 60)]);
    const [section] = reconstructSections([{ candidate, type: "section" }]);
    expect(section?.bounds).toEqual(candidate.bounds);
    expect(section?.bounds).not.toBe(candidate.bounds);
  });

  it("returns nothing for no candidates", () => {
    expect(reconstructSections([])).toEqual([]);
  });
});
