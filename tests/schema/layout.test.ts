import { describe, it, expect } from "vitest";
import { parseSnapshot, pageSizeOf } from "../../src/schema/layout.js";
import { InvalidLayoutData } from "../../src/errors.js";
import { at } from "../helpers/layout.js";

const NO_EDGES = { top: 0, right: 0, bottom: 0, left: 0 };

function rawElement(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    tag: "div",
    box: { top: 0, left: 0, width: 200, height: 50 },
    style: { backgroundColor: "rgb(1, 1, 1)", borderWidth: 0, margin: NO_EDGES, padding: NO_EDGES },
    hasText: true,
    hasImage: false,
    hasVideo: false,
    domOrder: 0,
    rawHtml: "<div>x</div>",
    ...overrides,
  };
}

function issuesOf(data: unknown): Array<{ path: string; message: string }> {
  try {
    parseSnapshot(data);
  } catch (err) {
    if (err instanceof InvalidLayoutData) return err.issues;
    throw err;
  }
  return [];
}

describe("parseSnapshot", () => {
  it("fills in text and parentOrder defaults", () => {
    const snapshot = parseSnapshot({ elements: [rawElement()] });
    expect(snapshot.elements[0]?.text).toBe("");
    expect(snapshot.elements[0]?.parentOrder).toBeNull();
    expect(snapshot.page).toBeUndefined();
  });

  it("accepts a missing background color", () => {
    const style = { borderWidth: 0, margin: NO_EDGES, padding: NO_EDGES };
    const snapshot = parseSnapshot({ elements: [rawElement({ style })] });
    expect(snapshot.elements[0]?.style.backgroundColor).toBeUndefined();
  });

  it("rejects a missing box with its path", () => {
    const issues = issuesOf({ elements: [rawElement({ box: undefined })] });
    expect(issues).toHaveLength(1);
    expect(issues[0]?.path).toBe("elements.0.box");
  });

  it("rejects a missing style field", () => {
    const style = { backgroundColor: "red", margin: NO_EDGES, padding: NO_EDGES };
    const issues = issuesOf({ elements: [rawElement({ style })] });
    expect(issues[0]?.path).toBe("elements.0.style.borderWidth");
  });

  it("rejects a repeated domOrder", () => {
    const issues = issuesOf({ elements: [rawElement(), rawElement()] });
    expect(issues).toEqual([{ path: "elements.1.domOrder", message: "domOrder 0 does not follow 0" }]);
  });

  it("rejects a parentOrder that is not an earlier element", () => {
    const issues = issuesOf({
      elements: [rawElement({ domOrder: 0 }), rawElement({ domOrder: 2, parentOrder: 1 })],
    });
    expect(issues).toEqual([
      { path: "elements.1.parentOrder", message: "parentOrder 1 is not an earlier element" },
    ]);
  });

  it("rejects a non-object snapshot", () => {
    expect(() => parseSnapshot(null)).toThrow(InvalidLayoutData);
    expect(() => parseSnapshot({})).toThrow(/Invalid layout data: elements/);
  });
});

describe("pageSizeOf", () => {
  it("prefers the declared page size", () => {
    const snapshot = parseSnapshot({ page: { width: 1280, height: 900 }, elements: [] });
    expect(pageSizeOf(snapshot)).toEqual({ width: 1280, height: 900 });
  });

  it("falls back to the extent of all elements", () => {
    const snapshot = parseSnapshot({
      elements: [at(0, 0, 60, { box: { left: 100, width: 300 } }), at(1, 500, 40, { box: { width: 50 } })],
    });
    expect(pageSizeOf(snapshot)).toEqual({ width: 400, height: 540 });
  });
});
