import { describe, it, expect } from "vitest";
import { errors } from "playwright-core";
import { isNavigableUrl, measureLayout, toRenderFailure } from "../../src/extraction/layout-extractor.js";
import { InvalidLayoutData, RenderFailure } from "../../src/errors.js";
import { at } from "../helpers/layout.js";

describe("toRenderFailure", () => {
  it("maps a Playwright timeout to a timeout failure", () => {
    const cause = new errors.TimeoutError("page.goto: Timeout 30000ms exceeded");
    const failure = toRenderFailure(cause, "https://slow.test/");
    expect(failure.kind).toBe("timeout");
    expect(failure.target).toBe("https://slow.test/");
    expect(failure.message).toBe("Timed out rendering https://slow.test/: page.goto: Timeout 30000ms exceeded");
    expect(failure.cause).toBe(cause);
  });

  it("maps any other error to a navigation failure", () => {
    const failure = toRenderFailure(new Error("net::ERR_NAME_NOT_RESOLVED"), "https://missing.test/");
    expect(failure.kind).toBe("navigation");
    expect(failure.message).toBe("Failed to render https://missing.test/: net::ERR_NAME_NOT_RESOLVED");
  });

  it("describes non-Error values", () => {
    expect(toRenderFailure("boom", "x").message).toBe("Failed to render x: boom");
  });

  it("passes an existing RenderFailure through", () => {
    const original = new RenderFailure("navigation", "https://a.test/", "HTTP 404 loading https://a.test/");
    expect(toRenderFailure(original, "other")).toBe(original);
  });
});

describe("isNavigableUrl", () => {
  it("accepts http, https and file URLs", () => {
    expect(isNavigableUrl("http://example.test/")).toBe(true);
    expect(isNavigableUrl("https://example.test/page")).toBe(true);
    expect(isNavigableUrl("file:///tmp/page.html")).toBe(true);
  });

  it("rejects other schemes and non-URLs", () => {
    expect(isNavigableUrl("javascript:alert(1)")).toBe(false);
    expect(isNavigableUrl("ftp://example.test/")).toBe(false);
    expect(isNavigableUrl("not a url")).toBe(false);
  });
});

describe("measureLayout", () => {
  it("validates and returns the in-page result", async () => {
    const snapshot = await measureLayout(
      async () => ({ page: { width: 1280, height: 900 }, elements: [at(0, 0, 60)] }),
      "https://example.test/",
    );
    expect(snapshot.page).toEqual({ width: 1280, height: 900 });
    expect(snapshot.elements.map((el) => el.domOrder)).toEqual([0]);
  });

  it("maps a failed evaluation to a navigation failure for the target", async () => {
    const run = async (): Promise<unknown> => {
      throw new Error("Execution context was destroyed");
    };
    const failure = await measureLayout(run, "https://example.test/").catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(RenderFailure);
    if (failure instanceof RenderFailure) {
      expect(failure.kind).toBe("navigation");
      expect(failure.target).toBe("https://example.test/");
      expect(failure.message).toBe("Failed to render https://example.test/: Execution context was destroyed");
    }
  });

  it("maps an evaluation timeout to a timeout failure", async () => {
    const run = async (): Promise<unknown> => {
      throw new errors.TimeoutError("page.evaluate: Timeout exceeded");
    };
    await expect(measureLayout(run, "<inline html>")).rejects.toMatchObject({
      name: "RenderFailure",
      kind: "timeout",
      target: "<inline html>",
    });
  });

  it("leaves a malformed result as invalid layout data", async () => {
    await expect(measureLayout(async () => ({ elements: "none" }), "x")).rejects.toBeInstanceOf(
      InvalidLayoutData,
    );
  });
});
