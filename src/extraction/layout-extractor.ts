import { errors, type Page } from "playwright-core";
import { parseSnapshot } from "../schema/layout.js";
import type { LayoutSnapshot } from "../schema/layout.js";
import { resolveRenderConfig } from "../schema/options.js";
import type { RenderConfig, RenderConfigInput } from "../schema/options.js";
import { RenderFailure } from "../errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "layout-extractor" });

/** Target label used in errors and logs for inline HTML */
export const INLINE_HTML_TARGET = "<inline html>";

/**
 * JavaScript string evaluated in the browser context via page.evaluate().
 * Walks every element under <body> in document order, skips what is not
 * rendered, and reports page coordinates (scroll offsets added).
 * parentOrder points at the nearest reported ancestor.
 * Wrapped as an IIFE so page.evaluate() executes and returns the result.
 */
const LAYOUT_SCRIPT = `(() => {
  const px = (v) => parseFloat(v) || 0;
  const edges = (s, prop) => ({
    top: px(s[prop + 'Top']),
    right: px(s[prop + 'Right']),
    bottom: px(s[prop + 'Bottom']),
    left: px(s[prop + 'Left']),
  });

  const orderOf = new Map();
  const elements = [];

  for (const el of document.querySelectorAll('body *')) {
    const s = window.getComputedStyle(el);
    if (s.display === 'none' || s.visibility === 'hidden' || parseFloat(s.opacity) === 0) continue;
    const rect = el.getBoundingClientRect();
    if (rect.width === 0 || rect.height === 0) continue;

    let parentOrder = null;
    for (let p = el.parentElement; p; p = p.parentElement) {
      if (orderOf.has(p)) { parentOrder = orderOf.get(p); break; }
    }
    const domOrder = elements.length;
    orderOf.set(el, domOrder);

    const raw = typeof el.innerText === 'string' ? el.innerText : (el.textContent || '');
    const text = raw.replace(/\\s+/g, ' ').trim();
    const borderTopWidth = px(s.borderTopWidth);
    const borderBottomWidth = px(s.borderBottomWidth);

    elements.push({
      tag: el.tagName.toLowerCase(),
      box: {
        top: rect.top + window.scrollY,
        left: rect.left + window.scrollX,
        width: rect.width,
        height: rect.height,
      },
      style: {
        backgroundColor: s.backgroundColor,
        borderWidth: Math.max(borderTopWidth, borderBottomWidth, px(s.borderLeftWidth), px(s.borderRightWidth)),
        borderTopWidth,
        borderBottomWidth,
        margin: edges(s, 'margin'),
        padding: edges(s, 'padding'),
      },
      text,
      hasText: text.length > 0,
      hasImage: el.matches('img, picture') || el.querySelector('img, picture') !== null,
      hasVideo: el.matches('video, iframe') || el.querySelector('video, iframe') !== null,
      domOrder,
      parentOrder,
      rawHtml: el.outerHTML,
    });
  }

  const root = document.documentElement;
  return {
    page: {
      width: Math.max(root.scrollWidth, 1),
      height: Math.max(root.scrollHeight, 1),
    },
    elements,
  };
})()`;

/** Map a Playwright failure onto a RenderFailure */
export function toRenderFailure(err: unknown, target: string): RenderFailure {
  if (err instanceof RenderFailure) return err;
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof errors.TimeoutError) {
    return new RenderFailure("timeout", target, `Timed out rendering ${target}: ${message}`, { cause: err });
  }
  return new RenderFailure("navigation", target, `Failed to render ${target}: ${message}`, { cause: err });
}

/** http(s) and file URLs are the only ones a page can be loaded from */
export function isNavigableUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === "http:" || protocol === "https:" || protocol === "file:";
  } catch {
    return false;
  }
}

async function render(
  page: Page,
  target: string,
  config: RenderConfig,
  load: () => Promise<void>,
): Promise<void> {
  log.info({ target, waitUntil: config.waitUntil }, "rendering page");
  try {
    await page.setViewportSize(config.viewport);
    await load();
  } catch (err) {
    throw toRenderFailure(err, target);
  }
}

/**
 * Run an in-page measurement and validate what it returns. A failure to
 * run becomes a RenderFailure; a malformed result stays InvalidLayoutData.
 */
export async function measureLayout(
  run: () => Promise<unknown>,
  target: string,
): Promise<LayoutSnapshot> {
  let raw: unknown;
  try {
    raw = await run();
  } catch (err) {
    throw toRenderFailure(err, target);
  }
  const snapshot = parseSnapshot(raw);
  log.info({ target, elements: snapshot.elements.length }, "layout extracted");
  return snapshot;
}

/** Measure a Playwright page that already has content loaded. */
export async function extractLayoutWithPage(
  page: Page,
  target: string = page.url(),
): Promise<LayoutSnapshot> {
  return measureLayout(() => page.evaluate(LAYOUT_SCRIPT), target);
}

/** Load an HTML string into the page and extract its layout snapshot. */
export async function extractLayout(
  page: Page,
  html: string,
  config?: RenderConfigInput,
): Promise<LayoutSnapshot> {
  if (html.trim().length === 0) {
    throw new RenderFailure("invalid_html", INLINE_HTML_TARGET, "HTML content is empty");
  }
  const cfg = resolveRenderConfig(config);
  await render(page, INLINE_HTML_TARGET, cfg, () =>
    page.setContent(html, { waitUntil: cfg.waitUntil, timeout: cfg.timeoutMs }),
  );
  return extractLayoutWithPage(page, INLINE_HTML_TARGET);
}

/** Navigate the page to a URL and extract its layout snapshot. */
export async function extractLayoutFromUrl(
  page: Page,
  url: string,
  config?: RenderConfigInput,
): Promise<LayoutSnapshot> {
  if (!isNavigableUrl(url)) {
    throw new RenderFailure("navigation", url, `Not a navigable URL: ${url}`);
  }
  const cfg = resolveRenderConfig(config);
  await render(page, url, cfg, async () => {
    const response = await page.goto(url, { waitUntil: cfg.waitUntil, timeout: cfg.timeoutMs });
    if (response && !response.ok()) {
      throw new RenderFailure("navigation", url, `HTTP ${response.status()} loading ${url}`);
    }
  });
  return extractLayoutWithPage(page, url);
}
