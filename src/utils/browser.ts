import { chromium, type Browser } from "playwright-core";

/**
 * Launch a headless Chromium browser with environment-aware defaults.
 *
 * Set CHROMIUM_PATH to use a system browser (e.g. /usr/bin/chromium);
 * the sandbox flags containers need are added automatically in that case.
 * Without it, a browser previously installed with `playwright install
 * chromium` is used.
 */
export async function launchBrowser(): Promise<Browser> {
  const executablePath = process.env.CHROMIUM_PATH;
  if (executablePath) {
    return chromium.launch({
      executablePath,
      args: ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage"],
    });
  }
  return chromium.launch();
}
