import { chromium, type Browser } from "playwright-core";
import type { GrayImage, RasterEngine } from "../../src/lib/render/types";
import { findChromePath, type ChromeLookup } from "./chrome-path";

/**
 * Screenshot of `markup` at exactly `width`×`height`, reduced to luma inside the page
 * (ITU-R BT.601 weights) so no image codec is needed on the Node side.
 */
async function rasterize(
  browser: Browser,
  markup: string,
  size: { width: number; height: number },
  signal?: AbortSignal
): Promise<GrayImage> {
  const page = await browser.newPage({ viewport: size, deviceScaleFactor: 1 });
  try {
    signal?.throwIfAborted();
    await page.setContent(markup, { waitUntil: "load" });
    signal?.throwIfAborted();
    const png = await page.screenshot({ type: "png", clip: { x: 0, y: 0, ...size } });
    signal?.throwIfAborted();

    const luma = await page.evaluate(
      async ({ b64, width, height }) => {
        const img = new Image();
        img.src = `data:image/png;base64,${b64}`;
        await img.decode();
        const canvas = document.createElement("canvas");
        canvas.width = width;
        canvas.height = height;
        const g = canvas.getContext("2d");
        if (!g) throw new Error("2d canvas unavailable");
        g.fillStyle = "#fff";
        g.fillRect(0, 0, width, height);
        g.drawImage(img, 0, 0);
        const { data } = g.getImageData(0, 0, width, height);
        const out: number[] = new Array(width * height);
        for (let i = 0; i < width * height; i += 1) {
          out[i] = Math.round(0.299 * data[i * 4] + 0.587 * data[i * 4 + 1] + 0.114 * data[i * 4 + 2]);
        }
        return out;
      },
      { b64: png.toString("base64"), width: size.width, height: size.height }
    );

    return { width: size.width, height: size.height, pixels: Uint8Array.from(luma) };
  } finally {
    await page.close();
  }
}

export async function launchChromiumRaster(executablePath: string): Promise<RasterEngine> {
  const browser = await chromium.launch({
    executablePath,
    headless: true,
    args: ["--no-sandbox", "--disable-dev-shm-usage", "--font-render-hinting=none"]
  });
  return {
    render: (markup, size, signal) => rasterize(browser, markup, size, signal),
    release: () => browser.close()
  };
}

/** Rejects with a readable message when no Chromium-family browser is installed. */
export async function acquireChromiumRaster(lookup?: ChromeLookup): Promise<RasterEngine> {
  const executablePath = findChromePath(lookup);
  if (!executablePath) {
    throw new Error("no Chromium-compatible browser found; set BROADSHEET_CHROME_PATH");
  }
  return await launchChromiumRaster(executablePath);
}
