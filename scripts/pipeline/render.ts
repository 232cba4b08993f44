import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { ArchiveConfig } from "../../src/lib/source-config";
import type { Edition, OutputFormat, RenderResult } from "../../src/lib/types";
import { RENDERERS, artifactName, type RasterEngine, type RenderContext } from "../../src/lib/render/index";
import { RenderError, errorMessage, isAbortError } from "../lib/errors";
import { writeFileAtomic } from "../lib/fs";
import type { Logger } from "../lib/logger";
import { acquireChromiumRaster } from "../lib/raster";
import { mapWithConcurrency } from "./concurrency";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function createAssetReader(runDir: string): (localPath: string) => Promise<Uint8Array | null> {
  return async (localPath) => {
    try {
      return await readFile(join(runDir, localPath));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  };
}

export type RenderStageParams = {
  edition: Edition;
  formats: readonly OutputFormat[];
  runDir: string;
  config: Pick<ArchiveConfig, "embedAssets" | "eink" | "workers">;
  signal: AbortSignal;
  log: Logger;
  acquireRasterEngine?: () => Promise<RasterEngine>;
  readAsset?: (localPath: string) => Promise<Uint8Array | null>;
};

async function renderOne(format: OutputFormat, params: RenderStageParams, ctx: RenderContext): Promise<RenderResult> {
  const { edition, runDir, signal } = params;
  const log = params.log.child(format);
  const renderer = RENDERERS[format];
  const start = Date.now();
  const path = join(runDir, artifactName(edition.date, renderer.extension));

  try {
    signal.throwIfAborted();
    const output = await renderer.render(edition, ctx);
    const bytes = typeof output === "string" ? Buffer.from(output, "utf-8") : output;
    await writeFileAtomic(path, bytes, signal);
    const durationMs = Date.now() - start;
    log.info(`[RENDER:OK] ${path} bytes=${bytes.byteLength} ${durationMs}ms`);
    return { format, ok: true, path, bytes: bytes.byteLength, durationMs };
  } catch (err) {
    if (signal.aborted || isAbortError(err)) throw err;
    const wrapped = err instanceof RenderError ? err : new RenderError(format, errorMessage(err), { cause: err });
    const durationMs = Date.now() - start;
    log.error(`[RENDER:FAIL] ${wrapped.message}`);
    return { format, ok: false, error: wrapped.message, durationMs };
  }
}

/**
 * Renders every requested format, `workers.renders` at a time. A failing format never stops the
 * others; only cancellation rejects.
 */
export async function runRenderStage(params: RenderStageParams): Promise<RenderResult[]> {
  const { config, signal } = params;
  const ctx: RenderContext = {
    embedAssets: config.embedAssets,
    eink: config.eink,
    signal,
    readAsset: params.readAsset ?? createAssetReader(params.runDir),
    acquireRasterEngine: params.acquireRasterEngine ?? (() => acquireChromiumRaster())
  };

  return await mapWithConcurrency({
    items: [...params.formats],
    concurrency: config.workers.renders,
    signal,
    fn: (format) => renderOne(format, params, ctx)
  });
}
