import { join } from "node:path";
import type { ArchiveConfig } from "../../src/lib/source-config";
import type { Edition, RunSummary } from "../../src/lib/types";
import type { RasterEngine } from "../../src/lib/render/index";
import type { Logger } from "../lib/logger";
import { toDateStamp } from "../lib/time";
import { createFileAssetStore, type AssetStore } from "./assets";
import { fetchEdition } from "./orchestrator";
import { runRenderStage } from "./render";
import { computeExitCode } from "./summary";

export type RunOptions = {
  signal: AbortSignal;
  log: Logger;
  now?: Date;
  /** Defaults to `<outputDir>/<date>/images`. */
  store?: AssetStore;
  acquireRasterEngine?: () => Promise<RasterEngine>;
};

export type RunResult = {
  edition: Edition;
  summary: RunSummary;
};

/**
 * One archive run: fetch and localize, build the edition, then render every configured format into
 * `<outputDir>/<YYYY-MM-DD>/`. Rejects only on cancellation.
 */
export async function runArchive(config: ArchiveConfig, options: RunOptions): Promise<RunResult> {
  const { signal, log } = options;
  const start = Date.now();
  const now = options.now ?? new Date();
  const runDir = join(config.outputDir, toDateStamp(now));

  const { edition, sources, assets } = await fetchEdition({
    config,
    signal,
    log,
    store: options.store ?? createFileAssetStore(runDir),
    now
  });
  log.info(`[EDITION] ${edition.date} sections=${edition.sections.length} items=${edition.itemCount}`);
  if (edition.itemCount === 0) log.warn("[EDITION] no items; rendering an empty edition");

  const renders = await log.group("Render formats", () =>
    runRenderStage({
      edition,
      formats: config.formats,
      runDir,
      config,
      signal,
      log: log.child("render"),
      acquireRasterEngine: options.acquireRasterEngine
    })
  );

  const exitCode = computeExitCode(edition, renders);
  const summary: RunSummary = {
    generatedAt: edition.generatedAt,
    durationMs: Date.now() - start,
    outputDir: runDir,
    itemCount: edition.itemCount,
    sources,
    assets,
    renders,
    exitCode
  };
  log.info(
    `[DONE] items=${edition.itemCount} renders=${renders.filter((r) => r.ok).length}/${renders.length} exit=${exitCode}`
  );
  return { edition, summary };
}
