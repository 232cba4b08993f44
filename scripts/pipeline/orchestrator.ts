import type { ArchiveConfig, SourceConfig } from "../../src/lib/source-config";
import type { AssetStats, Edition, FetchOutcome, Item, SourceStatus } from "../../src/lib/types";
import { AssetError, HttpError, SourceFetchError, errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { retryWithBackoff } from "../lib/retry";
import { fetchSourceItems } from "../sources/index";
import type { SourceContext } from "../sources/types";
import { AssetLocalizer, type AssetStore } from "./assets";
import { mapWithConcurrency } from "./concurrency";
import { buildEdition } from "./edition";

export type FetchStageParams = {
  config: ArchiveConfig;
  signal: AbortSignal;
  log: Logger;
};

function failureStatus(err: unknown): Pick<Extract<FetchOutcome, { ok: false }>, "error" | "transient" | "httpStatus"> {
  if (err instanceof SourceFetchError) return { error: err.message, transient: err.transient, httpStatus: err.httpStatus };
  if (err instanceof HttpError) return { error: err.message, transient: err.transient, httpStatus: err.status || undefined };
  return { error: errorMessage(err), transient: false };
}

/** Runs one source with the run's retry policy. Only cancellation rejects. */
export async function fetchSource(source: SourceConfig, params: FetchStageParams): Promise<FetchOutcome> {
  const { config, signal } = params;
  const log = params.log.child(source.id);
  const start = Date.now();
  const ctx: SourceContext = {
    signal,
    log,
    http: config.http,
    retry: config.retry,
    concurrency: config.workers.items
  };

  const outcome = await retryWithBackoff(() => fetchSourceItems(source, ctx), {
    ...config.retry,
    signal,
    onRetry: ({ attempt, delayMs, error }) =>
      log.warn(`[SOURCE:RETRY] attempt=${attempt + 1} wait=${delayMs}ms error=${errorMessage(error)}`)
  });

  const base = { sourceId: source.id, title: source.title, kind: source.kind, attempts: outcome.attempts };
  if (outcome.ok) {
    const durationMs = Date.now() - start;
    log.info(`[SOURCE:OK] items=${outcome.value.length} attempts=${outcome.attempts} ${durationMs}ms`);
    return { ok: true, ...base, items: outcome.value, durationMs };
  }

  const failure = failureStatus(outcome.error);
  const durationMs = Date.now() - start;
  log.error(
    `[SOURCE:FAIL] ${failure.transient ? "transient" : "permanent"} attempts=${outcome.attempts} error=${failure.error}`
  );
  return { ok: false, ...base, ...failure, durationMs };
}

/** One outcome per enabled source, in configuration order whatever the completion order. */
export async function runFetchStage(params: FetchStageParams): Promise<FetchOutcome[]> {
  const enabled = params.config.sources.filter((s) => s.enabled);
  return await mapWithConcurrency({
    items: enabled,
    concurrency: params.config.workers.sources,
    signal: params.signal,
    fn: (source) => fetchSource(source, params)
  });
}

/**
 * Localizes the images of every item, `workers.assets` items at a time. Items whose images all
 * failed stay, stripped of them.
 */
export async function runAssetStage(params: {
  outcomes: FetchOutcome[];
  localizer: AssetLocalizer;
  concurrency: number;
  signal: AbortSignal;
}): Promise<FetchOutcome[]> {
  const { outcomes, localizer, signal } = params;
  const jobs: { outcome: number; item: number }[] = [];
  outcomes.forEach((o, oi) => {
    if (o.ok) o.items.forEach((_, ii) => jobs.push({ outcome: oi, item: ii }));
  });

  const localized = await mapWithConcurrency({
    items: jobs,
    concurrency: params.concurrency,
    signal,
    fn: async ({ outcome, item }): Promise<Item> => {
      const source = outcomes[outcome];
      if (!source.ok) throw new Error("unreachable: job for a failed source");
      const original = source.items[item];
      try {
        return await localizer.localize(original);
      } catch (err) {
        if (err instanceof AssetError && err.stripped) return err.stripped;
        throw err;
      }
    }
  });

  const next: FetchOutcome[] = outcomes.map((o) => (o.ok ? { ...o, items: [...o.items] } : o));
  jobs.forEach((job, i) => {
    const target = next[job.outcome];
    if (target.ok) target.items[job.item] = localized[i];
  });
  return next;
}

export function sourceStatuses(config: ArchiveConfig, outcomes: FetchOutcome[]): SourceStatus[] {
  const byId = new Map(outcomes.map((o) => [o.sourceId, o]));
  return config.sources.map((source): SourceStatus => {
    const o = byId.get(source.id);
    if (!o) {
      return { id: source.id, name: source.title, kind: source.kind, ok: false, skipped: true, durationMs: 0, itemCount: 0, attempts: 0 };
    }
    const status: SourceStatus = {
      id: o.sourceId,
      name: o.title,
      kind: o.kind,
      ok: o.ok,
      durationMs: o.durationMs,
      itemCount: o.ok ? o.items.length : 0,
      attempts: o.attempts
    };
    if (!o.ok) {
      status.error = o.error;
      if (o.httpStatus != null) status.httpStatus = o.httpStatus;
    }
    return status;
  });
}

export type FetchResult = {
  edition: Edition;
  sources: SourceStatus[];
  assets: AssetStats;
};

/**
 * Fetch stage, then image localization (skipped when no requested format shows images), then the
 * immutable edition built from the successful sources.
 */
export async function fetchEdition(params: FetchStageParams & { store: AssetStore; now: Date }): Promise<FetchResult> {
  const { config, signal, log } = params;
  let outcomes = await log.group("Fetch sources", () => runFetchStage(params));

  const localizer = new AssetLocalizer({
    store: params.store,
    http: config.http,
    retry: config.retry,
    signal,
    log: log.child("assets")
  });
  const wantsImages = config.formats.some((f) => f !== "eink");
  if (wantsImages) {
    outcomes = await log.group("Localize images", () =>
      runAssetStage({ outcomes, localizer, concurrency: config.workers.assets, signal })
    );
    const { downloaded, stored, reused, failed } = localizer.stats;
    log.info(`[ASSETS] downloaded=${downloaded} stored=${stored} reused=${reused} failed=${failed.length}`);
  }

  const edition = buildEdition({
    title: config.title,
    generatedAt: params.now,
    sources: outcomes.flatMap((o) => (o.ok ? [{ sourceId: o.sourceId, title: o.title, kind: o.kind, items: o.items }] : [])),
    sourceOrder: config.sources.map((s) => s.id),
    undatedItems: config.undatedItems
  });

  return { edition, sources: sourceStatuses(config, outcomes), assets: localizer.stats };
}
