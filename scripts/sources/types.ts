import type { Item } from "../../src/lib/types";
import type { HttpSettings, RetryPolicy, SourceConfig, SourceKind } from "../../src/lib/source-config";
import type { Logger } from "../lib/logger";

export type SourceContext = {
  signal: AbortSignal;
  log: Logger;
  http: HttpSettings;
  /** Applied to per-entry sub-requests; the top-level request is retried by the orchestrator. */
  retry: RetryPolicy;
  /** Bound on concurrent sub-requests within one source. */
  concurrency: number;
};

export type SourceAdapter<C extends SourceConfig = SourceConfig> = {
  kind: SourceKind;
  /** Items in source order with unresolved images. Rejects with `SourceFetchError`. */
  fetch: (config: C, ctx: SourceContext) => Promise<Item[]>;
};
