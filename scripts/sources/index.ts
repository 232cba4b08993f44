import type { SourceConfig } from "../../src/lib/source-config";
import type { Item } from "../../src/lib/types";
import { hackerNewsAdapter } from "./hackernews";
import { kagiNewsAdapter } from "./kaginews";
import { rssAdapter } from "./rss";
import type { SourceContext } from "./types";

export const ADAPTERS = {
  hackernews: hackerNewsAdapter,
  kaginews: kagiNewsAdapter,
  rss: rssAdapter
} as const;

export function fetchSourceItems(config: SourceConfig, ctx: SourceContext): Promise<Item[]> {
  switch (config.kind) {
    case "hackernews":
      return ADAPTERS.hackernews.fetch(config, ctx);
    case "kaginews":
      return ADAPTERS.kaginews.fetch(config, ctx);
    case "rss":
      return ADAPTERS.rss.fetch(config, ctx);
  }
}
