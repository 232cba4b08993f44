import type { OutputFormat } from "./types";

export type SourceKind = "hackernews" | "kaginews" | "rss";

export const SOURCE_KINDS: readonly SourceKind[] = ["hackernews", "kaginews", "rss"];

type SourceBase = {
  /** Slug-like, unique per config. Prefixes every item id of the source. */
  id: string;
  title: string;
  enabled: boolean;
};

export type HackerNewsSourceConfig = SourceBase & {
  kind: "hackernews";
  apiBase: string;
  itemsApiBase: string;
  topStories: number;
  includeComments: boolean;
  includeArticleContent: boolean;
  maxCommentDepth: number;
  maxCommentsPerLevel: number;
};

export type KagiNewsSourceConfig = SourceBase & {
  kind: "kaginews";
  apiBase: string;
  /** `categoryId` slugs, rendered in this order. */
  categories: string[];
  language: string;
  maxStoriesPerCategory: number;
};

export type RssSourceConfig = SourceBase & {
  kind: "rss";
  url: string;
  maxArticles: number;
  includeArticleContent: boolean;
};

export type SourceConfig = HackerNewsSourceConfig | KagiNewsSourceConfig | RssSourceConfig;

export type UndatedItemsPolicy = "keep" | "last";

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type HttpSettings = {
  timeoutMs: number;
  articleTimeoutMs: number;
  maxArticleBytes: number;
  maxImageBytes: number;
  userAgent: string;
};

export type WorkerSettings = {
  sources: number;
  /** Per-source fan-out: story, category and article requests. */
  items: number;
  assets: number;
  renders: number;
};

export type EinkSettings = {
  width: number;
  height: number;
  spotlightCount: number;
  maxHeadlinesPerSource: number;
  maxExcerptChars: number;
};

export type ArchiveConfig = {
  title: string;
  outputDir: string;
  formats: OutputFormat[];
  embedAssets: boolean;
  undatedItems: UndatedItemsPolicy;
  workers: WorkerSettings;
  retry: RetryPolicy;
  http: HttpSettings;
  eink: EinkSettings;
  sources: SourceConfig[];
};

export const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; broadsheet/0.1; offline news archiver)";

export const DEFAULT_RETRY: RetryPolicy = { maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 30_000 };

export const DEFAULT_HTTP: HttpSettings = {
  timeoutMs: 30_000,
  articleTimeoutMs: 15_000,
  maxArticleBytes: 2 * 1024 * 1024,
  maxImageBytes: 10 * 1024 * 1024,
  userAgent: DEFAULT_USER_AGENT
};

export const DEFAULT_WORKERS: WorkerSettings = { sources: 4, items: 8, assets: 8, renders: 2 };

export const DEFAULT_EINK: EinkSettings = {
  width: 480,
  height: 800,
  spotlightCount: 2,
  maxHeadlinesPerSource: 10,
  maxExcerptChars: 350
};

/** Feeds default to their id. */
export const DEFAULT_SOURCE_TITLES: Record<Exclude<SourceKind, "rss">, string> = {
  hackernews: "Hacker News",
  kaginews: "Kagi News"
};

export const HACKERNEWS_DEFAULTS = {
  apiBase: "https://hacker-news.firebaseio.com/v0",
  itemsApiBase: "https://hn.algolia.com/api/v1",
  topStories: 30,
  includeComments: true,
  includeArticleContent: true,
  maxCommentDepth: 3,
  maxCommentsPerLevel: 10
} as const;

export const KAGINEWS_DEFAULTS = {
  apiBase: "https://news.kagi.com",
  language: "en",
  maxStoriesPerCategory: 50
} as const;

export const RSS_DEFAULTS = {
  maxArticles: 30,
  includeArticleContent: false
} as const;
