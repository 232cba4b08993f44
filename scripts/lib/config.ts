import {
  DEFAULT_EINK,
  DEFAULT_HTTP,
  DEFAULT_RETRY,
  DEFAULT_SOURCE_TITLES,
  DEFAULT_WORKERS,
  HACKERNEWS_DEFAULTS,
  KAGINEWS_DEFAULTS,
  RSS_DEFAULTS,
  SOURCE_KINDS,
  type ArchiveConfig,
  type SourceConfig,
  type SourceKind,
  type UndatedItemsPolicy
} from "../../src/lib/source-config";
import { OUTPUT_FORMATS, type OutputFormat } from "../../src/lib/types";
import { ConfigError, errorMessage, type ConfigIssue } from "./errors";
import { readJson } from "./fs";
import { isHttpUrl } from "./http";

type Obj = Record<string, unknown>;

function isRecord(value: unknown): value is Obj {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isSourceKind(value: unknown): value is SourceKind {
  return SOURCE_KINDS.some((k) => k === value);
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

class Reader {
  constructor(private readonly issues: ConfigIssue[]) {}

  push(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  object(obj: Obj, key: string, path: string): Obj {
    const value = obj[key];
    if (value == null) return {};
    if (!isRecord(value)) {
      this.push(`${path}.${key}`, "must be an object");
      return {};
    }
    return value;
  }

  string(obj: Obj, key: string, path: string, fallback: string): string {
    const value = obj[key];
    if (value == null) return fallback;
    if (!isNonEmptyString(value)) {
      this.push(`${path}.${key}`, "must be a non-empty string");
      return fallback;
    }
    return value.trim();
  }

  url(obj: Obj, key: string, path: string, fallback: string | null): string {
    const value = obj[key];
    if (value == null && fallback != null) return fallback;
    if (!isNonEmptyString(value) || !isHttpUrl(value.trim())) {
      this.push(`${path}.${key}`, "must be an http(s) URL");
      return fallback ?? "";
    }
    return value.trim();
  }

  /** A URL that paths get appended to; trailing slashes are dropped. */
  baseUrl(obj: Obj, key: string, path: string, fallback: string): string {
    return this.url(obj, key, path, fallback).replace(/\/+$/, "");
  }

  boolean(obj: Obj, key: string, path: string, fallback: boolean): boolean {
    const value = obj[key];
    if (value == null) return fallback;
    if (typeof value !== "boolean") {
      this.push(`${path}.${key}`, "must be true or false");
      return fallback;
    }
    return value;
  }

  int(obj: Obj, key: string, path: string, fallback: number, range: { min: number; max: number }): number {
    const value = obj[key];
    if (value == null) return fallback;
    if (typeof value !== "number" || !Number.isInteger(value) || value < range.min || value > range.max) {
      this.push(`${path}.${key}`, `must be an integer in [${range.min}, ${range.max}]`);
      return fallback;
    }
    return value;
  }

  stringList(obj: Obj, key: string, path: string): string[] {
    const value = obj[key];
    if (value == null) return [];
    if (!Array.isArray(value) || !value.every(isNonEmptyString)) {
      this.push(`${path}.${key}`, "must be a list of non-empty strings");
      return [];
    }
    return value.map((s) => s.trim());
  }
}

const SOURCE_ID_RE = /^[a-z0-9][a-z0-9_-]*$/i;

function readSource(r: Reader, raw: unknown, path: string): SourceConfig | null {
  if (!isRecord(raw)) {
    r.push(path, "must be an object");
    return null;
  }

  const kind = raw.kind;
  if (!isSourceKind(kind)) {
    r.push(`${path}.kind`, `must be one of ${SOURCE_KINDS.join(", ")}`);
    return null;
  }

  const id = raw.id;
  if (!isNonEmptyString(id) || !SOURCE_ID_RE.test(id)) {
    r.push(`${path}.id`, "must be a slug (letters, digits, - and _)");
    return null;
  }

  const base = {
    id,
    title: r.string(raw, "title", path, kind === "rss" ? id : DEFAULT_SOURCE_TITLES[kind]),
    enabled: r.boolean(raw, "enabled", path, true)
  };

  switch (kind) {
    case "hackernews":
      return {
        ...base,
        kind,
        apiBase: r.baseUrl(raw, "apiBase", path, HACKERNEWS_DEFAULTS.apiBase),
        itemsApiBase: r.baseUrl(raw, "itemsApiBase", path, HACKERNEWS_DEFAULTS.itemsApiBase),
        topStories: r.int(raw, "topStories", path, HACKERNEWS_DEFAULTS.topStories, { min: 1, max: 500 }),
        includeComments: r.boolean(raw, "includeComments", path, HACKERNEWS_DEFAULTS.includeComments),
        includeArticleContent: r.boolean(raw, "includeArticleContent", path, HACKERNEWS_DEFAULTS.includeArticleContent),
        maxCommentDepth: r.int(raw, "maxCommentDepth", path, HACKERNEWS_DEFAULTS.maxCommentDepth, { min: 0, max: 20 }),
        maxCommentsPerLevel: r.int(raw, "maxCommentsPerLevel", path, HACKERNEWS_DEFAULTS.maxCommentsPerLevel, {
          min: 0,
          max: 200
        })
      };
    case "kaginews": {
      const categories = r.stringList(raw, "categories", path);
      if (categories.length === 0) r.push(`${path}.categories`, "must list at least one category");
      return {
        ...base,
        kind,
        apiBase: r.baseUrl(raw, "apiBase", path, KAGINEWS_DEFAULTS.apiBase),
        categories,
        language: r.string(raw, "language", path, KAGINEWS_DEFAULTS.language),
        maxStoriesPerCategory: r.int(raw, "maxStoriesPerCategory", path, KAGINEWS_DEFAULTS.maxStoriesPerCategory, {
          min: 1,
          max: 500
        })
      };
    }
    case "rss":
      return {
        ...base,
        kind,
        url: r.url(raw, "url", path, null),
        maxArticles: r.int(raw, "maxArticles", path, RSS_DEFAULTS.maxArticles, { min: 1, max: 1000 }),
        includeArticleContent: r.boolean(raw, "includeArticleContent", path, RSS_DEFAULTS.includeArticleContent)
      };
  }
}

/** Validates a parsed config document, filling defaults. Every problem is reported in one `ConfigError`. */
export function validateConfig(raw: unknown, origin?: string): ArchiveConfig {
  const issues: ConfigIssue[] = [];
  const r = new Reader(issues);

  if (!isRecord(raw)) throw new ConfigError([{ path: "config", message: "must be a JSON object" }], origin);

  let formats: OutputFormat[] = ["html"];
  if (raw.formats != null) {
    const list: unknown[] = Array.isArray(raw.formats) ? raw.formats : [];
    const valid = list.filter(isOutputFormat);
    if (list.length === 0 || valid.length !== list.length) {
      r.push("config.formats", `must be a non-empty list of ${OUTPUT_FORMATS.join(", ")}`);
    } else {
      formats = [...new Set(valid)];
    }
  }

  let undatedItems: UndatedItemsPolicy = "keep";
  if (raw.undatedItems != null) {
    if (raw.undatedItems === "keep" || raw.undatedItems === "last") undatedItems = raw.undatedItems;
    else r.push("config.undatedItems", 'must be "keep" or "last"');
  }

  const workersRaw = r.object(raw, "workers", "config");
  const retryRaw = r.object(raw, "retry", "config");
  const httpRaw = r.object(raw, "http", "config");
  const einkRaw = r.object(raw, "eink", "config");
  const workerRange = { min: 1, max: 64 };

  const config: ArchiveConfig = {
    title: r.string(raw, "title", "config", "Daily Edition"),
    outputDir: r.string(raw, "outputDir", "config", "output"),
    formats,
    embedAssets: r.boolean(raw, "embedAssets", "config", false),
    undatedItems,
    workers: {
      sources: r.int(workersRaw, "sources", "config.workers", DEFAULT_WORKERS.sources, workerRange),
      items: r.int(workersRaw, "items", "config.workers", DEFAULT_WORKERS.items, workerRange),
      assets: r.int(workersRaw, "assets", "config.workers", DEFAULT_WORKERS.assets, workerRange),
      renders: r.int(workersRaw, "renders", "config.workers", DEFAULT_WORKERS.renders, workerRange)
    },
    retry: {
      maxRetries: r.int(retryRaw, "maxRetries", "config.retry", DEFAULT_RETRY.maxRetries, { min: 0, max: 10 }),
      baseDelayMs: r.int(retryRaw, "baseDelayMs", "config.retry", DEFAULT_RETRY.baseDelayMs, { min: 0, max: 60_000 }),
      maxDelayMs: r.int(retryRaw, "maxDelayMs", "config.retry", DEFAULT_RETRY.maxDelayMs, { min: 0, max: 300_000 })
    },
    http: {
      timeoutMs: r.int(httpRaw, "timeoutMs", "config.http", DEFAULT_HTTP.timeoutMs, { min: 100, max: 300_000 }),
      articleTimeoutMs: r.int(httpRaw, "articleTimeoutMs", "config.http", DEFAULT_HTTP.articleTimeoutMs, {
        min: 100,
        max: 300_000
      }),
      maxArticleBytes: r.int(httpRaw, "maxArticleBytes", "config.http", DEFAULT_HTTP.maxArticleBytes, {
        min: 1024,
        max: 64 * 1024 * 1024
      }),
      maxImageBytes: r.int(httpRaw, "maxImageBytes", "config.http", DEFAULT_HTTP.maxImageBytes, {
        min: 1024,
        max: 256 * 1024 * 1024
      }),
      userAgent: r.string(httpRaw, "userAgent", "config.http", DEFAULT_HTTP.userAgent)
    },
    eink: {
      width: r.int(einkRaw, "width", "config.eink", DEFAULT_EINK.width, { min: 64, max: 4096 }),
      height: r.int(einkRaw, "height", "config.eink", DEFAULT_EINK.height, { min: 64, max: 4096 }),
      spotlightCount: r.int(einkRaw, "spotlightCount", "config.eink", DEFAULT_EINK.spotlightCount, { min: 0, max: 10 }),
      maxHeadlinesPerSource: r.int(einkRaw, "maxHeadlinesPerSource", "config.eink", DEFAULT_EINK.maxHeadlinesPerSource, {
        min: 1,
        max: 100
      }),
      maxExcerptChars: r.int(einkRaw, "maxExcerptChars", "config.eink", DEFAULT_EINK.maxExcerptChars, {
        min: 20,
        max: 5000
      })
    },
    sources: []
  };

  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    r.push("config.retry.maxDelayMs", "must not be below baseDelayMs");
  }

  if (!Array.isArray(raw.sources)) {
    r.push("config.sources", "must be a list");
  } else {
    const entries: unknown[] = raw.sources;
    const seen = new Set<string>();
    entries.forEach((entry, i) => {
      const source = readSource(r, entry, `config.sources[${i}]`);
      if (!source) return;
      if (seen.has(source.id)) {
        r.push(`config.sources[${i}].id`, `duplicate id: ${source.id}`);
        return;
      }
      seen.add(source.id);
      config.sources.push(source);
    });
  }

  if (issues.length > 0) throw new ConfigError(issues, origin);
  return config;
}

/** Integer from `key`, floored and clamped to `range`; unset, blank or negative values give `fallback`. */
export function envInt(key: string, fallback: number, range: { min: number; max: number }): number {
  const raw = process.env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return Math.max(range.min, Math.min(range.max, Math.floor(parsed)));
}

/** Environment tuning for CI runs; invalid values are ignored. */
export function applyEnvOverrides(config: ArchiveConfig): ArchiveConfig {
  return {
    ...config,
    workers: {
      ...config.workers,
      sources: envInt("BROADSHEET_SOURCE_WORKERS", config.workers.sources, { min: 1, max: 64 }),
      assets: envInt("BROADSHEET_ASSET_WORKERS", config.workers.assets, { min: 1, max: 64 })
    },
    retry: {
      ...config.retry,
      maxRetries: envInt("BROADSHEET_MAX_RETRIES", config.retry.maxRetries, { min: 0, max: 10 })
    },
    http: {
      ...config.http,
      timeoutMs: envInt("BROADSHEET_HTTP_TIMEOUT_MS", config.http.timeoutMs, { min: 100, max: 300_000 })
    }
  };
}

export async function loadConfig(
  filePath: string,
  overrides?: { outputDir?: string; formats?: OutputFormat[] }
): Promise<ArchiveConfig> {
  let raw: unknown;
  try {
    raw = await readJson(filePath);
  } catch (err) {
    throw new ConfigError([{ path: filePath, message: `cannot read: ${errorMessage(err)}` }]);
  }

  const config = applyEnvOverrides(validateConfig(raw, filePath));
  return {
    ...config,
    outputDir: overrides?.outputDir ?? config.outputDir,
    formats: overrides?.formats && overrides.formats.length > 0 ? overrides.formats : config.formats
  };
}
