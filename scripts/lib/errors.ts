import type { Item, OutputFormat } from "../../src/lib/types";

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  return "name" in err && err.name === "AbortError";
}

/** Request timeout, too early, rate limit and 5xx. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

export class HttpError extends Error {
  readonly status: number;
  readonly url: string;
  readonly transient: boolean;

  constructor(params: { url: string; status: number; message?: string; transient?: boolean; cause?: unknown }) {
    super(params.message ?? `HTTP ${params.status}`, { cause: params.cause });
    this.name = "HttpError";
    this.url = params.url;
    this.status = params.status;
    this.transient = params.transient ?? (params.status === 0 || isTransientStatus(params.status));
  }
}

export class SourceFetchError extends Error {
  readonly sourceId: string;
  readonly transient: boolean;
  readonly httpStatus?: number;

  constructor(params: { sourceId: string; message: string; transient: boolean; httpStatus?: number; cause?: unknown }) {
    super(params.message, { cause: params.cause });
    this.name = "SourceFetchError";
    this.sourceId = params.sourceId;
    this.transient = params.transient;
    this.httpStatus = params.httpStatus;
  }
}

export type ImageFailure = { url: string; error: string };

export class AssetError extends Error {
  readonly itemId?: string;
  readonly url?: string;
  readonly transient: boolean;
  readonly failures: ImageFailure[];
  /** The item with every image removed, for callers that keep it anyway. */
  readonly stripped?: Item;

  constructor(params: {
    message: string;
    itemId?: string;
    url?: string;
    transient?: boolean;
    failures?: ImageFailure[];
    stripped?: Item;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.name = "AssetError";
    this.itemId = params.itemId;
    this.url = params.url;
    this.transient = params.transient ?? false;
    this.failures = params.failures ?? [];
    this.stripped = params.stripped;
  }
}

export class RenderError extends Error {
  readonly format: OutputFormat;

  constructor(format: OutputFormat, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "RenderError";
    this.format = format;
  }
}

export type ConfigIssue = { path: string; message: string };

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[], source?: string) {
    const head = source ? `invalid config ${source}` : "invalid config";
    super(`${head}: ${issues.map((it) => `${it.path}: ${it.message}`).join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Permanent unless the error says otherwise. */
export function isTransientError(err: unknown): boolean {
  if (isAbortError(err)) return false;
  if (err instanceof HttpError || err instanceof SourceFetchError || err instanceof AssetError) return err.transient;
  // fetch() rejects with a TypeError on DNS, connection and TLS failures
  if (err instanceof TypeError && err.message === "fetch failed") return true;
  return false;
}
