import { createHash } from "node:crypto";
import { DEFAULT_USER_AGENT } from "../../src/lib/source-config";
import { HttpError, errorMessage, isTransientError } from "./errors";
import { retryWithBackoff, type RetryOptions } from "./retry";

export function sha1(input: string): string {
  return createHash("sha1").update(input).digest("hex");
}

export function sha256(input: Uint8Array | string): string {
  return createHash("sha256").update(input).digest("hex");
}

export function isHttpUrl(url: string): boolean {
  return /^https?:\/\//i.test(url);
}

export function stripAndTruncate(text: string, maxLen: number): string {
  const compact = text.replace(/\s+/g, " ").trim();
  if (compact.length <= maxLen) return compact;
  return compact.slice(0, Math.max(0, maxLen - 1)).trimEnd() + "…";
}

export type HttpGetParams = {
  url: string;
  timeoutMs: number;
  signal?: AbortSignal;
  accept?: string;
  userAgent?: string;
  /** Larger bodies fail permanently. */
  maxBytes?: number;
  /** Omitted: one attempt. */
  retry?: Omit<RetryOptions, "signal">;
};

export type HttpResponse = {
  ok: true;
  status: number;
  url: string;
  body: Buffer;
  contentType: string | null;
  attempts: number;
  waitMs: number;
};

export type HttpFailure = {
  ok: false;
  status: number;
  error: string;
  transient: boolean;
  attempts: number;
  waitMs: number;
};

export type HttpResult = HttpResponse | HttpFailure;

type RawResponse = Pick<HttpResponse, "status" | "url" | "body" | "contentType">;

async function requestOnce(params: HttpGetParams): Promise<RawResponse> {
  const { url, timeoutMs, signal, maxBytes } = params;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const res = await fetch(url, {
      headers: {
        "user-agent": params.userAgent ?? DEFAULT_USER_AGENT,
        accept: params.accept ?? "*/*"
      },
      signal: controller.signal,
      redirect: "follow"
    });
    if (!res.ok) throw new HttpError({ url, status: res.status });

    const declared = Number(res.headers.get("content-length"));
    if (maxBytes != null && Number.isFinite(declared) && declared > maxBytes) {
      throw new HttpError({ url, status: res.status, message: `body too large (${declared} bytes)`, transient: false });
    }
    const body = Buffer.from(await res.arrayBuffer());
    if (maxBytes != null && body.length > maxBytes) {
      throw new HttpError({ url, status: res.status, message: `body too large (${body.length} bytes)`, transient: false });
    }
    return { status: res.status, url: res.url || url, body, contentType: res.headers.get("content-type") };
  } catch (err) {
    signal?.throwIfAborted();
    if (err instanceof HttpError) throw err;
    const message = controller.signal.aborted ? `timeout after ${timeoutMs}ms` : errorMessage(err);
    throw new HttpError({ url, status: 0, message, transient: true, cause: err });
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * GET with timeout, cancellation and optional retry. Failures come back as `{ ok: false }`;
 * only cancellation of `signal` rejects.
 */
export async function httpGet(params: HttpGetParams): Promise<HttpResult> {
  const policy: Omit<RetryOptions, "signal"> = params.retry ?? { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 };
  const outcome = await retryWithBackoff(() => requestOnce(params), {
    ...policy,
    signal: params.signal,
    shouldRetry: policy.shouldRetry ?? isTransientError
  });

  if (outcome.ok) {
    return { ok: true, ...outcome.value, attempts: outcome.attempts, waitMs: outcome.waitMs };
  }

  const err = outcome.error;
  return {
    ok: false,
    status: err instanceof HttpError ? err.status : 0,
    error: errorMessage(err),
    transient: isTransientError(err),
    attempts: outcome.attempts,
    waitMs: outcome.waitMs
  };
}

export function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const ct = contentType.toLowerCase();
  return ct.includes("text/html") || ct.includes("application/xhtml+xml");
}

export function bodyText(res: Pick<HttpResponse, "body">): string {
  return res.body.toString("utf-8");
}

/** Throws `SyntaxError` on malformed JSON. */
export function bodyJson(res: Pick<HttpResponse, "body">): unknown {
  const parsed: unknown = JSON.parse(bodyText(res));
  return parsed;
}
