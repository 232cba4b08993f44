import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { TestContext } from "node:test";
import type { Logger } from "../scripts/lib/logger";
import type { ArchiveConfig } from "../src/lib/source-config";
import { DEFAULT_EINK, DEFAULT_USER_AGENT } from "../src/lib/source-config";
import type { RasterEngine } from "../src/lib/render/types";
import type { Item } from "../src/lib/types";

export function patchGlobal<K extends keyof typeof globalThis>(t: TestContext, key: K, value: (typeof globalThis)[K]) {
  const prevDesc = Object.getOwnPropertyDescriptor(globalThis, key);

  Object.defineProperty(globalThis, key, {
    value,
    configurable: true,
    enumerable: true,
    writable: true
  });

  t.after(() => {
    if (prevDesc) Object.defineProperty(globalThis, key, prevDesc);
    else Reflect.deleteProperty(globalThis, key);
  });
}

export function patchEnv(t: TestContext, key: string, value: string | undefined) {
  const prev = process.env[key];
  if (value == null) delete process.env[key];
  else process.env[key] = value;
  t.after(() => {
    if (prev == null) delete process.env[key];
    else process.env[key] = prev;
  });
}

export function patchConsole(t: TestContext) {
  const logs: string[] = [];
  const warns: string[] = [];
  const errors: string[] = [];

  const prevLog = console.log;
  const prevWarn = console.warn;
  const prevError = console.error;

  console.log = (...args: unknown[]) => {
    logs.push(args.map(String).join(" "));
  };
  console.warn = (...args: unknown[]) => {
    warns.push(args.map(String).join(" "));
  };
  console.error = (...args: unknown[]) => {
    errors.push(args.map(String).join(" "));
  };

  t.after(() => {
    console.log = prevLog;
    console.warn = prevWarn;
    console.error = prevError;
  });

  return { logs, warns, errors };
}

export type FetchHandler = (url: string, init: RequestInit | undefined) => Response | Promise<Response>;

/** Routes every `fetch` through `handler` and records the requested URLs. */
export function patchFetch(t: TestContext, handler: FetchHandler) {
  const calls: string[] = [];
  const stub = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    calls.push(url);
    return await handler(url, init);
  };
  patchGlobal(t, "fetch", stub);
  return { calls, count: (url: string) => calls.filter((c) => c === url).length };
}

/** Never settles on its own; rejects once the request's signal aborts (timeouts included). */
export function hangUntilAborted(init: RequestInit | undefined): Promise<Response> {
  return new Promise((_, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

export function textResponse(body: string, contentType: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": contentType } });
}

export function bytesResponse(bytes: Uint8Array, contentType: string): Response {
  return new Response(new Uint8Array(bytes), { status: 200, headers: { "content-type": contentType } });
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** PNG signature followed by `seed`; different seeds give different content hashes. */
export function pngBytes(seed: string): Buffer {
  return Buffer.concat([Buffer.from(PNG_SIGNATURE), Buffer.from(seed, "utf-8")]);
}

export type LogEntry = { level: "debug" | "info" | "warn" | "error"; message: string };

export type MemoryLogger = Logger & { entries: LogEntry[]; messages: (level: LogEntry["level"]) => string[] };

/** Keeps every line, debug included, in memory. Scopes prefix messages like the console logger. */
export function createMemoryLogger(entries: LogEntry[] = [], scope?: string): MemoryLogger {
  const push = (level: LogEntry["level"]) => (message: string) => {
    entries.push({ level, message: scope ? `[${scope}] ${message}` : message });
  };
  return {
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
    group: async <T>(_title: string, fn: () => Promise<T> | T): Promise<T> => await fn(),
    child: (name) => createMemoryLogger(entries, scope ? `${scope}:${name}` : name)
  };
}

export async function makeTempDir(t: TestContext, prefix = "broadsheet-test-"): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  return dir;
}

export const FAST_RETRY = { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 };

export function testConfig(overrides: Partial<ArchiveConfig> = {}): ArchiveConfig {
  return {
    title: "Daily Edition",
    outputDir: "output",
    formats: ["html"],
    embedAssets: false,
    undatedItems: "keep",
    workers: { sources: 4, items: 4, assets: 4, renders: 2 },
    retry: FAST_RETRY,
    http: {
      timeoutMs: 200,
      articleTimeoutMs: 200,
      maxArticleBytes: 1024 * 1024,
      maxImageBytes: 1024 * 1024,
      userAgent: DEFAULT_USER_AGENT
    },
    eink: { ...DEFAULT_EINK, width: 8, height: 4 },
    sources: [],
    ...overrides
  };
}

export function makeItem(overrides: Partial<Item> & Pick<Item, "id" | "sourceId">): Item {
  return {
    kind: "rss",
    title: `Item ${overrides.id}`,
    url: `https://example.com/${overrides.id.replace(/[^a-z0-9]+/gi, "-")}`,
    summary: "",
    contentHtml: "",
    images: [],
    metadata: {},
    ...overrides
  };
}

/** In-process raster engine: paints every pixel with `paint(x, y)`. */
export function fakeRasterEngine(paint: (x: number, y: number) => number = () => 255) {
  const state: { acquired: number; released: number; markup: string[] } = { acquired: 0, released: 0, markup: [] };
  const acquire = async (): Promise<RasterEngine> => {
    state.acquired += 1;
    return {
      render: async (markup, size) => {
        state.markup.push(markup);
        const pixels = new Uint8Array(size.width * size.height);
        for (let y = 0; y < size.height; y += 1) {
          for (let x = 0; x < size.width; x += 1) pixels[y * size.width + x] = paint(x, y);
        }
        return { width: size.width, height: size.height, pixels };
      },
      release: async () => {
        state.released += 1;
      }
    };
  };
  return { acquire, state };
}
