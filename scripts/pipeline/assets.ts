import { join } from "node:path";
import type { HttpSettings, RetryPolicy } from "../../src/lib/source-config";
import type { AssetStats, ImageRef, Item } from "../../src/lib/types";
import { imageTypeFromContentType, imageTypeFromUrl, sniffImageType } from "../../src/lib/render/image-type";
import { AssetError, errorMessage, type ImageFailure } from "../lib/errors";
import { pathExists, writeFileAtomic } from "../lib/fs";
import { rewriteImageSources } from "../lib/html";
import { httpGet, isHttpUrl, sha256 } from "../lib/http";
import type { Logger } from "../lib/logger";

export const IMAGES_DIR = "images";

/** Content-addressed image files under `<runDir>/images`. Names are `<hash16>.<ext>`. */
export type AssetStore = {
  exists: (name: string) => Promise<boolean>;
  /** Atomic; resolves to the path relative to the run directory. */
  write: (name: string, bytes: Uint8Array, signal?: AbortSignal) => Promise<string>;
  localPath: (name: string) => string;
};

export function createFileAssetStore(runDir: string): AssetStore {
  const dir = join(runDir, IMAGES_DIR);
  const localPath = (name: string) => `${IMAGES_DIR}/${name}`;
  return {
    localPath,
    exists: (name) => pathExists(join(dir, name)),
    write: async (name, bytes, signal) => {
      await writeFileAtomic(join(dir, name), bytes, signal);
      return localPath(name);
    }
  };
}

export type StoredImage = {
  localPath: string;
  hash: string;
  mimeType: string;
};

export type AssetLocalizerOptions = {
  store: AssetStore;
  http: HttpSettings;
  retry: RetryPolicy;
  signal: AbortSignal;
  log: Logger;
};

/**
 * Downloads every distinct image URL once per run. Concurrent requests for one URL share a single
 * download, failures included, and identical bytes from different URLs share one stored file.
 */
export class AssetLocalizer {
  readonly stats: AssetStats = { downloaded: 0, stored: 0, reused: 0, failed: [] };

  private readonly byUrl = new Map<string, Promise<StoredImage>>();
  private readonly byHash = new Map<string, Promise<string>>();

  constructor(private readonly options: AssetLocalizerOptions) {}

  resolve(url: string): Promise<StoredImage> {
    let pending = this.byUrl.get(url);
    if (!pending) {
      pending = this.download(url);
      this.byUrl.set(url, pending);
    }
    return pending;
  }

  /**
   * Returns `item` with every downloadable image stored locally and its references rewritten.
   * Images that failed are dropped from `images` and `contentHtml`; when all of them failed the
   * call rejects with an `AssetError` whose `stripped` item has none left.
   */
  async localize(item: Item): Promise<Item> {
    const candidates = item.images.filter((ref) => isHttpUrl(ref.url));
    if (candidates.length === 0) return item;

    const settled = await Promise.allSettled(candidates.map((ref) => this.resolve(ref.url)));
    this.options.signal.throwIfAborted();

    const resolved = new Map<string, StoredImage>();
    const failures: ImageFailure[] = [];
    settled.forEach((result, i) => {
      const { url } = candidates[i];
      if (result.status === "fulfilled") resolved.set(url, result.value);
      else failures.push({ url, error: errorMessage(result.reason) });
    });

    for (const failure of failures) {
      this.stats.failed.push({ itemId: item.id, ...failure });
      this.options.log.warn(`[ASSET:FAIL] ${item.id} ${failure.url}: ${failure.error}`);
    }

    const failedUrls = new Set(failures.map((f) => f.url));
    const images: ImageRef[] = [];
    for (const ref of item.images) {
      if (failedUrls.has(ref.url)) continue;
      const stored = resolved.get(ref.url);
      images.push(stored ? { ...ref, ...stored } : ref);
    }
    const contentHtml = rewriteImageSources(item.contentHtml, (src) =>
      failedUrls.has(src) ? undefined : (resolved.get(src)?.localPath ?? src)
    );
    const next: Item = { ...item, images, contentHtml };

    if (resolved.size === 0) {
      throw new AssetError({
        message: `all ${failures.length} image(s) failed`,
        itemId: item.id,
        failures,
        stripped: next
      });
    }
    return next;
  }

  private async download(url: string): Promise<StoredImage> {
    const { http, retry, signal, log } = this.options;
    const res = await httpGet({
      url,
      timeoutMs: http.timeoutMs,
      signal,
      accept: "image/avif,image/webp,image/png,image/jpeg,image/gif,image/svg+xml,image/*;q=0.8",
      userAgent: http.userAgent,
      maxBytes: http.maxImageBytes,
      retry: {
        ...retry,
        onRetry: ({ attempt, delayMs, error }) =>
          log.debug(`[ASSET:RETRY] ${url} attempt=${attempt + 1} wait=${delayMs}ms error=${errorMessage(error)}`)
      }
    });
    if (!res.ok) throw new AssetError({ message: res.error, url, transient: res.transient });

    const declared = res.contentType?.split(";")[0]?.trim().toLowerCase() ?? "";
    const sniffed = sniffImageType(res.body);
    if (!sniffed && !declared.startsWith("image/")) {
      throw new AssetError({ message: `not an image (${declared || "unknown content-type"})`, url });
    }
    this.stats.downloaded += 1;

    const type = sniffed ?? imageTypeFromContentType(declared) ?? imageTypeFromUrl(url);
    const ext = type?.ext ?? "bin";
    const mimeType = type?.mimeType ?? declared;
    const hash = sha256(res.body);
    const localPath = await this.store(hash, `${hash.slice(0, 16)}.${ext}`, res.body);
    log.debug(`[ASSET:OK] ${url} -> ${localPath}`);
    return { localPath, hash, mimeType };
  }

  private store(hash: string, name: string, bytes: Uint8Array): Promise<string> {
    const existing = this.byHash.get(hash);
    if (existing) {
      this.stats.reused += 1;
      return existing;
    }

    const { store, signal } = this.options;
    const pending = (async () => {
      if (await store.exists(name)) {
        this.stats.reused += 1;
        return store.localPath(name);
      }
      const path = await store.write(name, bytes, signal);
      this.stats.stored += 1;
      return path;
    })();
    this.byHash.set(hash, pending);
    return pending;
  }
}
