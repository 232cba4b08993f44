import type { SourceKind } from "./source-config";

export type OutputFormat = "html" | "markdown" | "gemtext" | "epub" | "eink";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["html", "markdown", "gemtext", "epub", "eink"];

export type ImageRef = {
  readonly url: string;
  readonly alt?: string;
  /** Relative to the run directory, e.g. `images/3fa2c1d09b7e4a55.png`. Unset until localized. */
  readonly localPath?: string;
  /** sha256 of the stored bytes (hex). */
  readonly hash?: string;
  readonly mimeType?: string;
};

export type MetadataValue = string | number | boolean | null;

export type Item = {
  /** `<sourceId>:<nativeId>`, unique within one edition. */
  readonly id: string;
  readonly sourceId: string;
  readonly kind: SourceKind;
  readonly title: string;
  readonly url: string;
  readonly author?: string;
  readonly publishedAt?: string;
  /** Plain text. */
  readonly summary: string;
  /** Sanitized body markup; `<img>` sources match `images`. */
  readonly contentHtml: string;
  readonly images: readonly ImageRef[];
  readonly metadata: Readonly<Record<string, MetadataValue>>;
};

export type EditionSection = {
  readonly sourceId: string;
  readonly title: string;
  readonly kind: SourceKind;
  readonly items: readonly Item[];
};

export type Edition = {
  readonly title: string;
  /** ISO timestamp of the run. */
  readonly generatedAt: string;
  /** `YYYY-MM-DD` (UTC) of the run, used in artifact names. */
  readonly date: string;
  readonly sections: readonly EditionSection[];
  readonly itemCount: number;
};

export type FetchOutcome =
  | {
      ok: true;
      sourceId: string;
      title: string;
      kind: SourceKind;
      items: Item[];
      attempts: number;
      durationMs: number;
    }
  | {
      ok: false;
      sourceId: string;
      title: string;
      kind: SourceKind;
      error: string;
      transient: boolean;
      httpStatus?: number;
      attempts: number;
      durationMs: number;
    };

export type SourceStatus = {
  id: string;
  name: string;
  kind: SourceKind;
  ok: boolean;
  skipped?: boolean;
  durationMs: number;
  itemCount: number;
  attempts: number;
  httpStatus?: number;
  error?: string;
};

export type AssetFailure = {
  itemId: string;
  url: string;
  error: string;
};

export type AssetStats = {
  downloaded: number;
  stored: number;
  reused: number;
  failed: AssetFailure[];
};

export type RenderResult =
  | { format: OutputFormat; ok: true; path: string; bytes: number; durationMs: number }
  | { format: OutputFormat; ok: false; error: string; durationMs: number };

export type RunSummary = {
  generatedAt: string;
  durationMs: number;
  outputDir: string;
  itemCount: number;
  sources: SourceStatus[];
  assets: AssetStats;
  renders: RenderResult[];
  exitCode: number;
};
