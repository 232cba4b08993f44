import type { EinkSettings } from "../source-config";
import type { Edition, OutputFormat } from "../types";

/** Grayscale pixels, one byte per pixel, row-major. */
export type GrayImage = {
  width: number;
  height: number;
  pixels: Uint8Array;
};

export type RasterEngine = {
  render: (markup: string, size: { width: number; height: number }, signal?: AbortSignal) => Promise<GrayImage>;
  release: () => Promise<void>;
};

export type RenderContext = {
  embedAssets: boolean;
  eink: EinkSettings;
  signal?: AbortSignal;
  /** Bytes of a localized image (`images/…`), or `null` when it is missing. */
  readAsset: (localPath: string) => Promise<Uint8Array | null>;
  /** Rejects when no engine is available on this machine. */
  acquireRasterEngine: () => Promise<RasterEngine>;
};

export type Renderer = {
  format: OutputFormat;
  extension: string;
  /** Same edition, same bytes. Never mutates the edition. */
  render: (edition: Edition, ctx: RenderContext) => Promise<string | Uint8Array>;
};

export function artifactName(date: string, extension: string): string {
  return `edition-${date}.${extension}`;
}
