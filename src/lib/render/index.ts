import type { OutputFormat } from "../types";
import { einkRenderer } from "./eink";
import { epubRenderer } from "./epub";
import { gemtextRenderer } from "./gemtext";
import { htmlRenderer } from "./html";
import { markdownRenderer } from "./markdown";
import type { Renderer } from "./types";

export const RENDERERS: Record<OutputFormat, Renderer> = {
  html: htmlRenderer,
  markdown: markdownRenderer,
  gemtext: gemtextRenderer,
  epub: epubRenderer,
  eink: einkRenderer
};

export { artifactName } from "./types";
export type { GrayImage, RasterEngine, RenderContext, Renderer } from "./types";
