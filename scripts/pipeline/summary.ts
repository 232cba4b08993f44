import { readFile, writeFile } from "node:fs/promises";
import type { Edition, RenderResult, RunSummary } from "../../src/lib/types";
import { pathExists } from "../lib/fs";
import { toOneLine } from "../lib/logger";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CANCELLED = 130;

/** 0 when the edition has items and at least one format was written. */
export function computeExitCode(edition: Edition, renders: readonly RenderResult[], cancelled = false): number {
  if (cancelled) return EXIT_CANCELLED;
  if (edition.itemCount > 0 && renders.some((r) => r.ok)) return EXIT_OK;
  return EXIT_FAILED;
}

export function formatMs(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) return "-";
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function cell(text: string, maxLen: number): string {
  return toOneLine(text, maxLen).replaceAll("|", "\\|");
}

export function renderSummaryMarkdown(summary: RunSummary): string {
  const active = summary.sources.filter((s) => !s.skipped);
  const okSources = active.filter((s) => s.ok).length;
  const failed = active.filter((s) => !s.ok);
  const skipped = summary.sources.filter((s) => s.skipped);
  const okRenders = summary.renders.filter((r) => r.ok).length;
  const { assets } = summary;

  const lines: string[] = [];

  lines.push(`## Broadsheet Run Summary`);
  lines.push("");
  lines.push(`- generatedAt: ${summary.generatedAt}`);
  lines.push(`- duration: ${formatMs(summary.durationMs)}`);
  lines.push(`- output: ${summary.outputDir}`);
  lines.push(`- items: ${summary.itemCount}`);
  lines.push(`- sources: ${active.length} (ok=${okSources}, err=${failed.length}, skipped=${skipped.length})`);
  lines.push(
    `- assets: downloaded=${assets.downloaded}, stored=${assets.stored}, reused=${assets.reused}, failed=${assets.failed.length}`
  );
  lines.push(`- renders: ${okRenders}/${summary.renders.length}`);
  lines.push(`- exit: ${summary.exitCode}`);
  lines.push("");

  if (failed.length) {
    lines.push(`### Failed Sources`);
    lines.push("");
    lines.push(`| Source | Kind | HTTP | Attempts | Duration | Error |`);
    lines.push(`|---|---:|---:|---:|---:|---|`);
    for (const s of failed) {
      lines.push(
        `| ${cell(s.name || s.id, 44)} | ${s.kind} | ${s.httpStatus ?? "-"} | ${s.attempts} | ${formatMs(
          s.durationMs
        )} | ${cell(s.error ?? "-", 120)} |`
      );
    }
    lines.push("");
  }

  if (summary.renders.length) {
    lines.push(`### Renders`);
    lines.push("");
    lines.push(`| Format | Status | Bytes | Duration | Output |`);
    lines.push(`|---|---|---:|---:|---|`);
    for (const r of summary.renders) {
      lines.push(
        r.ok
          ? `| ${r.format} | ok | ${r.bytes} | ${formatMs(r.durationMs)} | ${cell(r.path, 120)} |`
          : `| ${r.format} | failed | - | ${formatMs(r.durationMs)} | ${cell(r.error, 120)} |`
      );
    }
    lines.push("");
  }

  const failedImages = assets.failed.slice(0, 18);
  if (failedImages.length) {
    lines.push(`### Failed Images (top ${failedImages.length})`);
    lines.push("");
    lines.push(`| Item | URL | Error |`);
    lines.push(`|---|---|---|`);
    for (const f of failedImages) {
      lines.push(`| ${cell(f.itemId, 44)} | ${cell(f.url, 96)} | ${cell(f.error, 96)} |`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

/** Appends to the `GITHUB_STEP_SUMMARY` file; false when there is none. */
export async function appendStepSummary(
  markdown: string,
  file: string | undefined = process.env.GITHUB_STEP_SUMMARY
): Promise<boolean> {
  if (!file) return false;
  const prev = (await pathExists(file)) ? await readFile(file, "utf-8") : "";
  const next = prev ? `${prev.trimEnd()}\n\n${markdown}\n` : `${markdown}\n`;
  await writeFile(file, next, "utf-8");
  return true;
}
