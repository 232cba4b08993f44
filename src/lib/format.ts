import type { Item } from "./types";

export function escapeXml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** `YYYY-MM-DD HH:MM UTC`; unparseable input is returned as is. */
export function formatUtc(iso: string): string {
  const time = Date.parse(iso);
  if (!Number.isFinite(time)) return iso;
  const s = new Date(time).toISOString();
  return `${s.slice(0, 10)} ${s.slice(11, 16)} UTC`;
}

export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, "");
  } catch {
    return url;
  }
}

export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "section";
}

/** Cuts at a word boundary and appends "…" when `text` is longer than `maxChars`. */
export function excerpt(text: string, maxChars: number): string {
  const compact = text.replace(/\s+/g, " ").trim();
  if (compact.length <= maxChars) return compact;
  const cut = compact.slice(0, Math.max(0, maxChars));
  const lastSpace = cut.lastIndexOf(" ");
  const head = lastSpace > maxChars * 0.6 ? cut.slice(0, lastSpace) : cut;
  return `${head.replace(/[\s,.;:!?-]+$/, "")}…`;
}

function plural(n: number, one: string, many: string): string {
  return `${n} ${n === 1 ? one : many}`;
}

/** Author, date and the well-known metadata fields, in a fixed order. */
export function bylineParts(item: Item): string[] {
  const parts: string[] = [];
  const { metadata } = item;
  if (item.author) parts.push(item.author);
  if (item.publishedAt) parts.push(formatUtc(item.publishedAt));
  if (typeof metadata.score === "number") parts.push(plural(metadata.score, "point", "points"));
  if (typeof metadata.comments === "number") parts.push(plural(metadata.comments, "comment", "comments"));
  if (typeof metadata.categoryName === "string" && metadata.categoryName) parts.push(metadata.categoryName);
  return parts;
}
