import type { SourceKind, UndatedItemsPolicy } from "../../src/lib/source-config";
import type { Edition, EditionSection, Item } from "../../src/lib/types";
import { toDateStamp, toIso } from "../lib/time";

export type SourceItems = {
  sourceId: string;
  title: string;
  kind: SourceKind;
  items: readonly Item[];
};

export type BuildEditionParams = {
  title: string;
  generatedAt: Date;
  /** Successful sources. Sorted by `sourceOrder` when given, otherwise taken as is. */
  sources: readonly SourceItems[];
  sourceOrder?: readonly string[];
  undatedItems: UndatedItemsPolicy;
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function copyItem(item: Item): Item {
  return { ...item, images: item.images.map((ref) => ({ ...ref })), metadata: { ...item.metadata } };
}

function applyUndatedPolicy(items: Item[], policy: UndatedItemsPolicy): Item[] {
  if (policy === "keep") return items;
  return [...items.filter((it) => it.publishedAt), ...items.filter((it) => !it.publishedAt)];
}

/**
 * Groups items into one section per source, keeps each source's item order, drops repeated item
 * ids (first wins) and freezes the result. Inputs are copied, never frozen in place.
 */
export function buildEdition(params: BuildEditionParams): Edition {
  const order = params.sourceOrder;
  const rank = (id: string) => {
    const i = order ? order.indexOf(id) : -1;
    return i < 0 ? Number.MAX_SAFE_INTEGER : i;
  };
  const sources = order
    ? params.sources
        .map((s, i) => ({ s, i }))
        .sort((a, b) => rank(a.s.sourceId) - rank(b.s.sourceId) || a.i - b.i)
        .map(({ s }) => s)
    : params.sources;

  const seen = new Set<string>();
  const sections: EditionSection[] = sources.map((source) => {
    const unique = source.items.filter((item) => {
      if (seen.has(item.id)) return false;
      seen.add(item.id);
      return true;
    });
    return {
      sourceId: source.sourceId,
      title: source.title,
      kind: source.kind,
      items: applyUndatedPolicy(unique.map(copyItem), params.undatedItems)
    };
  });

  return deepFreeze({
    title: params.title,
    generatedAt: toIso(params.generatedAt),
    date: toDateStamp(params.generatedAt),
    sections,
    itemCount: sections.reduce((sum, s) => sum + s.items.length, 0)
  });
}
