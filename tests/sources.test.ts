import assert from "node:assert/strict";
import test from "node:test";
import { SourceFetchError } from "../scripts/lib/errors";
import { sha1 } from "../scripts/lib/http";
import { hackerNewsAdapter } from "../scripts/sources/hackernews";
import { buildEdition } from "../scripts/pipeline/edition";
import { kagiNewsAdapter } from "../scripts/sources/kaginews";
import { rssAdapter } from "../scripts/sources/rss";
import type { SourceContext } from "../scripts/sources/types";
import type {
  HackerNewsSourceConfig,
  KagiNewsSourceConfig,
  RssSourceConfig
} from "../src/lib/source-config";
import { FAST_RETRY, createMemoryLogger, jsonResponse, patchFetch, testConfig, textResponse } from "./helpers";

function sourceContext(concurrency = 2) {
  const log = createMemoryLogger();
  const ctx: SourceContext = {
    signal: new AbortController().signal,
    log,
    http: testConfig().http,
    retry: FAST_RETRY,
    concurrency
  };
  return { ctx, log };
}

const HN: HackerNewsSourceConfig = {
  id: "hn",
  kind: "hackernews",
  title: "Hacker News",
  enabled: true,
  apiBase: "https://hn.test/v0",
  itemsApiBase: "https://algolia.test/api/v1",
  topStories: 3,
  includeComments: true,
  includeArticleContent: false,
  maxCommentDepth: 3,
  maxCommentsPerLevel: 10
};

const HN_STORIES: Record<string, unknown> = {
  "101": {
    id: 101,
    type: "story",
    title: "Show HN: Thing",
    url: "https://thing.example/post",
    author: "pg",
    points: 42,
    num_comments: 3,
    created_at_i: 1700000000,
    children: [
      {
        type: "comment",
        author: "alice",
        text: "<p>Nice</p>",
        created_at_i: 1700000100,
        children: [{ type: "comment", author: "bob", text: "Agreed", children: [] }]
      },
      { type: "comment", author: "carol", text: null, children: [] }
    ]
  },
  "102": { id: 102, type: "job", title: "Hiring" },
  "103": {
    id: 103,
    type: "story",
    title: "Ask HN: Question?",
    text: "Question <i>body</i>",
    author: "dang",
    points: 5,
    created_at: "2023-11-15T00:00:00.000Z",
    children: []
  }
};

test("hackernews: top stories with trimmed comment trees", async (t) => {
  const fetches = patchFetch(t, (url) => {
    if (url === "https://hn.test/v0/topstories.json") return jsonResponse([101, 102, 103, 104]);
    const id = url.split("/").pop() ?? "";
    const story = HN_STORIES[id];
    return story ? jsonResponse(story) : jsonResponse({ error: "not found" }, 404);
  });
  const { ctx } = sourceContext();

  const items = await hackerNewsAdapter.fetch(HN, ctx);

  assert.deepEqual(items, [
    {
      id: "hn:101",
      sourceId: "hn",
      kind: "hackernews",
      title: "Show HN: Thing",
      url: "https://thing.example/post",
      author: "pg",
      publishedAt: "2023-11-14T22:13:20.000Z",
      summary: "",
      contentHtml:
        "<section><h3>Comments</h3><blockquote><p><strong>alice</strong></p><p>Nice</p>" +
        "<blockquote><p><strong>bob</strong></p>Agreed</blockquote></blockquote></section>",
      images: [],
      metadata: { hnId: 101, score: 42, comments: 3, discussionUrl: "https://news.ycombinator.com/item?id=101" }
    },
    {
      id: "hn:103",
      sourceId: "hn",
      kind: "hackernews",
      title: "Ask HN: Question?",
      url: "https://news.ycombinator.com/item?id=103",
      author: "dang",
      publishedAt: "2023-11-15T00:00:00.000Z",
      summary: "Question body",
      contentHtml: "Question <i>body</i>",
      images: [],
      metadata: { hnId: 103, score: 5, comments: 0, discussionUrl: "https://news.ycombinator.com/item?id=103" }
    }
  ]);
  assert.equal(fetches.count("https://algolia.test/api/v1/items/104"), 0);
});

test("hackernews: one failed story is skipped, the rest survive", async (t) => {
  const fetches = patchFetch(t, (url) => {
    if (url.endsWith("/topstories.json")) return jsonResponse([101, 2]);
    if (url.endsWith("/items/2")) return textResponse("oops", "text/plain", 500);
    return jsonResponse(HN_STORIES["101"]);
  });
  const { ctx, log } = sourceContext();

  const items = await hackerNewsAdapter.fetch({ ...HN, includeComments: false }, ctx);

  assert.deepEqual(
    items.map((i) => [i.id, i.contentHtml]),
    [["hn:101", ""]]
  );
  assert.equal(fetches.count("https://algolia.test/api/v1/items/2"), 3);
  assert.deepEqual(log.messages("warn"), ["[ITEM:FAIL] story 2: https://algolia.test/api/v1/items/2: HTTP 500"]);
});

test("hackernews: every story failing fails the source", async (t) => {
  patchFetch(t, (url) =>
    url.endsWith("/topstories.json") ? jsonResponse([1, 2]) : jsonResponse({ error: "gone" }, 404)
  );
  const { ctx } = sourceContext(1);

  await assert.rejects(hackerNewsAdapter.fetch(HN, ctx), (err: unknown) => {
    assert.ok(err instanceof SourceFetchError);
    assert.equal(err.message, "every story request failed (https://algolia.test/api/v1/items/1: HTTP 404)");
    assert.equal(err.transient, false);
    assert.equal(err.httpStatus, 404);
    return true;
  });
});

test("hackernews: the top-story list is requested once", async (t) => {
  const fetches = patchFetch(t, () => textResponse("busy", "text/plain", 503));
  const { ctx } = sourceContext();

  await assert.rejects(hackerNewsAdapter.fetch(HN, ctx), (err: unknown) => {
    assert.ok(err instanceof SourceFetchError);
    assert.equal(err.message, "https://hn.test/v0/topstories.json: HTTP 503");
    assert.equal(err.transient, true);
    assert.equal(err.httpStatus, 503);
    return true;
  });
  assert.equal(fetches.calls.length, 1);
});

const KAGI: KagiNewsSourceConfig = {
  id: "kagi",
  kind: "kaginews",
  title: "Kagi News",
  enabled: true,
  apiBase: "https://kagi.test",
  categories: ["world", "sports", "tech"],
  language: "en",
  maxStoriesPerCategory: 5
};

const KAGI_STORY = {
  id: "c-1",
  title: "Summit ends",
  emoji: "🌍",
  short_summary: "Leaders met and agreed [reuters.com#1].",
  unique_domains: 2,
  articles: [
    { title: "Reuters report", link: "https://reuters.com/a", domain: "reuters.com", date: "2026-10-18T10:00:00Z" },
    { title: "AP story", link: "https://apnews.com/b", domain: "apnews.com", date: "2026-10-18T08:00:00Z" }
  ],
  talking_points: ["Deal signed [apnews.com#1]"]
};

test("kaginews: stories per category with inline citations", async (t) => {
  const fetches = patchFetch(t, (url) => {
    switch (url) {
      case "https://kagi.test/api/batches?lang=en":
        return jsonResponse({ batches: [{ id: "b1" }, { id: "b0" }] });
      case "https://kagi.test/api/batches/b1/categories?lang=en":
        return jsonResponse({
          categories: [
            { categoryId: "world", id: "uuid-world", categoryName: "World" },
            { categoryId: "tech", id: "uuid-tech" }
          ]
        });
      case "https://kagi.test/api/batches/b1/categories/uuid-world/stories?lang=en&limit=5":
        return jsonResponse({ stories: [KAGI_STORY, { id: "c-2" }] });
      default:
        return textResponse("down", "text/plain", 500);
    }
  });
  const { ctx, log } = sourceContext();

  const items = await kagiNewsAdapter.fetch(KAGI, ctx);

  assert.deepEqual(items, [
    {
      id: "kagi:c-1",
      sourceId: "kagi",
      kind: "kaginews",
      title: "Summit ends",
      url: "https://reuters.com/a",
      publishedAt: "2026-10-18T08:00:00.000Z",
      summary: "Leaders met and agreed .",
      contentHtml: [
        '<p>Leaders met and agreed <sup><a href="https://reuters.com/a" title="Reuters report">1</a></sup>.</p>',
        "<h3>Sources</h3>",
        '<ol><li><a href="https://reuters.com/a">Reuters report</a> (reuters.com)</li>' +
          '<li><a href="https://apnews.com/b">AP story</a> (apnews.com)</li></ol>',
        "<h3>Highlights</h3>",
        '<ol><li>Deal signed <sup><a href="https://apnews.com/b" title="AP story">2</a></sup></li></ol>'
      ].join("\n"),
      images: [],
      metadata: { clusterId: "c-1", category: "world", categoryName: "World", emoji: "🌍", uniqueDomains: 2 }
    }
  ]);
  assert.deepEqual(log.messages("warn"), [
    '[CATEGORY:SKIP] unknown category "sports"',
    "[ITEM:SKIP] world#1: story without title",
    "[CATEGORY:FAIL] tech: https://kagi.test/api/batches/b1/categories/uuid-tech/stories?lang=en&limit=5: HTTP 500"
  ]);
  assert.equal(fetches.count("https://kagi.test/api/batches/b1/categories/uuid-tech/stories?lang=en&limit=5"), 3);
});

test("kaginews: stories without an id stay distinct across categories", async (t) => {
  patchFetch(t, (url) => {
    switch (url) {
      case "https://kagi.test/api/batches?lang=en":
        return jsonResponse({ batches: [{ id: "b1" }] });
      case "https://kagi.test/api/batches/b1/categories?lang=en":
        return jsonResponse({
          categories: [
            { categoryId: "world", id: "uuid-world" },
            { categoryId: "tech", id: "uuid-tech" }
          ]
        });
      case "https://kagi.test/api/batches/b1/categories/uuid-world/stories?lang=en&limit=5":
        return jsonResponse({ stories: [{ title: "World lead", cluster_number: 1 }] });
      case "https://kagi.test/api/batches/b1/categories/uuid-tech/stories?lang=en&limit=5":
        return jsonResponse({ stories: [{ title: "Tech lead", cluster_number: 1 }, { title: "Tech second" }] });
      default:
        return textResponse("down", "text/plain", 500);
    }
  });
  const { ctx } = sourceContext();

  const items = await kagiNewsAdapter.fetch({ ...KAGI, categories: ["world", "tech"] }, ctx);

  assert.deepEqual(
    items.map((i) => [i.id, i.metadata.clusterId]),
    [
      ["kagi:world-1", "1"],
      ["kagi:tech-1", "1"],
      ["kagi:tech#1", ""]
    ]
  );

  const edition = buildEdition({
    title: "Daily Edition",
    generatedAt: new Date("2026-10-19T06:05:00.000Z"),
    sources: [{ sourceId: "kagi", title: "Kagi News", kind: "kaginews", items }],
    undatedItems: "keep"
  });
  assert.equal(edition.itemCount, 3);
});

test("kaginews: no batch is a permanent failure", async (t) => {
  patchFetch(t, () => jsonResponse({ batches: [] }));
  const { ctx } = sourceContext();

  await assert.rejects(kagiNewsAdapter.fetch(KAGI, ctx), (err: unknown) => {
    assert.ok(err instanceof SourceFetchError);
    assert.equal(err.message, "no batches available");
    assert.equal(err.transient, false);
    return true;
  });
});

const RSS: RssSourceConfig = {
  id: "lwn",
  kind: "rss",
  title: "lwn",
  enabled: true,
  url: "https://feeds.test/lwn.xml",
  maxArticles: 10,
  includeArticleContent: false
};

const FEED = `<?xml version="1.0"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:content="http://purl.org/rss/1.0/modules/content/" xmlns:media="http://search.yahoo.com/mrss/">
<channel><title>Example Feed</title>
<item><title>First &amp; foremost</title><link>https://example.com/1</link><guid isPermaLink="false">id-1</guid><dc:creator>Jane Doe</dc:creator><pubDate>Mon, 15 Dec 2025 12:34:56 +0000</pubDate><description><![CDATA[<p>Summary one</p>]]></description><content:encoded><![CDATA[<p>Body one</p>]]></content:encoded><media:content url="https://example.com/1.jpg" medium="image"/></item>
<item><title>Relative</title><link>/posts/2</link><guid>post-2</guid></item>
<item><link>https://example.com/3</link></item>
</channel></rss>`;

test("rss: entries become items with their image up front", async (t) => {
  const fetches = patchFetch(t, () => textResponse(FEED, "application/rss+xml"));
  const { ctx, log } = sourceContext();

  const items = await rssAdapter.fetch(RSS, ctx);

  assert.deepEqual(items, [
    {
      id: `lwn:${sha1("id-1").slice(0, 16)}`,
      sourceId: "lwn",
      kind: "rss",
      title: "First & foremost",
      url: "https://example.com/1",
      author: "Jane Doe",
      publishedAt: "2025-12-15T12:34:56.000Z",
      summary: "Summary one",
      contentHtml: '<figure><img src="https://example.com/1.jpg" alt="First &amp; foremost"></figure>\n<p>Body one</p>',
      images: [{ url: "https://example.com/1.jpg", alt: "First & foremost" }],
      metadata: { feedUrl: "https://feeds.test/lwn.xml", entryId: "id-1" }
    },
    {
      id: `lwn:${sha1("post-2").slice(0, 16)}`,
      sourceId: "lwn",
      kind: "rss",
      title: "Relative",
      url: "https://feeds.test/posts/2",
      summary: "",
      contentHtml: "",
      images: [],
      metadata: { feedUrl: "https://feeds.test/lwn.xml", entryId: "post-2" }
    }
  ]);
  assert.deepEqual(log.messages("warn"), ["[ITEM:SKIP] entry #2 without title"]);
  assert.equal(fetches.calls.length, 1);
});

test("rss: maxArticles keeps the first entries", async (t) => {
  patchFetch(t, () => textResponse(FEED, "application/rss+xml"));
  const { ctx } = sourceContext();

  const items = await rssAdapter.fetch({ ...RSS, maxArticles: 1 }, ctx);
  assert.deepEqual(
    items.map((i) => i.title),
    ["First & foremost"]
  );
});

test("rss: linked pages replace the feed body, failures fall back to it", async (t) => {
  const paragraph = (n: number) =>
    `Paragraph ${n} of the full article keeps going with enough ordinary words to look like real prose, ` +
    `covering the topic in some depth so that the page reads as an article rather than navigation.`;
  const page = `<!doctype html><html><head><title>First</title></head><body>
<nav><a href="/">Home</a></nav>
<article><h1>First</h1><p>${paragraph(1)}</p><p>${paragraph(2)}</p><p>${paragraph(3)}</p><p>${paragraph(4)}</p></article>
<script>evil()</script>
</body></html>`;
  patchFetch(t, (url) => {
    if (url === RSS.url) return textResponse(FEED, "application/rss+xml");
    if (url === "https://example.com/1") return textResponse(page, "text/html; charset=utf-8");
    return textResponse("missing", "text/plain", 404);
  });
  const { ctx } = sourceContext();

  const [first, second] = await rssAdapter.fetch({ ...RSS, includeArticleContent: true }, ctx);

  assert.ok(first.contentHtml.includes(paragraph(1)));
  assert.ok(first.contentHtml.includes(paragraph(4)));
  assert.equal(first.contentHtml.includes("evil()"), false);
  assert.equal(first.summary, "Summary one");
  assert.equal(second.contentHtml, "");
});

test("rss: the feed is requested once and must be a feed", async (t) => {
  const fetches = patchFetch(t, (url) =>
    url.endsWith("/busy.xml")
      ? textResponse("busy", "text/plain", 503)
      : textResponse("<html><body>hello</body></html>", "text/html")
  );
  const { ctx } = sourceContext();

  await assert.rejects(rssAdapter.fetch({ ...RSS, url: "https://feeds.test/busy.xml" }, ctx), (err: unknown) => {
    assert.ok(err instanceof SourceFetchError);
    assert.equal(err.message, "https://feeds.test/busy.xml: HTTP 503");
    assert.equal(err.transient, true);
    return true;
  });
  assert.equal(fetches.count("https://feeds.test/busy.xml"), 1);

  await assert.rejects(rssAdapter.fetch(RSS, ctx), (err: unknown) => {
    assert.ok(err instanceof SourceFetchError);
    assert.equal(err.message, "not an RSS, Atom or RDF document");
    assert.equal(err.transient, false);
    return true;
  });
});
