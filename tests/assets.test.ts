import assert from "node:assert/strict";
import test, { type TestContext } from "node:test";
import { mkdir, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { AssetError } from "../scripts/lib/errors";
import { sha256 } from "../scripts/lib/http";
import { AssetLocalizer, createFileAssetStore } from "../scripts/pipeline/assets";
import {
  FAST_RETRY,
  bytesResponse,
  createMemoryLogger,
  delay,
  hangUntilAborted,
  makeItem,
  makeTempDir,
  patchFetch,
  pngBytes,
  testConfig,
  textResponse
} from "./helpers";

async function localizer(t: TestContext, signal = new AbortController().signal) {
  const runDir = await makeTempDir(t);
  const log = createMemoryLogger();
  const assets = new AssetLocalizer({
    store: createFileAssetStore(runDir),
    http: testConfig().http,
    retry: FAST_RETRY,
    signal,
    log
  });
  return { assets, runDir, log };
}

test("AssetLocalizer: one download per URL, one file per content", async (t) => {
  const fetches = patchFetch(t, async () => {
    await delay(5);
    return bytesResponse(pngBytes("one"), "image/png");
  });
  const { assets, runDir } = await localizer(t);
  const a = "https://img.test/a.png";
  const b = "https://img.test/b.png";

  const [first, second] = await Promise.all([
    assets.localize(
      makeItem({
        id: "x:1",
        sourceId: "x",
        images: [{ url: a, alt: "A" }, { url: b }],
        contentHtml: `<p><img src="${a}" alt="A"><img src="${b}"></p>`
      })
    ),
    assets.localize(makeItem({ id: "x:2", sourceId: "x", images: [{ url: a }], contentHtml: `<img src="${a}">` }))
  ]);

  const hash = sha256(pngBytes("one"));
  const localPath = `images/${hash.slice(0, 16)}.png`;
  assert.equal(fetches.count(a), 1);
  assert.equal(fetches.count(b), 1);
  assert.deepEqual(first.images, [
    { url: a, alt: "A", localPath, hash, mimeType: "image/png" },
    { url: b, localPath, hash, mimeType: "image/png" }
  ]);
  assert.equal(first.contentHtml, `<p><img src="${localPath}" alt="A"><img src="${localPath}"></p>`);
  assert.equal(second.contentHtml, `<img src="${localPath}">`);
  assert.deepEqual(assets.stats, { downloaded: 2, stored: 1, reused: 1, failed: [] });
  assert.deepEqual(await readdir(join(runDir, "images")), [`${hash.slice(0, 16)}.png`]);
});

test("AssetLocalizer: failed images are dropped and not requested again", async (t) => {
  const ok = "https://img.test/ok.png";
  const gone = "https://img.test/gone.png";
  const fetches = patchFetch(t, (url) =>
    url === ok ? bytesResponse(pngBytes("ok"), "image/png") : textResponse("missing", "text/plain", 404)
  );
  const { assets, log } = await localizer(t);

  const kept = await assets.localize(
    makeItem({
      id: "x:1",
      sourceId: "x",
      images: [{ url: ok }, { url: gone }],
      contentHtml: `<p>Text</p><img src="${ok}"><figure><img src="${gone}"><figcaption>Lost</figcaption></figure>`
    })
  );
  const localPath = `images/${sha256(pngBytes("ok")).slice(0, 16)}.png`;
  assert.deepEqual(
    kept.images.map((i) => i.url),
    [ok]
  );
  assert.equal(kept.contentHtml, `<p>Text</p><img src="${localPath}">`);

  await assert.rejects(
    assets.localize(
      makeItem({ id: "x:2", sourceId: "x", images: [{ url: gone }], contentHtml: `<p>Only</p><img src="${gone}">` })
    ),
    (err: unknown) => {
      assert.ok(err instanceof AssetError);
      assert.equal(err.message, "all 1 image(s) failed");
      assert.deepEqual(err.failures, [{ url: gone, error: "HTTP 404" }]);
      assert.ok(err.stripped);
      assert.deepEqual(err.stripped.images, []);
      assert.equal(err.stripped.contentHtml, "<p>Only</p>");
      return true;
    }
  );

  assert.equal(fetches.count(gone), 1);
  assert.deepEqual(assets.stats.failed, [
    { itemId: "x:1", url: gone, error: "HTTP 404" },
    { itemId: "x:2", url: gone, error: "HTTP 404" }
  ]);
  assert.deepEqual(log.messages("warn"), [
    `[ASSET:FAIL] x:1 ${gone}: HTTP 404`,
    `[ASSET:FAIL] x:2 ${gone}: HTTP 404`
  ]);
});

test("AssetLocalizer: transient failures are retried", async (t) => {
  const url = "https://img.test/flaky.gif";
  let calls = 0;
  patchFetch(t, () => {
    calls += 1;
    return calls < 3 ? textResponse("busy", "text/plain", 503) : bytesResponse(Buffer.from("GIF89a-bytes"), "image/gif");
  });
  const { assets } = await localizer(t);

  const item = await assets.localize(makeItem({ id: "x:1", sourceId: "x", images: [{ url }] }));
  assert.equal(calls, 3);
  assert.equal(item.images[0]?.mimeType, "image/gif");
  assert.match(item.images[0]?.localPath ?? "", /^images\/[0-9a-f]{16}\.gif$/);
});

test("AssetLocalizer: responses that are not images fail", async (t) => {
  const url = "https://img.test/page";
  patchFetch(t, () => textResponse("<html><body>hi</body></html>", "text/html; charset=utf-8"));
  const { assets } = await localizer(t);

  await assert.rejects(assets.localize(makeItem({ id: "x:1", sourceId: "x", images: [{ url }] })), (err: unknown) => {
    assert.ok(err instanceof AssetError);
    assert.deepEqual(err.failures, [{ url, error: "not an image (text/html)" }]);
    return true;
  });
  assert.equal(assets.stats.downloaded, 0);
});

test("AssetLocalizer: declared image types without a known signature keep their mime type", async (t) => {
  const url = "https://img.test/favicon.ico";
  patchFetch(t, () => bytesResponse(Buffer.from("icon-bytes"), "image/x-icon"));
  const { assets } = await localizer(t);

  const item = await assets.localize(makeItem({ id: "x:1", sourceId: "x", images: [{ url }] }));
  const hash = sha256(Buffer.from("icon-bytes"));
  assert.deepEqual(item.images, [{ url, localPath: `images/${hash.slice(0, 16)}.bin`, hash, mimeType: "image/x-icon" }]);
});

test("AssetLocalizer: files already on disk are reused", async (t) => {
  const url = "https://img.test/a.png";
  patchFetch(t, () => bytesResponse(pngBytes("disk"), "image/png"));
  const { assets, runDir } = await localizer(t);
  const name = `${sha256(pngBytes("disk")).slice(0, 16)}.png`;
  await mkdir(join(runDir, "images"), { recursive: true });
  await writeFile(join(runDir, "images", name), pngBytes("disk"));

  const item = await assets.localize(makeItem({ id: "x:1", sourceId: "x", images: [{ url }] }));
  assert.equal(item.images[0]?.localPath, `images/${name}`);
  assert.deepEqual(assets.stats, { downloaded: 1, stored: 0, reused: 1, failed: [] });
});

test("AssetLocalizer: items without remote images are returned as is", async (t) => {
  const fetches = patchFetch(t, () => textResponse("unexpected", "text/plain", 500));
  const { assets } = await localizer(t);
  const item = makeItem({
    id: "x:1",
    sourceId: "x",
    images: [{ url: "images/local.png" }],
    contentHtml: '<img src="images/local.png">'
  });

  assert.equal(await assets.localize(item), item);
  assert.equal(fetches.calls.length, 0);
});

test("AssetLocalizer: cancellation rejects instead of dropping images", async (t) => {
  patchFetch(t, (_url, init) => hangUntilAborted(init));
  const controller = new AbortController();
  const { assets } = await localizer(t, controller.signal);

  const pending = assets.localize(makeItem({ id: "x:1", sourceId: "x", images: [{ url: "https://img.test/a.png" }] }));
  await delay(5);
  controller.abort();
  await assert.rejects(pending, { name: "AbortError" });
  assert.deepEqual(assets.stats.failed, []);
});
