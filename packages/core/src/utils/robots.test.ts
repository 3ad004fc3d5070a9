import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import { stubFetch, stubRoutes, type FetchStub } from "../../test/fetch-stub.js";
import { discoverSitemaps } from "./robots.js";

let stub: FetchStub | undefined;
afterEach(() => stub?.restore());

describe("discoverSitemaps", () => {
  it("lists robots.txt sitemaps first, then the /sitemap.xml guess", async () => {
    stub = stubRoutes({
      "https://example.com/robots.txt": () =>
        new Response(
          "User-agent: *\nDisallow: /admin\nSitemap: https://example.com/news.xml\nSitemap: https://example.com/posts.xml\n",
          { status: 200, headers: { "content-type": "text/plain" } }
        ),
    });
    const found = await discoverSitemaps("https://example.com/some/page");
    assert.deepEqual(found, [
      "https://example.com/news.xml",
      "https://example.com/posts.xml",
      "https://example.com/sitemap.xml",
    ]);
  });

  it("does not repeat /sitemap.xml when robots.txt already lists it", async () => {
    stub = stubRoutes({
      "https://example.com/robots.txt": () =>
        new Response("Sitemap: https://example.com/sitemap.xml\n", { status: 200 }),
    });
    assert.deepEqual(await discoverSitemaps("https://example.com"), ["https://example.com/sitemap.xml"]);
  });

  it("falls back to the guess when robots.txt cannot be fetched", async () => {
    stub = stubFetch(() => {
      throw new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED") });
    });
    assert.deepEqual(await discoverSitemaps("https://example.com"), ["https://example.com/sitemap.xml"]);
  });
});
