import assert from "node:assert/strict";
import { ReadableStream } from "node:stream/web";
import { afterEach, describe, it } from "node:test";
import { hangUntilAborted, stubFetch, type FetchStub } from "../../test/fetch-stub.js";
import { isBinaryContentType, parseRobotsDirectives, probeUrl } from "./indexability.js";

let stub: FetchStub | undefined;
afterEach(() => stub?.restore());

function page(head: string, headers: Record<string, string> = {}): () => Response {
  return () =>
    new Response(`<!doctype html><html><head>${head}</head><body><p>hello</p></body></html>`, {
      status: 200,
      headers: { "content-type": "text/html; charset=utf-8", ...headers },
    });
}

function serve(response: () => Response): FetchStub {
  return stubFetch(() => response());
}

describe("parseRobotsDirectives", () => {
  it("reads comma separated tokens case-insensitively", () => {
    assert.deepEqual(parseRobotsDirectives("NoIndex, nofollow"), { noindex: true, nofollow: true });
  });

  it("expands none and drops agent prefixes", () => {
    assert.deepEqual(parseRobotsDirectives("none"), { noindex: true, nofollow: true });
    assert.deepEqual(parseRobotsDirectives("googlebot: noindex"), { noindex: true });
  });

  it("accepts space separated directives", () => {
    assert.deepEqual(parseRobotsDirectives("noindex nofollow"), { noindex: true, nofollow: true });
    assert.deepEqual(parseRobotsDirectives("NOINDEX  noarchive"), { noindex: true, noarchive: true });
  });

  it("ignores unrelated directives", () => {
    assert.deepEqual(parseRobotsDirectives("max-snippet:-1, index, follow"), {});
    assert.deepEqual(parseRobotsDirectives(null), {});
  });
});

describe("isBinaryContentType", () => {
  it("recognises binary classes", () => {
    for (const ct of ["image/png", "application/pdf", "video/mp4", "audio/mpeg", "application/zip", "application/octet-stream"]) {
      assert.equal(isBinaryContentType(ct), true, ct);
    }
  });

  it("treats html, xml and missing types as parseable", () => {
    assert.equal(isBinaryContentType("text/html; charset=utf-8"), false);
    assert.equal(isBinaryContentType("application/xhtml+xml"), false);
    assert.equal(isBinaryContentType(null), false);
  });
});

describe("probeUrl", () => {
  it("matches a canonical only when it is byte-identical to the URL", async () => {
    stub = serve(page('<link rel="canonical" href="http://example.com/">'));
    const trailing = await probeUrl("http://example.com");
    assert.equal(trailing.canonical, "http://example.com/");
    assert.equal(trailing.canonicalMatch, false);
    stub.restore();

    stub = serve(page('<link rel="canonical" href="http://example.com">'));
    const exact = await probeUrl("http://example.com");
    assert.deepEqual(exact, {
      url: "http://example.com",
      finalStatus: 200,
      redirectLocation: null,
      canonical: "http://example.com",
      canonicalMatch: true,
      noindex: false,
      noindexSource: null,
      fetchError: null,
    });
  });

  it("keeps relative and scheme-different canonicals as declared", async () => {
    stub = serve(page('<link rel="canonical" href="/about">'));
    const relative = await probeUrl("https://example.com/about");
    assert.equal(relative.canonical, "/about");
    assert.equal(relative.canonicalMatch, false);
    stub.restore();

    stub = serve(page('<link rel="canonical" href="http://example.com/about">'));
    const scheme = await probeUrl("https://example.com/about");
    assert.equal(scheme.canonicalMatch, false);
  });

  it("stops at a redirect without reading the target", async () => {
    stub = serve(() => new Response(null, { status: 301, headers: { location: "http://x" } }));
    const out = await probeUrl("http://example.com/old");
    assert.deepEqual(out, {
      url: "http://example.com/old",
      finalStatus: 301,
      redirectLocation: "http://x",
      canonical: null,
      canonicalMatch: false,
      noindex: false,
      noindexSource: null,
      fetchError: null,
    });
    assert.deepEqual(stub.calls, ["http://example.com/old"]);
    assert.equal(stub.inits[0]?.redirect, "manual");
  });

  it("ignores noindex signals on redirect responses", async () => {
    stub = serve(
      () =>
        new Response('<meta name="robots" content="noindex">', {
          status: 308,
          headers: { location: "/new", "x-robots-tag": "noindex", "content-type": "text/html" },
        })
    );
    const out = await probeUrl("https://example.com/old");
    assert.equal(out.redirectLocation, "/new");
    assert.equal(out.noindex, false);
    assert.equal(out.noindexSource, null);
  });

  it("reports noindex from the X-Robots-Tag header", async () => {
    stub = serve(page("", { "x-robots-tag": "googlebot: noindex" }));
    const out = await probeUrl("https://example.com/");
    assert.equal(out.noindex, true);
    assert.equal(out.noindexSource, "Header");
  });

  it("reports noindex from a space separated X-Robots-Tag", async () => {
    stub = serve(page("", { "x-robots-tag": "noindex nofollow" }));
    const out = await probeUrl("https://example.com/");
    assert.equal(out.noindex, true);
    assert.equal(out.noindexSource, "Header");
  });

  it("reports noindex from space separated meta robots content", async () => {
    stub = serve(page('<meta name="robots" content="noindex nofollow">'));
    const out = await probeUrl("https://example.com/");
    assert.equal(out.noindex, true);
    assert.equal(out.noindexSource, "Meta");
  });

  it("reports noindex from meta robots", async () => {
    stub = serve(page('<meta name="Robots" content="NONE">'));
    const out = await probeUrl("https://example.com/");
    assert.equal(out.noindex, true);
    assert.equal(out.noindexSource, "Meta");
  });

  it("reports Both when header and meta agree", async () => {
    stub = serve(page('<meta name="robots" content="noindex, follow">', { "x-robots-tag": "noindex" }));
    const out = await probeUrl("https://example.com/");
    assert.equal(out.noindex, true);
    assert.equal(out.noindexSource, "Both");
  });

  it("leaves index pages alone", async () => {
    stub = serve(page('<meta name="robots" content="index, follow">'));
    const out = await probeUrl("https://example.com/");
    assert.equal(out.noindex, false);
    assert.equal(out.noindexSource, null);
  });

  it("only checks the header for binary content", async () => {
    stub = serve(
      () =>
        new Response('<link rel="canonical" href="https://example.com/file.pdf"><meta name="robots" content="noindex">', {
          status: 200,
          headers: { "content-type": "application/pdf", "x-robots-tag": "noindex" },
        })
    );
    const out = await probeUrl("https://example.com/file.pdf");
    assert.equal(out.noindex, true);
    assert.equal(out.noindexSource, "Header");
    assert.equal(out.canonical, null);
  });

  it("does not look past the body cap", async () => {
    const filler = `<!-- ${"x".repeat(500)} -->`;
    stub = serve(page(`${filler}<link rel="canonical" href="https://example.com/">`));
    const out = await probeUrl("https://example.com/", { maxBodyBytes: 200 });
    assert.equal(out.finalStatus, 200);
    assert.equal(out.canonical, null);
    assert.equal(out.fetchError, null);
  });

  it("reads signals from an unterminated document", async () => {
    stub = serve(
      () =>
        new Response('<html><head><meta name="robots" content="noindex"><link rel="canonical" href="https://example.com/a"', {
          status: 200,
          headers: { "content-type": "text/html" },
        })
    );
    const out = await probeUrl("https://example.com/a");
    assert.equal(out.noindex, true);
    assert.equal(out.noindexSource, "Meta");
  });

  it("reports Timeout when the server does not answer", async () => {
    stub = stubFetch(hangUntilAborted);
    const out = await probeUrl("https://example.com/slow", { timeoutMs: 20 });
    assert.equal(out.fetchError, "Timeout");
    assert.equal(out.finalStatus, null);
  });

  it("keeps the status when the body times out", async () => {
    stub = stubFetch((_url, init) => {
      const signal = init?.signal;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode("<html><head>"));
          if (signal) signal.addEventListener("abort", () => controller.error(signal.reason));
        },
      });
      return new Response(body, { status: 200, headers: { "content-type": "text/html" } });
    });
    const out = await probeUrl("https://example.com/trickle", { timeoutMs: 20 });
    assert.equal(out.fetchError, "Timeout");
    assert.equal(out.finalStatus, 200);
    assert.equal(out.canonical, null);
    assert.equal(out.noindex, false);
  });

  it("prefixes transport failures", async () => {
    stub = stubFetch(() => {
      const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:80"), { code: "ECONNREFUSED" });
      throw new TypeError("fetch failed", { cause });
    });
    const out = await probeUrl("http://127.0.0.1/");
    assert.equal(out.fetchError, "ClientError: connect ECONNREFUSED 127.0.0.1:80 (ECONNREFUSED)");
  });

  it("captures any other exception", async () => {
    stub = stubFetch(() => {
      throw new Error("boom");
    });
    const out = await probeUrl("https://example.com/");
    assert.equal(out.fetchError, "Error: boom");
  });
});
