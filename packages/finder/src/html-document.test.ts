import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import { fetchDocument, isEmptyDocument, parseDocument, readDocumentFile } from "./html-document.js";
import { setLogCallback } from "./logger.js";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  setLogCallback(null);
});

function stubFetch(handler: (url: string, attempt: number) => Response | Promise<Response>) {
  let calls = 0;
  globalThis.fetch = async (input: string | URL | Request): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    calls += 1;
    return handler(url, calls);
  };
  setLogCallback(() => undefined);
  return { calls: () => calls };
}

describe("fetchDocument", () => {
  it("parses a successful HTML response", async () => {
    stubFetch(() => new Response("<html><head><title>Hello</title></head><body></body></html>", { status: 200 }));

    const $ = await fetchDocument("https://example.com/");

    assert.equal(isEmptyDocument($), false);
    assert.equal($("title").text(), "Hello");
  });

  it("returns an empty document for a 404 without retrying", async () => {
    const fetchStub = stubFetch(() => new Response("Not Found", { status: 404 }));

    const $ = await fetchDocument("https://example.com/missing", { retries: 3, retryDelayMs: 0 });

    assert.equal(isEmptyDocument($), true);
    assert.equal(fetchStub.calls(), 1);
  });

  it("retries server errors until a response succeeds", async () => {
    const fetchStub = stubFetch((_url, attempt) =>
      attempt === 1
        ? new Response("Unavailable", { status: 503 })
        : new Response("<html><head></head><body>ok</body></html>", { status: 200 })
    );

    const $ = await fetchDocument("https://example.com/", { retries: 2, retryDelayMs: 0 });

    assert.equal($("body").text(), "ok");
    assert.equal(fetchStub.calls(), 2);
  });

  it("retries dropped connections until attempts run out", async () => {
    const fetchStub = stubFetch(() => {
      throw new TypeError("fetch failed", { cause: Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" }) });
    });

    const $ = await fetchDocument("https://example.com/", { retries: 2, retryDelayMs: 0 });

    assert.equal(isEmptyDocument($), true);
    assert.equal(fetchStub.calls(), 3);
  });

  it("retries timeouts", async () => {
    const fetchStub = stubFetch((_url, attempt) => {
      if (attempt === 1) {
        throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
      }
      return new Response("<html><head></head><body>late</body></html>", { status: 200 });
    });

    const $ = await fetchDocument("https://example.com/", { retries: 1, retryDelayMs: 0 });

    assert.equal($("body").text(), "late");
    assert.equal(fetchStub.calls(), 2);
  });

  it("gives up after one attempt on errors that will not go away", async () => {
    const fetchStub = stubFetch(() => {
      throw new TypeError("fetch failed", { cause: new Error("unknown scheme") });
    });

    const $ = await fetchDocument("https://example.com/", { retries: 2, retryDelayMs: 0 });

    assert.equal(isEmptyDocument($), true);
    assert.equal(fetchStub.calls(), 1);
  });

  it("makes no request for a URL without a host", async () => {
    const fetchStub = stubFetch(() => new Response("<html></html>", { status: 200 }));

    assert.equal(isEmptyDocument(await fetchDocument("://")), true);
    assert.equal(isEmptyDocument(await fetchDocument("file:///tmp/index.html")), true);
    assert.equal(fetchStub.calls(), 0);
  });

  it("cancels the bodies of responses it retries past", async () => {
    const retried: Response[] = [];
    stubFetch((_url, attempt) => {
      if (attempt < 3) {
        const res = new Response("Unavailable", { status: 503 });
        retried.push(res);
        return res;
      }
      return new Response("<html><head></head><body>ok</body></html>", { status: 200 });
    });

    const $ = await fetchDocument("https://example.com/", { retries: 2, retryDelayMs: 0 });

    assert.equal($("body").text(), "ok");
    assert.deepEqual(
      retried.map((res) => res.bodyUsed),
      [true, true]
    );
  });

  it("treats an empty body as an empty document", async () => {
    stubFetch(() => new Response("", { status: 200 }));
    assert.equal(isEmptyDocument(await fetchDocument("https://example.com/")), true);
  });
});

describe("parseDocument", () => {
  it("wraps partial markup in a full document", () => {
    const $ = parseDocument('<link rel="icon" href="/f.png">');
    assert.equal(isEmptyDocument($), false);
    assert.equal($("html > head > link").attr("href"), "/f.png");
  });

  it("yields an empty document for whitespace", () => {
    assert.equal(isEmptyDocument(parseDocument("  \n ")), true);
  });
});

describe("readDocumentFile", () => {
  it("returns an empty document for a path that does not exist", async () => {
    setLogCallback(() => undefined);
    assert.equal(isEmptyDocument(await readDocumentFile("/nonexistent/favicon-test/index.html")), true);
    assert.equal(isEmptyDocument(await readDocumentFile("")), true);
  });
});
