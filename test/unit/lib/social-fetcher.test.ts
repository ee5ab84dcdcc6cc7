/**
 * Tests for the mirror search fetcher.
 *
 * Validates mirror fallback order, HTTP error handling, timeline parsing and
 * the empty result when every mirror fails.
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import type { FetcherConfig } from "@/lib/config-schemas";
import { buildSearchUrl, MirrorSearchFetcher, parseTimelineHtml } from "@/lib/social-fetcher";
import { MemoryLogger } from "@test/helpers/test-helpers";

const config: FetcherConfig = {
  mirrors: ["https://mirror-a.test", "https://mirror-b.test/"],
  timeoutMs: 10000,
  maxEntries: 10,
  userAgent: "test-agent/1.0",
};

function item(user: string | null, content: string | null, date: string | null): string {
  return `<div class="timeline-item">
    ${user === null ? "" : `<a class="username" href="/x">${user}</a>`}
    ${date === null ? "" : `<span class="tweet-date"><a href="/x/status/1" title="${date}">1h</a></span>`}
    ${content === null ? "" : `<div class="tweet-content media-body">${content}</div>`}
  </div>`;
}

function page(...items: string[]): string {
  return `<html><body><div class="timeline">${items.join("\n")}</div></body></html>`;
}

function htmlResponse(html: string, status = 200, statusText = "OK") {
  return {
    ok: status === 200,
    status,
    statusText,
    text: () => Promise.resolve(html),
  };
}

describe("buildSearchUrl", () => {
  it("encodes the term and drops trailing slashes", () => {
    expect(buildSearchUrl("https://mirror-b.test/", "India Pakistan conflict")).toBe(
      "https://mirror-b.test/search?f=tweets&q=India%20Pakistan%20conflict",
    );
  });
});

describe("parseTimelineHtml", () => {
  it("extracts user, date and content of each entry", () => {
    const posts = parseTimelineHtml(
      page(item("@analyst", "  Calm night near the border.  ", "Mar 14, 2026 · 9:15 AM UTC")),
      { mirror: "https://mirror-a.test", maxEntries: 10 },
    );
    expect(posts).toEqual([
      {
        kind: "social",
        date: "Mar 14, 2026 · 9:15 AM UTC",
        platform: "Twitter",
        user: "@analyst",
        content: "Calm night near the border.",
        source: "Nitter scrape via https://mirror-a.test",
        synthetic: false,
      },
    ]);
  });

  it("fills in missing user and date", () => {
    const [post] = parseTimelineHtml(page(item(null, "Text only", null)), {
      mirror: "https://mirror-a.test",
      maxEntries: 10,
    });
    expect(post.user).toBe("Unknown");
    expect(post.date).toBe("");
  });

  it("skips an entry without content and reports it", () => {
    const onEntryError = vi.fn();
    const posts = parseTimelineHtml(
      page(item("@a", "first", "d1"), item("@b", null, "d2"), item("@c", "third", "d3")),
      { mirror: "https://mirror-a.test", maxEntries: 10, onEntryError },
    );
    expect(posts.map((p) => p.user)).toEqual(["@a", "@c"]);
    expect(onEntryError).toHaveBeenCalledTimes(1);
    expect(onEntryError.mock.calls[0][1]).toBe(1);
  });

  it("considers at most maxEntries timeline items", () => {
    const items = Array.from({ length: 15 }, (_, i) => item(`@u${i}`, `post ${i}`, "d"));
    const posts = parseTimelineHtml(page(...items), { mirror: "m", maxEntries: 10 });
    expect(posts).toHaveLength(10);
    expect(posts[9].content).toBe("post 9");
  });

  it("returns nothing for a page without a timeline", () => {
    expect(parseTimelineHtml("<html><body>Rate limited</body></html>", { mirror: "m", maxEntries: 10 })).toEqual([]);
  });
});

describe("MirrorSearchFetcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the first mirror's posts and sends the user agent", async () => {
    const fetchMock = vi.fn().mockResolvedValue(htmlResponse(page(item("@a", "hello", "d"))));
    vi.stubGlobal("fetch", fetchMock);
    const logger = new MemoryLogger();

    const posts = await new MirrorSearchFetcher(config, logger).search("Pakistan nuclear facility");

    expect(posts).toHaveLength(1);
    expect(posts[0].synthetic).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://mirror-a.test/search?f=tweets&q=Pakistan%20nuclear%20facility");
    expect(init.headers).toEqual({ "User-Agent": "test-agent/1.0" });
    expect(logger.messages("INFO")).toEqual([
      "[Social] Found 1 posts for 'Pakistan nuclear facility' on https://mirror-a.test",
    ]);
  });

  it("moves to the next mirror after a non-200 response", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(htmlResponse("", 503, "Service Unavailable"))
      .mockResolvedValueOnce(htmlResponse(page(item("@b", "from b", "d"))));
    vi.stubGlobal("fetch", fetchMock);
    const logger = new MemoryLogger();

    const posts = await new MirrorSearchFetcher(config, logger).search("term");

    expect(posts.map((p) => p.source)).toEqual(["Nitter scrape via https://mirror-b.test/"]);
    expect(logger.messages("ERROR")).toEqual([
      "[Social] Mirror https://mirror-a.test failed for 'term' (http_error) | HTTP 503 Service Unavailable",
    ]);
  });

  it("releases the body of a rejected response", async () => {
    const cancel = vi.fn().mockResolvedValue(undefined);
    vi.stubGlobal(
      "fetch",
      vi
        .fn()
        .mockResolvedValueOnce({ ...htmlResponse("", 429, "Too Many Requests"), body: { cancel } })
        .mockResolvedValueOnce(htmlResponse(page(item("@b", "from b", "d")))),
    );
    const logger = new MemoryLogger();

    await new MirrorSearchFetcher(config, logger).search("term");

    expect(cancel).toHaveBeenCalledTimes(1);
    expect(logger.messages("ERROR")).toEqual([
      "[Social] Mirror https://mirror-a.test failed for 'term' (rate_limit) | HTTP 429 Too Many Requests",
    ]);
  });

  it("moves on when a mirror answers with no posts", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(htmlResponse(page()))
      .mockResolvedValueOnce(htmlResponse(page(item("@b", "from b", "d"))));
    vi.stubGlobal("fetch", fetchMock);
    const logger = new MemoryLogger();

    const posts = await new MirrorSearchFetcher(config, logger).search("term");

    expect(posts).toHaveLength(1);
    expect(logger.messages("WARN")).toEqual(["[Social] No posts found for 'term' on https://mirror-a.test"]);
  });

  it("returns an empty list when every mirror fails", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } })));
    const logger = new MemoryLogger();

    const posts = await new MirrorSearchFetcher(config, logger).search("term");

    expect(posts).toEqual([]);
    expect(logger.messages("ERROR")).toHaveLength(2);
    expect(logger.messages("ERROR")[0]).toBe(
      "[Social] Mirror https://mirror-a.test failed for 'term' (network) | fetch failed ECONNREFUSED",
    );
    expect(logger.messages("WARN")).toEqual(["[Social] All mirrors failed for 'term'"]);
  });

  it("logs entries it could not parse and keeps the rest", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(htmlResponse(page(item("@a", null, "d"), item("@b", "ok", "d")))));
    const logger = new MemoryLogger();

    const posts = await new MirrorSearchFetcher(config, logger).search("term");

    expect(posts.map((p) => p.user)).toEqual(["@b"]);
    expect(logger.messages("ERROR")).toEqual([
      "[Social] Skipping unparseable entry 0 from https://mirror-a.test | timeline item has no tweet content",
    ]);
  });
});
