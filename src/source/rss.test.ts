import { describe, it, expect, afterEach, vi } from "vitest";
import pino from "pino";
import { createRssFeedSource, parseDate } from "./rss";

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example News</title>
    <link>https://example.com/</link>
    <description>Example</description>
    <lastBuildDate>Tue, 03 Feb 2026 10:00:00 GMT</lastBuildDate>
    <item>
      <title>Second story</title>
      <link>https://example.com/2</link>
      <description>Second body</description>
      <pubDate>Mon, 02 Feb 2026 09:00:00 GMT</pubDate>
    </item>
    <item>
      <title>First story</title>
      <link>https://example.com/1</link>
      <description>First body</description>
      <pubDate>Sun, 01 Feb 2026 09:00:00 GMT</pubDate>
    </item>
    <item>
      <title>Undated story</title>
      <link>https://example.com/3</link>
      <description>Undated body</description>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example Atom</title>
  <link href="https://example.org/"/>
  <updated>2026-02-05T12:00:00Z</updated>
  <id>urn:example:feed</id>
  <entry>
    <title>Atom entry</title>
    <link href="https://example.org/entry"/>
    <id>urn:example:entry</id>
    <updated>2026-02-04T12:00:00Z</updated>
    <summary>Entry summary</summary>
  </entry>
</feed>`;

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async () => {
    if (response instanceof Error) throw response;
    return response;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("createRssFeedSource", () => {
  const logger = pino({ level: "silent" });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("parses an RSS document with its build date and item dates", async () => {
    stubFetch(new Response(RSS, { status: 200 }));
    const source = createRssFeedSource({ timeoutMs: 5000, logger });

    const result = await source.fetch("https://example.com/rss");

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.document.title).toBe("Example News");
    expect(result.document.updatedAt).toEqual(new Date("2026-02-03T10:00:00Z"));
    expect(result.document.items).toHaveLength(3);
    expect(result.document.items[0]).toEqual({
      title: "Second story",
      description: "Second body",
      link: "https://example.com/2",
      publishedAt: new Date("2026-02-02T09:00:00Z"),
    });
    expect(result.document.items[2]?.publishedAt).toBeNull();
  });

  it("reads the Atom feed update time", async () => {
    stubFetch(new Response(ATOM, { status: 200 }));
    const source = createRssFeedSource({ timeoutMs: 5000, logger });

    const result = await source.fetch("https://example.org/atom");

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.document.title).toBe("Example Atom");
    expect(result.document.updatedAt).toEqual(new Date("2026-02-05T12:00:00Z"));
    expect(result.document.items[0]?.link).toBe("https://example.org/entry");
    expect(result.document.items[0]?.publishedAt).toEqual(new Date("2026-02-04T12:00:00Z"));
  });

  it("passes an abort signal and user agent to fetch", async () => {
    const fetchMock = stubFetch(new Response(RSS, { status: 200 }));
    const source = createRssFeedSource({ timeoutMs: 5000, logger, userAgent: "test-agent" });

    await source.fetch("https://example.com/rss", new AbortController().signal);

    expect(fetchMock).toHaveBeenCalledWith(
      "https://example.com/rss",
      expect.objectContaining({
        signal: expect.any(AbortSignal),
        headers: expect.objectContaining({ "User-Agent": "test-agent" }),
      }),
    );
  });

  it("reports HTTP errors", async () => {
    stubFetch(new Response("gone", { status: 404, statusText: "Not Found" }));
    const source = createRssFeedSource({ timeoutMs: 5000, logger });

    expect(await source.fetch("https://example.com/rss")).toEqual({
      success: false,
      error: "HTTP 404: Not Found",
    });
  });

  it("reports network errors without throwing", async () => {
    stubFetch(new Error("getaddrinfo ENOTFOUND example.com"));
    const source = createRssFeedSource({ timeoutMs: 5000, logger });

    expect(await source.fetch("https://example.com/rss")).toEqual({
      success: false,
      error: "getaddrinfo ENOTFOUND example.com",
    });
  });

  it("reports documents that are not feeds", async () => {
    stubFetch(new Response("<html><body>hello</body></html>", { status: 200 }));
    const source = createRssFeedSource({ timeoutMs: 5000, logger });

    const result = await source.fetch("https://example.com/page");

    expect(result.success).toBe(false);
  });
});

describe("parseDate", () => {
  it("returns null for missing or unparseable values", () => {
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate("")).toBeNull();
    expect(parseDate("not a date")).toBeNull();
  });

  it("parses RFC 822 and ISO dates", () => {
    expect(parseDate("Sun, 01 Feb 2026 09:00:00 GMT")).toEqual(new Date("2026-02-01T09:00:00Z"));
    expect(parseDate(" 2026-02-01T09:00:00Z ")).toEqual(new Date("2026-02-01T09:00:00Z"));
  });
});
