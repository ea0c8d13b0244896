import { describe, it, expect } from "vitest";
import { isFetchableUrl, normalizeFeedUrl } from "./url";

describe("normalizeFeedUrl", () => {
  it("maps http and https addresses to the same key", () => {
    expect(normalizeFeedUrl("http://example.com/rss")).toBe("example.com/rss");
    expect(normalizeFeedUrl("https://example.com/rss")).toBe("example.com/rss");
  });

  it("ignores scheme case and surrounding whitespace", () => {
    expect(normalizeFeedUrl("  HTTPS://example.com/rss\n")).toBe("example.com/rss");
  });

  it("lowercases the host but not the path", () => {
    expect(normalizeFeedUrl("HTTPS://Example.COM/Feed")).toBe("example.com/Feed");
    expect(normalizeFeedUrl("http://example.com/Feed")).toBe("example.com/Feed");
    expect(normalizeFeedUrl("https://Example.com?Format=RSS")).toBe("example.com?Format=RSS");
    expect(normalizeFeedUrl("https://Example.com")).toBe("example.com");
  });
});

describe("isFetchableUrl", () => {
  it("accepts http and https URLs", () => {
    expect(isFetchableUrl("https://example.com/rss")).toBe(true);
    expect(isFetchableUrl("http://example.com/atom.xml")).toBe(true);
  });

  it("rejects other schemes and non-URLs", () => {
    expect(isFetchableUrl("ftp://example.com/rss")).toBe(false);
    expect(isFetchableUrl("example.com/rss")).toBe(false);
    expect(isFetchableUrl("")).toBe(false);
  });
});
