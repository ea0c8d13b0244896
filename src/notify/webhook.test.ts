import { describe, it, expect, vi, afterEach } from "vitest";
import pino from "pino";
import { createWebhookNotifier } from "./webhook";

describe("createWebhookNotifier", () => {
  const logger = pino({ level: "silent" });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the destination and text as JSON", async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 204 }));
    vi.stubGlobal("fetch", fetchMock);
    const notifier = createWebhookNotifier("http://relay.test/deliver", logger);

    const result = await notifier.send("chat-42", "hello");

    expect(result).toEqual({ success: true });
    expect(fetchMock).toHaveBeenCalledWith(
      "http://relay.test/deliver",
      expect.objectContaining({
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ destinationId: "chat-42", text: "hello" }),
      }),
    );
  });

  it("reports non-2xx responses", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("nope", { status: 403, statusText: "Forbidden" })),
    );
    const notifier = createWebhookNotifier("http://relay.test/deliver", logger);

    expect(await notifier.send("chat-42", "hello")).toEqual({
      success: false,
      error: "HTTP 403: Forbidden",
    });
  });

  it("reports transport errors without throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("connect ECONNREFUSED");
      }),
    );
    const notifier = createWebhookNotifier("http://relay.test/deliver", logger);

    expect(await notifier.send("chat-42", "hello")).toEqual({
      success: false,
      error: "connect ECONNREFUSED",
    });
  });
});
