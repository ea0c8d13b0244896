import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Logger } from "pino";

const mockClient = {
  messages: {
    create: vi.fn(),
  },
};

const clientOptions: Array<unknown> = [];

vi.mock("mailgun.js", () => ({
  default: vi.fn(function (_FormData: unknown) {
    return {
      client: vi.fn((options: unknown) => {
        clientOptions.push(options);
        return mockClient;
      }),
    };
  }),
}));

// Import after mocking
import { createMailgunNotifier, subjectFor } from "./mailgun";

describe("subjectFor", () => {
  it("uses the first line of the message", () => {
    expect(subjectFor("Release 2.0\nNotes\n\nLink: https://example.com/r")).toBe("Release 2.0");
  });

  it("falls back when the first line is blank", () => {
    expect(subjectFor("\nbody only")).toBe("New feed item");
    expect(subjectFor("")).toBe("New feed item");
  });

  it("shortens long first lines to 120 characters", () => {
    const subject = subjectFor("x".repeat(200));
    expect(subject).toHaveLength(120);
    expect(subject.endsWith("…")).toBe(true);
  });
});

describe("createMailgunNotifier", () => {
  let mockLogger: Logger;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      fatal: vi.fn(),
      trace: vi.fn(),
      level: "info" as const,
      child: vi.fn(),
      isLevelEnabled: vi.fn(),
    } as unknown as Logger;
    mockClient.messages.create.mockReset();
  });

  it("sends the message as plain text to the destination address", async () => {
    mockClient.messages.create.mockResolvedValue({ id: "msg-123" });
    const notifier = createMailgunNotifier(
      "test-api-key",
      "mg.example.com",
      "Feeds <feeds@example.com>",
      mockLogger,
    );

    const result = await notifier.send("reader@example.com", "Title\nBody\n\nLink: https://example.com/1");

    expect(result).toEqual({ success: true });
    expect(mockClient.messages.create).toHaveBeenCalledWith("mg.example.com", {
      from: "Feeds <feeds@example.com>",
      to: ["reader@example.com"],
      subject: "Title",
      text: "Title\nBody\n\nLink: https://example.com/1",
    });
    expect(mockLogger.debug).toHaveBeenCalledWith(
      { messageId: "msg-123", destinationId: "reader@example.com" },
      "mail delivery sent",
    );
  });

  it("returns a failure result without throwing on API errors", async () => {
    mockClient.messages.create.mockRejectedValue(new Error("Mailgun API error"));
    const notifier = createMailgunNotifier(
      "test-api-key",
      "mg.example.com",
      "feeds@example.com",
      mockLogger,
    );

    const result = await notifier.send("reader@example.com", "Title");

    expect(result).toEqual({ success: false, error: "Mailgun API error" });
    expect(mockLogger.error).toHaveBeenCalledWith(
      { destinationId: "reader@example.com", error: "Mailgun API error" },
      "mail delivery failed",
    );
  });

  it("gives up on a hung request when the signal fires", async () => {
    mockClient.messages.create.mockReturnValue(new Promise(() => undefined));
    const notifier = createMailgunNotifier(
      "test-api-key",
      "mg.example.com",
      "feeds@example.com",
      mockLogger,
    );
    const controller = new AbortController();

    const pending = notifier.send("reader@example.com", "Title", controller.signal);
    controller.abort();

    expect(await pending).toEqual({ success: false, error: "aborted" });
    expect(mockLogger.warn).toHaveBeenCalledWith(
      { destinationId: "reader@example.com" },
      "mail delivery aborted",
    );
  });

  it("does not call Mailgun when the signal has already fired", async () => {
    const notifier = createMailgunNotifier(
      "test-api-key",
      "mg.example.com",
      "feeds@example.com",
      mockLogger,
    );

    const result = await notifier.send("reader@example.com", "Title", AbortSignal.abort());

    expect(result).toEqual({ success: false, error: "aborted" });
    expect(mockClient.messages.create).not.toHaveBeenCalled();
  });

  it("passes the request timeout to the Mailgun client", () => {
    clientOptions.length = 0;

    createMailgunNotifier("test-api-key", "mg.example.com", "feeds@example.com", mockLogger, 5000);

    expect(clientOptions).toEqual([{ username: "api", key: "test-api-key", timeout: 5000 }]);
  });
});
