import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { MockInstance } from "vitest";
import pino from "pino";
import { createShutdown, registerShutdownHandlers } from "./lifecycle";
import type { ShutdownDeps } from "./lifecycle";

describe("createShutdown", () => {
  let calls: Array<string>;
  let exitSpy: MockInstance<typeof process.exit>;

  const deps = (overrides: Partial<ShutdownDeps> = {}): ShutdownDeps => ({
    schedulers: [
      { stop: () => calls.push("scheduler 1") },
      { stop: () => calls.push("scheduler 2") },
    ],
    closeServer: () => calls.push("server"),
    closeDb: () => calls.push("db"),
    logger: pino({ level: "silent" }),
    ...overrides,
  });

  beforeEach(() => {
    calls = [];
    exitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stops schedulers, then the server, then the database, and exits 0", () => {
    const shutdown = createShutdown(deps());

    expect(() => shutdown("SIGTERM")).toThrow("process.exit called");

    expect(calls).toEqual(["scheduler 1", "scheduler 2", "server", "db"]);
    expect(exitSpy).toHaveBeenCalledWith(0);
  });

  it("runs later steps when an earlier one throws", () => {
    const logger = pino({ level: "silent" });
    const errorSpy = vi.spyOn(logger, "error");
    const shutdown = createShutdown(
      deps({
        logger,
        closeServer: () => {
          throw new Error("server already closed");
        },
      }),
    );

    expect(() => shutdown("SIGINT")).toThrow("process.exit called");

    expect(calls).toEqual(["scheduler 1", "scheduler 2", "db"]);
    expect(errorSpy).toHaveBeenCalledWith(
      { step: "close api server", error: "server already closed" },
      "shutdown step failed",
    );
  });

  it("ignores a second signal", () => {
    const shutdown = createShutdown(deps());

    expect(() => shutdown("SIGTERM")).toThrow("process.exit called");
    shutdown("SIGINT");

    expect(calls).toEqual(["scheduler 1", "scheduler 2", "server", "db"]);
    expect(exitSpy).toHaveBeenCalledTimes(1);
  });
});

describe("registerShutdownHandlers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers SIGTERM and SIGINT handlers on process", () => {
    const onSpy = vi.spyOn(process, "on").mockImplementation(() => process);

    registerShutdownHandlers({
      schedulers: [],
      closeServer: vi.fn(),
      closeDb: vi.fn(),
      logger: pino({ level: "silent" }),
    });

    expect(onSpy).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
    expect(onSpy).toHaveBeenCalledWith("SIGINT", expect.any(Function));
  });
});
