import { EventEmitter } from "node:events";

import { describe, expect, it, vi } from "vitest";

import { createQuietLogger } from "../testing/logger.js";
import { createLifecycle } from "./lifecycle.js";

describe("createLifecycle", () => {
  it("closes resources in reverse order exactly once", async () => {
    const order: string[] = [];
    const lifecycle = createLifecycle({ logger: createQuietLogger() });
    lifecycle.defer("context", () => {
      order.push("context");
    });
    lifecycle.defer("transport", async () => {
      order.push("transport");
    });

    await Promise.all([lifecycle.shutdown("test"), lifecycle.shutdown("again")]);
    await lifecycle.shutdown("later");

    expect(order).toEqual(["transport", "context"]);
  });

  it("keeps closing after a closer fails", async () => {
    const logger = createQuietLogger();
    const closed = vi.fn();
    const lifecycle = createLifecycle({ logger });
    lifecycle.defer("first", closed);
    lifecycle.defer("second", () => {
      throw new Error("boom");
    });

    await lifecycle.shutdown("test");

    expect(closed).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith("Failed to close second: boom");
  });

  it("exits with 0 after a termination signal", async () => {
    const exit = vi.fn();
    const closed = vi.fn();
    const lifecycle = createLifecycle({ logger: createQuietLogger(), exit });
    lifecycle.defer("server", closed);
    const events = new EventEmitter();
    lifecycle.installProcessHandlers(events);

    events.emit("SIGTERM", "SIGTERM");

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
    expect(closed).toHaveBeenCalledTimes(1);
  });

  it("exits with 1 after an uncaught exception", async () => {
    const exit = vi.fn();
    const logger = createQuietLogger();
    const lifecycle = createLifecycle({ logger, exit });
    const events = new EventEmitter();
    lifecycle.installProcessHandlers(events);

    events.emit("uncaughtException", new Error("kaboom"));

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(1));
    expect(logger.error).toHaveBeenCalledWith("Uncaught error: kaboom");
  });

  it("removes its handlers", () => {
    const events = new EventEmitter();
    const lifecycle = createLifecycle({ logger: createQuietLogger(), exit: vi.fn() });
    const remove = lifecycle.installProcessHandlers(events);
    expect(events.listenerCount("SIGINT")).toBe(1);
    expect(events.listenerCount("unhandledRejection")).toBe(1);
    remove();
    expect(events.eventNames()).toEqual([]);
  });
});
