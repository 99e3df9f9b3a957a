import { describe, expect, it } from "vitest";

import { createSubsystemLogger, isLogLevel } from "./logging.js";

function collect() {
  const lines: string[] = [];
  return { lines, sink: (line: string) => lines.push(line) };
}

describe("createSubsystemLogger", () => {
  it("drops lines below its level", () => {
    const { lines, sink } = collect();
    const log = createSubsystemLogger("auth", { level: "warn", sink });

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");
    log.error("shown too", { path: "token.json" });

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain("[auth]");
    expect(lines[0]).toContain("shown");
    expect(lines[1]).toContain('shown too {"path":"token.json"}');
  });

  it("passes level and sink on to children", () => {
    const { lines, sink } = collect();
    const log = createSubsystemLogger("serve:drive", { level: "error", sink });

    log.child("http").warn("hidden");
    log.child("http").error("bind failed");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[serve:drive/http]");
  });

  it("keeps loggers with different levels apart", () => {
    const { lines, sink } = collect();
    const quiet = createSubsystemLogger("a", { level: "silent", sink });
    const chatty = createSubsystemLogger("b", { level: "debug", sink });

    quiet.error("hidden");
    chatty.debug("shown");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[b]");
  });
});

describe("isLogLevel", () => {
  it("accepts the five levels only", () => {
    expect(["debug", "info", "warn", "error", "silent"].every(isLogLevel)).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});
