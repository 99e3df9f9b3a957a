import { vi } from "vitest";

import type { SubsystemLogger } from "../logging.js";

/**
 * Logger whose methods are spies; nothing reaches stderr.
 */
export function createQuietLogger(subsystem = "test"): SubsystemLogger {
  const logger: SubsystemLogger = {
    subsystem,
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}
