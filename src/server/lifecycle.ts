/**
 * Scoped startup/teardown. Resources register a closer as they come up;
 * shutdown runs the closers in reverse order exactly once, whether it was
 * triggered by a signal, an uncaught error or the caller.
 */

import { formatErrorMessage } from "../google/errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";
import { defaultRuntime } from "../runtime.js";

type Closer = {
  name: string;
  close: () => void | Promise<void>;
};

export type LifecycleOptions = {
  logger?: SubsystemLogger;
  exit?: (code: number) => void;
};

const SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

type ProcessEvents = Pick<NodeJS.EventEmitter, "on" | "off">;

export function createLifecycle(options: LifecycleOptions = {}) {
  const log = options.logger ?? createSubsystemLogger("lifecycle");
  const exit = options.exit ?? defaultRuntime.exit;
  const closers: Closer[] = [];
  let stopping: Promise<void> | undefined;

  async function runClosers(reason: string): Promise<void> {
    log.info(`Shutting down (${reason})`);
    for (const closer of [...closers].reverse()) {
      try {
        await closer.close();
        log.debug(`Closed ${closer.name}`);
      } catch (err) {
        log.error(`Failed to close ${closer.name}: ${formatErrorMessage(err)}`);
      }
    }
  }

  function shutdown(reason: string): Promise<void> {
    stopping ??= runClosers(reason);
    return stopping;
  }

  function exitAfterShutdown(reason: string, code: number): void {
    shutdown(reason)
      .catch((err: unknown) => {
        log.error(`Shutdown failed: ${formatErrorMessage(err)}`);
      })
      .finally(() => exit(code));
  }

  return {
    defer(name: string, close: Closer["close"]): void {
      closers.push({ name, close });
    },

    shutdown,

    /** Shut down, then exit the process with `code`. */
    exitAfterShutdown,

    /**
     * Route SIGINT/SIGTERM and uncaught errors through shutdown, then exit.
     * Returns a function removing the handlers.
     */
    installProcessHandlers(target: ProcessEvents = process): () => void {
      const onSignal = (signal: NodeJS.Signals) => exitAfterShutdown(signal, 0);
      const onError = (err: unknown) => {
        log.error(`Uncaught error: ${formatErrorMessage(err)}`);
        exitAfterShutdown("uncaught error", 1);
      };

      for (const signal of SIGNALS) target.on(signal, onSignal);
      target.on("uncaughtException", onError);
      target.on("unhandledRejection", onError);

      return () => {
        for (const signal of SIGNALS) target.off(signal, onSignal);
        target.off("uncaughtException", onError);
        target.off("unhandledRejection", onError);
      };
    },
  };
}

export type Lifecycle = ReturnType<typeof createLifecycle>;
