/**
 * Per-process holder of a variant's API clients.
 *
 * Clients are built once at startup. When that fails for lack of credentials
 * the server still starts; each later `service()` call retries the build,
 * with concurrent callers sharing a single attempt, until one succeeds.
 */

import { AuthenticationError, ConfigurationError, formatErrorMessage } from "../google/errors.js";
import { createCredentialSpec } from "../google/scopes.js";
import type {
  ApiClients,
  ApiName,
  ServiceFactory,
  ServiceHandles,
} from "../google/service-factory.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";
import type { ServerVariant } from "../tools/index.js";
import type { ToolContext } from "../tools/common.js";

export type DispatchContextOptions = {
  factory: Pick<ServiceFactory, "buildAll">;
  driveFolderId?: string;
  logger?: SubsystemLogger;
};

export type DispatchContext = ToolContext & {
  readonly apis: readonly ApiName[];
  /** True once the API clients have been built. */
  isReady(): boolean;
  close(): void;
};

export async function openDispatchContext(
  variant: ServerVariant,
  options: DispatchContextOptions,
): Promise<DispatchContext> {
  const log = options.logger ?? createSubsystemLogger("context");
  const spec = createCredentialSpec(variant.scopes);
  let handles: ServiceHandles | undefined;
  let inflight: Promise<ServiceHandles> | undefined;
  let closed = false;

  function build(): Promise<ServiceHandles> {
    inflight ??= options.factory
      .buildAll(variant.apis, spec)
      .then((built) => {
        handles = built;
        log.info("API clients ready", { variant: variant.name, apis: variant.apis.join(",") });
        return built;
      })
      .finally(() => {
        inflight = undefined;
      });
    return inflight;
  }

  try {
    await build();
  } catch (err) {
    if (!(err instanceof AuthenticationError)) throw err;
    log.error(`Starting without Google credentials: ${formatErrorMessage(err)}`, {
      variant: variant.name,
    });
  }

  const context: DispatchContext = {
    variant: variant.name,
    driveFolderId: options.driveFolderId,
    apis: variant.apis,
    isReady: () => handles !== undefined,
    service: async <N extends ApiName>(apiName: N): Promise<ApiClients[N]> => {
      if (closed) throw new ConfigurationError("Dispatch context is closed");
      if (!variant.apis.includes(apiName)) {
        throw new ConfigurationError(`The ${variant.name} server has no ${apiName} API`);
      }
      const current = handles ?? (await build());
      const handle = current[apiName];
      if (!handle) throw new ConfigurationError(`No ${apiName} client was built`);
      return handle.client;
    },
    close: () => {
      closed = true;
    },
  };
  return Object.freeze(context);
}

export function closeDispatchContext(
  context: DispatchContext,
  logger: SubsystemLogger = createSubsystemLogger("context"),
): void {
  context.close();
  logger.debug("Dispatch context closed", { variant: context.variant });
}
