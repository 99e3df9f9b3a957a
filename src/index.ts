export { loadWorkspaceConfig, type WorkspaceConfig } from "./config/config.js";
export * from "./google/index.js";
export { createSubsystemLogger, type LoggerOptions, type SubsystemLogger } from "./logging.js";
export {
  closeDispatchContext,
  type DispatchContext,
  openDispatchContext,
} from "./server/context.js";
export { createToolDispatcher, type ToolDispatcher, toMcpError } from "./server/dispatcher.js";
export { createLifecycle, type Lifecycle } from "./server/lifecycle.js";
export { createMcpServer } from "./server/mcp-server.js";
export {
  type RunningTransport,
  startHttpTransport,
  startStdioTransport,
} from "./server/transport.js";
export {
  getVariant,
  listVariants,
  type ServerVariant,
  VARIANT_NAMES,
  type VariantName,
} from "./tools/index.js";
export { VERSION } from "./version.js";
