export type { Tool, ToolContext, ToolDangerLevel, ToolParameters, ToolResult } from "./types.js";

export type { ConfirmationHandler, ConfirmationRequest } from "./confirmation.js";
export { approveAll, denyAll } from "./confirmation.js";

export type { ExecuteOptions, ToolRegistryOptions } from "./registry.js";
export { ToolRegistry } from "./registry.js";

export type { PluginLoadError, PluginLoadResult } from "./plugin-loader.js";
export { isTool, loadPlugins } from "./plugin-loader.js";
