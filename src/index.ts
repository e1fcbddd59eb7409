export * from "./orchestrator/index.js";
export * from "./providers/index.js";
export * from "./tools/index.js";
export {
	ConfigError,
	configSchema,
	getDefaultConfig,
	loadConfig,
	type Config,
	type LoadConfigOptions,
} from "./config/index.js";
export { BoundedChannel, bufferStream } from "./utils/channel.js";
export { isRetryable, retryWithBackoff, type RetryOptions } from "./utils/retry.js";
