export type {
	ChatOptions,
	Message,
	MessageRole,
	Provider,
	StreamChunk,
	ThinkingOptions,
	ToolCall,
	ToolDefinition,
	Usage,
} from "./types.js";

export { ProviderError, isAbortError, toProviderError, type ProviderErrorKind } from "./errors.js";
export { ThinkTagParser, type ThinkSegment } from "./thinking.js";

export { OpenAIProvider } from "./openai.js";
export type { OpenAIProviderConfig } from "./openai.js";

export { AnthropicProvider } from "./anthropic.js";
export type { AnthropicProviderConfig } from "./anthropic.js";

export { GoogleProvider } from "./google.js";
export type { GoogleProviderConfig } from "./google.js";

export { RetryProvider, withRetry, type RetryProviderOptions } from "./retry.js";

export {
	PROVIDER_TYPES,
	createProvider,
	detectProvider,
	parseModelString,
	type CreateProviderOptions,
	type ProviderType,
} from "./factory.js";
