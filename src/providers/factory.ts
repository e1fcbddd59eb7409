import { AnthropicProvider } from "./anthropic.js";
import { GoogleProvider } from "./google.js";
import { OpenAIProvider } from "./openai.js";
import { withRetry } from "./retry.js";
import type { Provider, ThinkingOptions } from "./types.js";

export const PROVIDER_TYPES = ["openai", "anthropic", "google", "ollama"] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

export const OLLAMA_DEFAULT_BASE_URL = "http://localhost:11434/v1";

/**
 * Model patterns, most specific first. Anything unmatched is assumed to be a
 * local model served by Ollama.
 */
const MODEL_PATTERNS: Array<{ provider: ProviderType; patterns: RegExp[] }> = [
	{ provider: "anthropic", patterns: [/^claude/] },
	{ provider: "openai", patterns: [/^gpt-/, /^o[134](-|$)/, /^chatgpt/] },
	{ provider: "google", patterns: [/^gemini/, /^models\/gemini/] },
];

export function isProviderType(value: string): value is ProviderType {
	return PROVIDER_TYPES.some((type) => type === value);
}

export function detectProvider(model: string): ProviderType {
	for (const entry of MODEL_PATTERNS) {
		if (entry.patterns.some((pattern) => pattern.test(model))) {
			return entry.provider;
		}
	}
	return "ollama";
}

export interface ModelAndProvider {
	model: string;
	provider?: ProviderType;
}

/**
 * Parse a model string in the format "model" or "model@provider"
 * Examples:
 *   "qwen2.5:7b" -> { model: "qwen2.5:7b", provider: undefined }
 *   "qwen2.5:7b@ollama" -> { model: "qwen2.5:7b", provider: "ollama" }
 *   "gpt-4o@openai" -> { model: "gpt-4o", provider: "openai" }
 */
export function parseModelString(modelString: string): ModelAndProvider {
	const atIndex = modelString.lastIndexOf("@");
	if (atIndex > 0) {
		const model = modelString.slice(0, atIndex);
		const provider = modelString.slice(atIndex + 1);
		if (!isProviderType(provider)) {
			throw new Error(`Unsupported provider "${provider}" in model string "${modelString}"`);
		}
		return { model, provider };
	}
	return { model: modelString, provider: undefined };
}

export interface CreateProviderOptions {
	model: string;
	provider?: ProviderType;
	apiKey?: string;
	baseUrl?: string;
	thinking?: ThinkingOptions;
	/** Transient-failure retries; 0 disables the retry wrapper */
	maxRetries?: number;
}

const REQUIRES_API_KEY: Record<ProviderType, boolean> = {
	openai: true,
	anthropic: true,
	google: true,
	ollama: false,
};

function createProviderInstance(type: ProviderType, model: string, options: CreateProviderOptions): Provider {
	switch (type) {
		case "openai":
			return new OpenAIProvider({ model, apiKey: options.apiKey, baseUrl: options.baseUrl });
		case "ollama":
			return new OpenAIProvider({
				name: "ollama",
				model,
				apiKey: options.apiKey,
				baseUrl: options.baseUrl ?? OLLAMA_DEFAULT_BASE_URL,
			});
		case "anthropic":
			return new AnthropicProvider({ model, apiKey: options.apiKey, baseUrl: options.baseUrl, thinking: options.thinking });
		case "google":
			return new GoogleProvider({ model, apiKey: options.apiKey });
	}
}

export function createProvider(options: CreateProviderOptions): Provider {
	const { model, provider: explicitProvider } = parseModelString(options.model);
	const type = explicitProvider ?? options.provider ?? detectProvider(model);

	if (REQUIRES_API_KEY[type] && !options.apiKey) {
		throw new Error(`${type} provider requires an apiKey`);
	}

	const provider = createProviderInstance(type, model, options);
	const maxRetries = options.maxRetries ?? 3;
	return maxRetries > 0 ? withRetry(provider, maxRetries) : provider;
}
