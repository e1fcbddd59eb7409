import type { ProviderError } from "./errors.js";

export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface Message {
	role: MessageRole;
	content: string;
	toolCallId?: string;
	toolCalls?: ToolCall[];
}

export interface ToolCall {
	id: string;
	name: string;
	/** Raw JSON text, reassembled from streamed fragments. */
	arguments: string;
}

export interface ToolDefinition {
	name: string;
	description: string;
	parameters: Record<string, unknown>;
}

export interface Usage {
	inputTokens: number;
	outputTokens: number;
	totalTokens: number;
}

/**
 * One increment of a streamed model response. Any subset of fields may be set;
 * `done` marks the terminal chunk, after which the stream closes.
 */
export interface StreamChunk {
	delta?: string;
	thinking?: string;
	toolCalls?: ToolCall[];
	usage?: Usage;
	done?: boolean;
	error?: ProviderError;
}

export interface ChatOptions {
	signal?: AbortSignal;
}

export interface Provider {
	readonly name: string;
	readonly modelName: string;
	models(signal?: AbortSignal): Promise<string[]>;
	chat(messages: Message[], tools?: ToolDefinition[], options?: ChatOptions): AsyncIterable<StreamChunk>;
}

export interface ThinkingOptions {
	enabled?: boolean;
	budgetTokens?: number;
}
