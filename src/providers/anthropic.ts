import Anthropic from "@anthropic-ai/sdk";
import { incompleteResponse, toProviderError } from "./errors.js";
import { ToolCallAccumulator } from "./tool-calls.js";
import type { ChatOptions, Message, Provider, StreamChunk, ThinkingOptions, ToolDefinition, Usage } from "./types.js";

export interface AnthropicProviderConfig {
	apiKey?: string;
	baseUrl?: string;
	model: string;
	maxTokens?: number;
	thinking?: ThinkingOptions;
}

type AnthropicMessage = Anthropic.Messages.MessageParam;
type AnthropicTool = Anthropic.Messages.Tool;

function parseArguments(text: string): Record<string, unknown> {
	try {
		const parsed: unknown = JSON.parse(text || "{}");
		if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
			return Object.fromEntries(Object.entries(parsed));
		}
	} catch (err) {
		console.warn(`[AnthropicProvider] Failed to parse tool arguments: ${err}`);
	}
	return {};
}

export function convertMessages(messages: Message[]): { system?: string; messages: AnthropicMessage[] } {
	const systemMessages: string[] = [];
	const converted: AnthropicMessage[] = [];

	for (const msg of messages) {
		if (msg.role === "system") {
			systemMessages.push(msg.content);
			continue;
		}

		if (msg.role === "user") {
			converted.push({ role: "user", content: msg.content });
		} else if (msg.role === "assistant") {
			if (msg.toolCalls?.length) {
				const content: Anthropic.Messages.ContentBlockParam[] = [];
				if (msg.content) {
					content.push({ type: "text", text: msg.content });
				}
				for (const tc of msg.toolCalls) {
					content.push({ type: "tool_use", id: tc.id, name: tc.name, input: parseArguments(tc.arguments) });
				}
				converted.push({ role: "assistant", content });
			} else {
				converted.push({ role: "assistant", content: msg.content });
			}
		} else {
			const block: Anthropic.Messages.ToolResultBlockParam = {
				type: "tool_result",
				tool_use_id: msg.toolCallId ?? "",
				content: msg.content,
			};
			// Consecutive tool results belong to a single user turn.
			const lastMsg = converted[converted.length - 1];
			if (lastMsg?.role === "user" && Array.isArray(lastMsg.content)) {
				lastMsg.content.push(block);
			} else {
				converted.push({ role: "user", content: [block] });
			}
		}
	}

	const combinedSystem = systemMessages.length > 0 ? systemMessages.join("\n\n---\n\n") : undefined;
	return { system: combinedSystem, messages: converted };
}

export function convertTools(tools: ToolDefinition[]): AnthropicTool[] {
	return tools.map((tool) => ({
		name: tool.name,
		description: tool.description,
		input_schema: { ...tool.parameters, type: "object" as const },
	}));
}

export function buildThinkingConfig(enabled: boolean, budgetTokens?: number) {
	return enabled
		? {
				type: "enabled" as const,
				budget_tokens: budgetTokens ?? 2000,
			}
		: undefined;
}

export class AnthropicProvider implements Provider {
	readonly name = "anthropic";
	readonly modelName: string;
	private _client: Anthropic;
	private _maxTokens: number;
	private _thinking?: ThinkingOptions;

	constructor(config: AnthropicProviderConfig) {
		this.modelName = config.model;
		this._maxTokens = config.maxTokens ?? 4096;
		this._thinking = config.thinking;
		this._client = new Anthropic({
			apiKey: config.apiKey,
			baseURL: config.baseUrl,
			maxRetries: 0,
		});
	}

	async models(signal?: AbortSignal): Promise<string[]> {
		try {
			const ids: string[] = [];
			for await (const model of this._client.models.list({}, { signal })) {
				ids.push(model.id);
			}
			return ids;
		} catch (err) {
			throw toProviderError(this.name, err);
		}
	}

	async *chat(messages: Message[], tools: ToolDefinition[] = [], options: ChatOptions = {}): AsyncGenerator<StreamChunk, void, unknown> {
		const { system, messages: converted } = convertMessages(messages);
		const thinking = buildThinkingConfig(this._thinking?.enabled ?? false, this._thinking?.budgetTokens);

		const stream = this._client.messages.stream({
			model: this.modelName,
			max_tokens: thinking ? Math.max(this._maxTokens, thinking.budget_tokens + 1024) : this._maxTokens,
			system,
			messages: converted,
			tools: tools.length ? convertTools(tools) : undefined,
			thinking,
		});

		const abortHandler = () => {
			stream.controller.abort();
		};
		if (options.signal?.aborted) abortHandler();
		options.signal?.addEventListener("abort", abortHandler);

		const toolCalls = new ToolCallAccumulator();
		let inputTokens = 0;
		let outputTokens = 0;
		let stopped = false;
		let emitted = false;

		try {
			for await (const event of stream) {
				if (event.type === "message_start") {
					inputTokens = event.message.usage.input_tokens;
					outputTokens = event.message.usage.output_tokens;
				} else if (event.type === "content_block_start") {
					if (event.content_block.type === "tool_use") {
						toolCalls.add(event.index, { id: event.content_block.id, name: event.content_block.name });
					}
				} else if (event.type === "content_block_delta") {
					if (event.delta.type === "text_delta") {
						emitted = true;
						yield { delta: event.delta.text };
					} else if (event.delta.type === "thinking_delta") {
						emitted = true;
						yield { thinking: event.delta.thinking };
					} else if (event.delta.type === "input_json_delta") {
						toolCalls.add(event.index, { arguments: event.delta.partial_json });
					}
				} else if (event.type === "message_delta") {
					outputTokens = event.usage.output_tokens;
				} else if (event.type === "message_stop") {
					stopped = true;
				}
			}
		} catch (err) {
			const error = toProviderError(this.name, err);
			if (!emitted) throw error;
			yield { done: true, error };
			return;
		} finally {
			options.signal?.removeEventListener("abort", abortHandler);
		}

		const usage: Usage = { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };

		if (!stopped) {
			yield { done: true, usage, error: incompleteResponse(this.name) };
			return;
		}

		yield { done: true, toolCalls: toolCalls.complete(), usage };
	}
}
