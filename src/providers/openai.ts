import OpenAI from "openai";
import { incompleteResponse, toProviderError } from "./errors.js";
import { type ThinkSegment, ThinkTagParser } from "./thinking.js";
import { ToolCallAccumulator } from "./tool-calls.js";
import type { ChatOptions, Message, Provider, StreamChunk, ToolDefinition, Usage } from "./types.js";

export interface OpenAIProviderConfig {
	apiKey?: string;
	baseUrl?: string;
	model: string;
	/** Display name; OpenAI-compatible servers (Ollama, vLLM, OpenRouter) reuse this class. */
	name?: string;
}

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;
type OpenAITool = OpenAI.Chat.ChatCompletionTool;

export function convertMessages(messages: Message[]): OpenAIMessage[] {
	return messages.map((msg): OpenAIMessage => {
		switch (msg.role) {
			case "system":
				return { role: "system", content: msg.content };
			case "user":
				return { role: "user", content: msg.content };
			case "tool":
				return { role: "tool", content: msg.content, tool_call_id: msg.toolCallId ?? "" };
			case "assistant":
				if (msg.toolCalls?.length) {
					return {
						role: "assistant",
						content: msg.content || null,
						tool_calls: msg.toolCalls.map((tc) => ({
							id: tc.id,
							type: "function" as const,
							function: { name: tc.name, arguments: tc.arguments },
						})),
					};
				}
				return { role: "assistant", content: msg.content };
		}
	});
}

export function convertTools(tools: ToolDefinition[]): OpenAITool[] {
	return tools.map((tool) => ({
		type: "function" as const,
		function: {
			name: tool.name,
			description: tool.description,
			parameters: tool.parameters,
		},
	}));
}

function toChunk(segment: ThinkSegment): StreamChunk {
	return segment.kind === "thinking" ? { thinking: segment.text } : { delta: segment.text };
}

export class OpenAIProvider implements Provider {
	readonly name: string;
	readonly modelName: string;
	private _client: OpenAI;

	constructor(config: OpenAIProviderConfig) {
		this.name = config.name ?? "openai";
		this.modelName = config.model;
		this._client = new OpenAI({
			// Local OpenAI-compatible servers accept any key; the SDK refuses an empty one.
			apiKey: config.apiKey || "not-needed",
			baseURL: config.baseUrl,
			maxRetries: 0,
		});
	}

	async models(signal?: AbortSignal): Promise<string[]> {
		try {
			const ids: string[] = [];
			for await (const model of this._client.models.list({ signal })) {
				ids.push(model.id);
			}
			return ids;
		} catch (err) {
			throw toProviderError(this.name, err);
		}
	}

	async *chat(messages: Message[], tools: ToolDefinition[] = [], options: ChatOptions = {}): AsyncGenerator<StreamChunk, void, unknown> {
		let stream: AsyncIterable<OpenAI.Chat.ChatCompletionChunk>;
		try {
			stream = await this._client.chat.completions.create(
				{
					model: this.modelName,
					messages: convertMessages(messages),
					tools: tools.length ? convertTools(tools) : undefined,
					stream: true,
					stream_options: { include_usage: true },
				},
				{ signal: options.signal },
			);
		} catch (err) {
			throw toProviderError(this.name, err);
		}

		const parser = new ThinkTagParser();
		const toolCalls = new ToolCallAccumulator();
		let usage: Usage | undefined;
		let finished = false;
		let emitted = false;

		try {
			for await (const chunk of stream) {
				// With include_usage the totals arrive in a trailing chunk that has no choices.
				if (chunk.usage) {
					usage = {
						inputTokens: chunk.usage.prompt_tokens,
						outputTokens: chunk.usage.completion_tokens,
						totalTokens: chunk.usage.total_tokens,
					};
				}

				const choice = chunk.choices[0];
				if (!choice) continue;

				for (const tc of choice.delta.tool_calls ?? []) {
					toolCalls.add(tc.index, { id: tc.id, name: tc.function?.name, arguments: tc.function?.arguments });
				}

				if (choice.delta.content) {
					for (const segment of parser.push(choice.delta.content)) {
						emitted = true;
						yield toChunk(segment);
					}
				}

				if (choice.finish_reason) finished = true;
			}
		} catch (err) {
			const error = toProviderError(this.name, err);
			if (!emitted) throw error;
			yield* parser.flush().map(toChunk);
			yield { done: true, error };
			return;
		}

		yield* parser.flush().map(toChunk);

		if (!finished) {
			yield { done: true, usage, error: incompleteResponse(this.name) };
			return;
		}

		yield { done: true, toolCalls: toolCalls.complete(), usage };
	}
}
