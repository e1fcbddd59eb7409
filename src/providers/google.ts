import { type Content, type FunctionDeclaration, type GenerateContentResponse, GoogleGenAI, type Part } from "@google/genai";
import { incompleteResponse, toProviderError } from "./errors.js";
import { ToolCallAccumulator } from "./tool-calls.js";
import type { ChatOptions, Message, Provider, StreamChunk, ToolDefinition, Usage } from "./types.js";

export interface GoogleProviderConfig {
	apiKey?: string;
	model?: string;
}

export const DEFAULT_GOOGLE_MODEL = "gemini-1.5-flash";

function parseArguments(text: string): Record<string, unknown> {
	try {
		const parsed: unknown = JSON.parse(text || "{}");
		if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
			return Object.fromEntries(Object.entries(parsed));
		}
	} catch {
		// fall through to an empty argument object
	}
	return {};
}

/**
 * Gemini has no tool role: results travel as functionResponse parts in a user
 * turn and must carry the function name, which is looked up from the call id.
 */
export function convertMessages(messages: Message[]): { systemInstruction?: string; contents: Content[] } {
	const systemMessages: string[] = [];
	const contents: Content[] = [];
	const callNames = new Map<string, string>();

	for (const msg of messages) {
		if (msg.role === "system") {
			systemMessages.push(msg.content);
			continue;
		}

		if (msg.role === "assistant") {
			const parts: Part[] = [];
			if (msg.content) parts.push({ text: msg.content });
			for (const tc of msg.toolCalls ?? []) {
				callNames.set(tc.id, tc.name);
				parts.push({ functionCall: { id: tc.id, name: tc.name, args: parseArguments(tc.arguments) } });
			}
			contents.push({ role: "model", parts });
		} else if (msg.role === "tool") {
			const id = msg.toolCallId ?? "";
			contents.push({
				role: "user",
				parts: [{ functionResponse: { id, name: callNames.get(id) ?? id, response: { output: msg.content } } }],
			});
		} else {
			contents.push({ role: "user", parts: [{ text: msg.content }] });
		}
	}

	return {
		systemInstruction: systemMessages.length > 0 ? systemMessages.join("\n\n") : undefined,
		contents,
	};
}

export function convertTools(tools: ToolDefinition[]): FunctionDeclaration[] {
	return tools.map((tool) => ({
		name: tool.name,
		description: tool.description,
		parametersJsonSchema: tool.parameters,
	}));
}

export class GoogleProvider implements Provider {
	readonly name = "google";
	readonly modelName: string;
	private _client: GoogleGenAI;

	constructor(config: GoogleProviderConfig) {
		this.modelName = config.model || DEFAULT_GOOGLE_MODEL;
		this._client = new GoogleGenAI({ apiKey: config.apiKey });
	}

	async models(_signal?: AbortSignal): Promise<string[]> {
		try {
			const names: string[] = [];
			for await (const model of await this._client.models.list()) {
				if (model.name) names.push(model.name.replace(/^models\//, ""));
			}
			return names;
		} catch (err) {
			throw toProviderError(this.name, err);
		}
	}

	async *chat(messages: Message[], tools: ToolDefinition[] = [], options: ChatOptions = {}): AsyncGenerator<StreamChunk, void, unknown> {
		const { systemInstruction, contents } = convertMessages(messages);

		let stream: AsyncGenerator<GenerateContentResponse>;
		try {
			stream = await this._client.models.generateContentStream({
				model: this.modelName,
				contents,
				config: {
					systemInstruction,
					tools: tools.length ? [{ functionDeclarations: convertTools(tools) }] : undefined,
					abortSignal: options.signal,
				},
			});
		} catch (err) {
			throw toProviderError(this.name, err);
		}

		const toolCalls = new ToolCallAccumulator();
		let usage: Usage | undefined;
		let finished = false;
		let emitted = false;

		try {
			for await (const response of stream) {
				if (response.usageMetadata) {
					const inputTokens = response.usageMetadata.promptTokenCount ?? 0;
					const outputTokens = response.usageMetadata.candidatesTokenCount ?? 0;
					usage = {
						inputTokens,
						outputTokens,
						totalTokens: response.usageMetadata.totalTokenCount ?? inputTokens + outputTokens,
					};
				}

				const candidate = response.candidates?.[0];
				for (const part of candidate?.content?.parts ?? []) {
					if (part.functionCall) {
						toolCalls.add(toolCalls.size, {
							id: part.functionCall.id,
							name: part.functionCall.name,
							arguments: JSON.stringify(part.functionCall.args ?? {}),
						});
					} else if (part.text) {
						emitted = true;
						yield part.thought ? { thinking: part.text } : { delta: part.text };
					}
				}

				if (candidate?.finishReason) finished = true;
			}
		} catch (err) {
			const error = toProviderError(this.name, err);
			if (!emitted) throw error;
			yield { done: true, error };
			return;
		}

		if (!finished) {
			yield { done: true, usage, error: incompleteResponse(this.name) };
			return;
		}

		yield { done: true, toolCalls: toolCalls.complete(), usage };
	}
}
