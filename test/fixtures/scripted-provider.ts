import { ProviderError } from "../../src/providers/errors.js";
import type { ChatOptions, Message, Provider, StreamChunk, ToolDefinition } from "../../src/providers/types.js";

export type ScriptedReply = string | StreamChunk[] | ProviderError | ((prompt: string) => string);

/**
 * Answers each chat call with the next queued reply. A string reply streams as
 * one delta plus a terminal chunk reporting `tokensPerReply` tokens.
 */
export class ScriptedProvider implements Provider {
	readonly name = "scripted";
	readonly modelName = "scripted-model";
	readonly prompts: string[] = [];
	private readonly _replies: ScriptedReply[];

	constructor(
		replies: ScriptedReply[],
		private readonly _tokensPerReply = 10,
	) {
		this._replies = [...replies];
	}

	get remaining(): number {
		return this._replies.length;
	}

	async models(): Promise<string[]> {
		return [this.modelName];
	}

	async *chat(messages: Message[], _tools?: ToolDefinition[], _options?: ChatOptions): AsyncGenerator<StreamChunk> {
		const prompt = messages[messages.length - 1]?.content ?? "";
		this.prompts.push(prompt);

		const reply = this._replies.shift();
		if (reply === undefined) {
			throw new ProviderError(`no scripted reply left for prompt #${this.prompts.length}`, "bad_request", this.name);
		}
		if (reply instanceof ProviderError) {
			throw reply;
		}
		if (Array.isArray(reply)) {
			yield* reply;
			return;
		}

		const text = typeof reply === "function" ? reply(prompt) : reply;
		yield { delta: text };
		yield {
			done: true,
			usage: { inputTokens: 0, outputTokens: this._tokensPerReply, totalTokens: this._tokensPerReply },
		};
	}
}
