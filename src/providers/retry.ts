import { retryWithBackoff } from "../utils/retry.js";
import { toProviderError } from "./errors.js";
import type { ChatOptions, Message, Provider, StreamChunk, ToolDefinition } from "./types.js";

export interface RetryProviderOptions {
	/** Base delay for the first retry in milliseconds (default: 500) */
	initialDelay?: number;
	/** Upper bound for a single backoff sleep (default: 30000) */
	maxDelay?: number;
	jitter?: boolean;
}

/**
 * Retries transient failures (network, 5xx, 429) with exponential backoff.
 *
 * A stream is only retried while it has produced nothing: once the first chunk
 * is out, the caller has seen output and a replay would duplicate it.
 */
export class RetryProvider implements Provider {
	constructor(
		private readonly _inner: Provider,
		private readonly _maxRetries: number,
		private readonly _options: RetryProviderOptions = {},
	) {}

	get name(): string {
		return this._inner.name;
	}

	get modelName(): string {
		return this._inner.modelName;
	}

	models(signal?: AbortSignal): Promise<string[]> {
		return retryWithBackoff(
			async () => {
				try {
					return await this._inner.models(signal);
				} catch (err) {
					throw toProviderError(this._inner.name, err);
				}
			},
			this._retryOptions(signal),
		);
	}

	async *chat(messages: Message[], tools?: ToolDefinition[], options: ChatOptions = {}): AsyncGenerator<StreamChunk, void, unknown> {
		const { iterator, first } = await retryWithBackoff(
			async () => {
				const iterator = this._inner.chat(messages, tools, options)[Symbol.asyncIterator]();
				try {
					const first = await iterator.next();
					return { iterator, first };
				} catch (err) {
					throw toProviderError(this._inner.name, err);
				}
			},
			this._retryOptions(options.signal),
		);

		try {
			if (first.done) return;
			yield first.value;

			for (;;) {
				const next = await iterator.next();
				if (next.done) return;
				yield next.value;
			}
		} finally {
			await iterator.return?.();
		}
	}

	private _retryOptions(signal?: AbortSignal) {
		return {
			maxRetries: this._maxRetries,
			initialDelay: this._options.initialDelay ?? 500,
			maxDelay: this._options.maxDelay ?? 30000,
			jitter: this._options.jitter ?? true,
			signal,
			label: `Retry ${this._inner.name}`,
		};
	}
}

export function withRetry(provider: Provider, maxRetries = 3, options?: RetryProviderOptions): Provider {
	return new RetryProvider(provider, maxRetries > 0 ? maxRetries : 3, options);
}
