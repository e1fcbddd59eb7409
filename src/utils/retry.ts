/**
 * Retry configuration options
 */
export interface RetryOptions {
	/** Maximum number of retry attempts (default: 3) */
	maxRetries?: number;
	/** Initial delay in milliseconds (default: 500) */
	initialDelay?: number;
	/** Maximum delay in milliseconds (default: 30000) */
	maxDelay?: number;
	/** Multiplier for exponential backoff (default: 2) */
	multiplier?: number;
	/** Whether to add jitter to delays (default: true) */
	jitter?: boolean;
	/** Retry condition (default: the error's own `retryable` flag) */
	shouldRetry?: (error: unknown, attempt: number) => boolean | Promise<boolean>;
	/** Aborts the pending backoff sleep; the last error is rethrown */
	signal?: AbortSignal;
	/** Label used in retry log lines */
	label?: string;
}

const DEFAULT_RETRY_OPTIONS = {
	maxRetries: 3,
	initialDelay: 500,
	maxDelay: 30000,
	multiplier: 2,
	jitter: true,
} satisfies RetryOptions;

type ResolvedRetryOptions = Required<Pick<RetryOptions, "initialDelay" | "maxDelay" | "multiplier" | "jitter">>;

/**
 * Calculate delay with exponential backoff and optional jitter
 */
export function calculateDelay(attempt: number, options: ResolvedRetryOptions): number {
	const exponentialDelay = options.initialDelay * options.multiplier ** attempt;
	const cappedDelay = Math.min(exponentialDelay, options.maxDelay);

	// ±12.5% spread so concurrent callers do not retry in lockstep
	if (options.jitter) {
		const jitterRange = cappedDelay * 0.25;
		return cappedDelay - jitterRange / 2 + Math.random() * jitterRange;
	}

	return cappedDelay;
}

/** Retries errors that mark themselves `retryable`, as ProviderError does. */
export function isRetryable(error: unknown): boolean {
	return typeof error === "object" && error !== null && "retryable" in error && error.retryable === true;
}

function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve(false);
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve(true);
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Calls `fn` until it resolves, an error is not worth retrying, or
 * `maxRetries` extra attempts are spent. The last error is rethrown.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const opts = {
		maxRetries: options.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
		initialDelay: options.initialDelay ?? DEFAULT_RETRY_OPTIONS.initialDelay,
		maxDelay: options.maxDelay ?? DEFAULT_RETRY_OPTIONS.maxDelay,
		multiplier: options.multiplier ?? DEFAULT_RETRY_OPTIONS.multiplier,
		jitter: options.jitter ?? DEFAULT_RETRY_OPTIONS.jitter,
		shouldRetry: options.shouldRetry ?? isRetryable,
	};
	const label = options.label ?? "Retry";

	let lastError: unknown;

	for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
		try {
			return await fn();
		} catch (error) {
			lastError = error;

			const shouldRetry = await opts.shouldRetry(error, attempt);
			if (attempt === opts.maxRetries || !shouldRetry) {
				throw error;
			}

			const delay = calculateDelay(attempt, opts);

			if (error instanceof Error) {
				console.warn(
					`[${label}] Attempt ${attempt + 1}/${opts.maxRetries + 1} failed: ${error.message}. Retrying in ${Math.round(delay)}ms...`,
				);
			}

			const slept = await sleep(delay, options.signal);
			if (!slept) throw error;
		}
	}

	throw lastError;
}
