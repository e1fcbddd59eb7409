/**
 * Provider failure taxonomy.
 *
 * Vendor SDKs throw their own error classes; every provider funnels them through
 * `toProviderError` so the retry decorator and the orchestrator only ever see a
 * `ProviderError` with a `kind`.
 */

export type ProviderErrorKind =
	| "unreachable"
	| "auth_failed"
	| "throttled"
	| "incomplete_response"
	| "server_error"
	| "bad_request"
	| "cancelled";

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set(["unreachable", "throttled", "server_error"]);

export class ProviderError extends Error {
	constructor(
		message: string,
		public readonly kind: ProviderErrorKind,
		public readonly provider: string,
		public readonly status?: number,
	) {
		super(message);
		this.name = "ProviderError";
	}

	get retryable(): boolean {
		return RETRYABLE_KINDS.has(this.kind);
	}
}

const STATUS_MESSAGES: Record<number, string> = {
	401: "authentication failed - check your API key",
	403: "access denied - your API key may not have the required permissions",
	404: "model or endpoint not found",
	429: "rate limited - too many requests, please wait",
	500: "internal server error on the provider side",
	502: "provider service temporarily unavailable",
	503: "provider service temporarily unavailable",
	529: "provider is overloaded, please try again later",
};

const NETWORK_PATTERNS: Array<[RegExp, string]> = [
	[/ECONNREFUSED|connection refused/i, "connection refused (is the service running?)"],
	[/ENOTFOUND|no such host|getaddrinfo/i, "host not found (check the URL)"],
	[/ETIMEDOUT|timed? ?out/i, "connection timed out (service may be starting up)"],
	[/ECONNRESET|reset by peer|socket hang up/i, "connection reset by server"],
	[/fetch failed|network|connection error/i, "network error"],
];

function statusOf(err: unknown): number | undefined {
	if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
		return err.status;
	}
	return undefined;
}

function messageOf(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
	if (err instanceof ProviderError) return err.kind === "cancelled";
	return err instanceof Error && (err.name === "AbortError" || err.name === "APIUserAbortError");
}

export function kindForStatus(status: number): ProviderErrorKind {
	if (status === 401 || status === 403) return "auth_failed";
	if (status === 429) return "throttled";
	if (status >= 500) return "server_error";
	return "bad_request";
}

/**
 * Normalizes anything a vendor SDK throws into a ProviderError.
 */
export function toProviderError(provider: string, err: unknown): ProviderError {
	if (err instanceof ProviderError) return err;

	const message = messageOf(err);

	if (isAbortError(err)) {
		return new ProviderError(`provider ${provider}: request cancelled`, "cancelled", provider);
	}

	const status = statusOf(err);
	if (status !== undefined) {
		const friendly = STATUS_MESSAGES[status];
		const detail = friendly && !message ? friendly : message || `HTTP ${status}`;
		return new ProviderError(`provider ${provider}: ${detail}`, kindForStatus(status), provider, status);
	}

	for (const [pattern, friendly] of NETWORK_PATTERNS) {
		if (pattern.test(message)) {
			return new ProviderError(`provider ${provider}: ${friendly}`, "unreachable", provider);
		}
	}

	return new ProviderError(`provider ${provider}: ${message}`, "bad_request", provider);
}

export function incompleteResponse(provider: string): ProviderError {
	return new ProviderError(
		`provider ${provider}: stream ended before the model finished its response`,
		"incomplete_response",
		provider,
	);
}
