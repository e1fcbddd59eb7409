import type { StepResult } from "./types.js";

export const URL_FROM_STEP_PREFIX = "$EXTRACT_URL_FROM_STEP_";
export const FIRST_URL_PLACEHOLDER = "$EXTRACT_FIRST_URL";
export const JSON_FIELD_PREFIX = "$EXTRACT_JSON_FIELD:";
export const REGEX_PREFIX = "$REGEX:";

const URL_PATTERN = /https?:\/\/[^\s)]+/;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;
const FLAT_JSON_OBJECT = /\{[^{}]*\}/;
const STEP_SUFFIX = /STEP_(\d+)/;

export function extractFirstUrl(text: string): string {
	const match = URL_PATTERN.exec(text);
	return match ? match[0].replace(TRAILING_PUNCTUATION, "") : "";
}

function parseObject(text: string): Record<string, unknown> | undefined {
	try {
		const parsed: unknown = JSON.parse(text);
		if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
			return Object.fromEntries(Object.entries(parsed));
		}
	} catch {
		// not JSON
	}
	return undefined;
}

/**
 * Reads `field` from `text` parsed as a JSON object, or from the first flat
 * `{...}` block embedded in it. Non-string values come back JSON-encoded.
 */
export function extractJsonField(text: string, field: string): string {
	let data = parseObject(text);
	if (!data) {
		const block = FLAT_JSON_OBJECT.exec(text);
		data = block ? parseObject(block[0]) : undefined;
	}
	if (!data || !Object.hasOwn(data, field)) {
		return "";
	}

	const value = data[field];
	if (typeof value === "string") return value;
	if (value === undefined) return "";
	return JSON.stringify(value);
}

/** First capture group of `pattern` in `text`, else the whole match. */
export function extractWithRegex(text: string, pattern: string): string {
	let re: RegExp;
	try {
		re = new RegExp(pattern);
	} catch {
		return "";
	}
	const match = re.exec(text);
	if (!match) return "";
	return match[1] ?? match[0];
}

function parseStepReference(ref: string): number {
	const digits = ref.startsWith("step_") ? ref.slice("step_".length) : ref;
	return /^\d+$/.test(digits) ? Number.parseInt(digits, 10) : 0;
}

function resultOf(previousResults: StepResult[], step: number): string | undefined {
	if (step < 1 || step > previousResults.length) return undefined;
	return previousResults[step - 1]?.result;
}

/**
 * Resolves one placeholder string against the results of the steps before
 * the current one (`previousResults[k - 1]` is step k). Anything that does not
 * resolve to a non-empty value is returned unchanged.
 */
export function resolvePlaceholder(value: string, previousResults: StepResult[]): string {
	const resolved = resolve(value, previousResults);
	return resolved ? resolved : value;
}

function resolve(value: string, previousResults: StepResult[]): string | undefined {
	if (value.startsWith(URL_FROM_STEP_PREFIX)) {
		const digits = STEP_SUFFIX.exec(value)?.[1];
		const text = resultOf(previousResults, digits ? Number.parseInt(digits, 10) : 0);
		return text === undefined ? undefined : extractFirstUrl(text);
	}

	if (value === FIRST_URL_PLACEHOLDER) {
		const text = resultOf(previousResults, previousResults.length);
		return text === undefined ? undefined : extractFirstUrl(text);
	}

	if (value.startsWith(JSON_FIELD_PREFIX)) {
		const [, ref, field] = value.split(":");
		if (ref === undefined || field === undefined) return undefined;
		const text = resultOf(previousResults, parseStepReference(ref));
		return text === undefined ? undefined : extractJsonField(text, field);
	}

	if (value.startsWith(REGEX_PREFIX)) {
		const rest = value.slice(REGEX_PREFIX.length);
		const sep = rest.indexOf(":");
		if (sep === -1) return undefined;
		const text = resultOf(previousResults, parseStepReference(rest.slice(0, sep)));
		return text === undefined ? undefined : extractWithRegex(text, rest.slice(sep + 1));
	}

	return undefined;
}

/**
 * Returns a copy of `params` with every top-level string placeholder
 * resolved. Other values pass through untouched.
 */
export function extractDynamicParams(
	params: Record<string, unknown>,
	previousResults: StepResult[],
): Record<string, unknown> {
	const resolved: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(params)) {
		resolved[key] = typeof value === "string" ? resolvePlaceholder(value, previousResults) : value;
	}
	return resolved;
}
