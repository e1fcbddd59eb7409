import type { ToolDefinition } from "../providers/types.js";
import {
	INTENT_PARSER_PROMPT,
	buildIntentPrompt,
	buildPlannerPrompt,
	buildRetryPrompt,
	buildSynthesisPrompt,
	buildValidationPrompt,
} from "./prompts.js";
import type { Intent, Plan, StepResult, Validation } from "./types.js";
import {
	createDefaultValidation,
	stripCodeFences,
	validateIntent,
	validatePlan,
	validateValidation,
	type ParseResult,
} from "./validation.js";

/** Sends one prompt to the model and resolves with its visible text. */
export type CallModel = (prompt: string) => Promise<string>;

export interface Rejection {
	attempt: number;
	output: string;
	error: string;
}

export interface PhaseAttemptOptions {
	/** Tries before giving up; values below 1 still make one attempt */
	maxAttempts: number;
	onRejected?: (rejection: Rejection) => void;
}

/** Synthesized answers shorter than this are replaced by the basic summary. */
export const MIN_RESPONSE_LENGTH = 20;

export async function parseIntent(
	query: string,
	callModel: CallModel,
	options: PhaseAttemptOptions,
): Promise<ParseResult<Intent>> {
	const attempts = Math.max(1, options.maxAttempts);
	let prompt = buildIntentPrompt(query);
	let lastError = "";

	for (let attempt = 1; attempt <= attempts; attempt++) {
		const output = await callModel(prompt);
		const parsed = validateIntent(output);
		if (parsed.ok) return parsed;

		lastError = parsed.error;
		options.onRejected?.({ attempt, output, error: parsed.error });
		prompt = buildRetryPrompt(INTENT_PARSER_PROMPT, output, parsed.error, query);
	}

	return { ok: false, error: `intent parsing failed after ${attempts} attempts: ${lastError}` };
}

export async function createPlan(
	intent: Intent,
	tools: ToolDefinition[],
	callModel: CallModel,
	options: PhaseAttemptOptions & { maxSteps: number },
): Promise<ParseResult<Plan>> {
	const attempts = Math.max(1, options.maxAttempts);
	const basePrompt = buildPlannerPrompt(intent, tools, options.maxSteps);
	let prompt = basePrompt;
	let lastError = "";

	for (let attempt = 1; attempt <= attempts; attempt++) {
		const output = await callModel(prompt);
		const parsed = validatePlan(output, options.maxSteps);
		if (parsed.ok) return parsed;

		lastError = parsed.error;
		options.onRejected?.({ attempt, output, error: parsed.error });
		prompt = buildRetryPrompt(basePrompt, output, parsed.error);
	}

	return { ok: false, error: `plan creation failed after ${attempts} attempts: ${lastError}` };
}

export function allStepsSucceeded(results: StepResult[]): boolean {
	return results.every((r) => r.status === "success");
}

export interface ValidationOutcome {
	validation: Validation;
	/** Why the default validation was used instead of the model's */
	fallbackReason?: string;
}

export async function validateResults(
	intent: Intent,
	plan: Plan,
	results: StepResult[],
	callModel: CallModel,
): Promise<ValidationOutcome> {
	const output = await callModel(buildValidationPrompt(intent, plan, results));
	const parsed = validateValidation(output);
	if (parsed.ok) {
		return { validation: parsed.value };
	}
	return { validation: createDefaultValidation(allStepsSucceeded(results)), fallbackReason: parsed.error };
}

function printableLength(text: string): number {
	let count = 0;
	for (const ch of text) {
		if (!/\p{C}/u.test(ch)) count++;
	}
	return count;
}

export function createBasicResponse(results: StepResult[]): string {
	const observations = results.filter((r) => r.status === "success").map((r) => r.observation);
	if (observations.length === 0) {
		return "No results available.";
	}
	return `Here's what I found:\n\n${observations.map((obs, i) => `${i + 1}. ${obs}\n`).join("")}`;
}

export async function synthesizeResponse(query: string, results: StepResult[], callModel: CallModel): Promise<string> {
	const response = stripCodeFences(await callModel(buildSynthesisPrompt(query, results)));
	if (printableLength(response) < MIN_RESPONSE_LENGTH) {
		return createBasicResponse(results);
	}
	return response;
}
