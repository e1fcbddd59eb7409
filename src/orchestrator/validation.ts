import { z } from "zod";
import {
	COMPLEXITY_LEVELS,
	INTENT_TYPES,
	RECOMMENDATIONS,
	STEP_STATUSES,
	type Complexity,
	type Intent,
	type IntentType,
	type Plan,
	type PlanStep,
	type Recommendation,
	type StepResult,
	type StepStatus,
	type Validation,
} from "./types.js";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export const DEFAULT_MAX_STEPS = 10;

// Wire shapes only. Absent fields fall back to zero values so that the
// semantic checks below produce the specific message for each of them.
const intentSchema = z.object({
	reasoning: z.string().default(""),
	intent_type: z.string().default(""),
	requires_tools: z.boolean().default(false),
	entities: z.array(z.string()).nullable().default([]),
	complexity: z.string().default(""),
});

const planStepSchema = z.object({
	step_number: z.number().int().default(0),
	action: z.string().default(""),
	parameters: z.record(z.unknown()).nullable().default({}),
	reasoning: z.string().default(""),
	depends_on: z.array(z.number().int()).nullable().optional(),
});

const planSchema = z.object({
	steps: z.array(planStepSchema).nullable().default([]),
	expected_outcome: z.string().default(""),
});

const stepResultSchema = z.object({
	step_number: z.number().int().default(0),
	status: z.string().default(""),
	result: z.string().default(""),
	observation: z.string().default(""),
	error: z.string().default(""),
	duration_ms: z.number().default(0),
});

const validationSchema = z.object({
	intent_fulfilled: z.boolean().default(false),
	missing_information: z.array(z.string()).nullable().default([]),
	confidence: z.number().int().default(0),
	recommendation: z.string().default(""),
});

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
	return values.some((candidate) => candidate === value);
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

/** Removes markdown fences around model output. */
export function stripCodeFences(output: string): string {
	let text = output.trim();
	if (text.startsWith("```json")) {
		text = text.slice("```json".length);
	} else if (text.startsWith("```")) {
		text = text.slice(3);
	}
	if (text.endsWith("```")) {
		text = text.slice(0, -3);
	}
	return text.trim();
}

/**
 * Reduces chatty model output to the outermost `{...}` region, after removing
 * code fences. Text without a brace pair is returned fenceless and trimmed.
 */
export function cleanJsonOutput(output: string): string {
	const text = stripCodeFences(output);
	const start = text.indexOf("{");
	const end = text.lastIndexOf("}");
	if (start !== -1 && end > start) {
		return text.slice(start, end + 1);
	}
	return text;
}

function decode<S extends z.ZodTypeAny>(schema: S, output: string): ParseResult<z.output<S>> {
	let raw: unknown;
	try {
		raw = JSON.parse(cleanJsonOutput(output));
	} catch (err) {
		return { ok: false, error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
	}
	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		return { ok: false, error: `invalid JSON: ${formatIssues(parsed.error)}` };
	}
	return { ok: true, value: parsed.data };
}

export function validateIntent(output: string): ParseResult<Intent> {
	const decoded = decode(intentSchema, output);
	if (!decoded.ok) return decoded;
	const raw = decoded.value;

	const intentType: string = raw.intent_type;
	if (!isOneOf<IntentType>(INTENT_TYPES, intentType)) {
		return {
			ok: false,
			error: `invalid intent_type: ${intentType} (must be one of: ${INTENT_TYPES.join(", ")})`,
		};
	}
	const complexity: string = raw.complexity;
	if (!isOneOf<Complexity>(COMPLEXITY_LEVELS, complexity)) {
		return {
			ok: false,
			error: `invalid complexity: ${complexity} (must be one of: ${COMPLEXITY_LEVELS.join(", ")})`,
		};
	}
	if (raw.reasoning.trim() === "") {
		return { ok: false, error: "reasoning cannot be empty" };
	}

	return {
		ok: true,
		value: {
			reasoning: raw.reasoning,
			intent_type: intentType,
			requires_tools: raw.requires_tools,
			entities: raw.entities ?? [],
			complexity,
		},
	};
}

export function validatePlan(output: string, maxSteps: number = DEFAULT_MAX_STEPS): ParseResult<Plan> {
	const decoded = decode(planSchema, output);
	if (!decoded.ok) return decoded;
	const rawSteps = decoded.value.steps ?? [];

	if (rawSteps.length === 0) {
		return { ok: false, error: "plan must have at least one step" };
	}
	if (rawSteps.length > maxSteps) {
		return { ok: false, error: `plan too long: ${rawSteps.length} steps (max ${maxSteps})` };
	}
	if (decoded.value.expected_outcome.trim() === "") {
		return { ok: false, error: "expected_outcome cannot be empty" };
	}

	const steps: PlanStep[] = [];
	for (const [i, raw] of rawSteps.entries()) {
		const expected = i + 1;
		if (raw.step_number !== expected) {
			return { ok: false, error: `step numbers not sequential: expected ${expected}, got ${raw.step_number}` };
		}
		if (raw.action.trim() === "") {
			return { ok: false, error: `step ${expected}: action cannot be empty` };
		}
		if (raw.reasoning.trim() === "") {
			return { ok: false, error: `step ${expected}: reasoning cannot be empty` };
		}
		for (const dep of raw.depends_on ?? []) {
			if (dep < 1 || dep >= raw.step_number) {
				return {
					ok: false,
					error: `step ${raw.step_number}: invalid dependency ${dep} (must be between 1 and ${raw.step_number - 1})`,
				};
			}
		}

		const step: PlanStep = {
			step_number: raw.step_number,
			action: raw.action,
			parameters: raw.parameters ?? {},
			reasoning: raw.reasoning,
		};
		if (raw.depends_on) {
			step.depends_on = raw.depends_on;
		}
		steps.push(step);
	}

	return { ok: true, value: { steps, expected_outcome: decoded.value.expected_outcome } };
}

export function validateStepResult(output: string): ParseResult<StepResult> {
	const decoded = decode(stepResultSchema, output);
	if (!decoded.ok) return decoded;
	const raw = decoded.value;

	const status: string = raw.status;
	if (!isOneOf<StepStatus>(STEP_STATUSES, status)) {
		return { ok: false, error: `invalid status: ${status} (must be 'success' or 'failure')` };
	}
	if (raw.observation.trim() === "") {
		return { ok: false, error: "observation cannot be empty" };
	}

	return { ok: true, value: { ...raw, status } };
}

export function validateValidation(output: string): ParseResult<Validation> {
	const decoded = decode(validationSchema, output);
	if (!decoded.ok) return decoded;
	const raw = decoded.value;

	if (raw.confidence < 0 || raw.confidence > 100) {
		return { ok: false, error: `invalid confidence: ${raw.confidence} (must be 0-100)` };
	}
	const recommendation: string = raw.recommendation;
	if (!isOneOf<Recommendation>(RECOMMENDATIONS, recommendation)) {
		return {
			ok: false,
			error: `invalid recommendation: ${recommendation} (must be one of: ${RECOMMENDATIONS.join(", ")})`,
		};
	}

	return {
		ok: true,
		value: {
			intent_fulfilled: raw.intent_fulfilled,
			missing_information: raw.missing_information ?? [],
			confidence: raw.confidence,
			recommendation,
		},
	};
}

export function createDefaultIntent(query: string): Intent {
	return {
		reasoning: "Could not parse intent from model output",
		intent_type: "general",
		requires_tools: true,
		entities: [query],
		complexity: "simple",
	};
}

export function createDefaultValidation(allSucceeded: boolean): Validation {
	return {
		intent_fulfilled: allSucceeded,
		missing_information: [],
		confidence: allSucceeded ? 50 : 30,
		recommendation: allSucceeded ? "proceed" : "retry",
	};
}
