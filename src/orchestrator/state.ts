import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { z } from "zod";
import {
	COMPLEXITY_LEVELS,
	INTENT_TYPES,
	PHASES,
	RECOMMENDATIONS,
	STEP_STATUSES,
	type AgentState,
	type StepResult,
} from "./types.js";

export interface StateResult<T> {
	success: boolean;
	data?: T;
	error?: string;
}

const intentSchema = z.object({
	reasoning: z.string(),
	intent_type: z.enum(INTENT_TYPES),
	requires_tools: z.boolean(),
	entities: z.array(z.string()),
	complexity: z.enum(COMPLEXITY_LEVELS),
});

const planSchema = z.object({
	steps: z.array(
		z.object({
			step_number: z.number().int(),
			action: z.string(),
			parameters: z.record(z.unknown()),
			reasoning: z.string(),
			depends_on: z.array(z.number().int()).optional(),
		}),
	),
	expected_outcome: z.string(),
});

const stepResultSchema = z.object({
	step_number: z.number().int().nonnegative(),
	status: z.union([z.enum(STEP_STATUSES), z.literal("")]),
	result: z.string(),
	observation: z.string(),
	error: z.string(),
	duration_ms: z.number().nonnegative(),
});

const agentStateSchema = z.object({
	session_id: z.string().min(1),
	original_query: z.string(),
	timestamp: z.string(),
	current_phase: z.enum(PHASES),
	intent: intentSchema.optional(),
	plan: planSchema.optional(),
	step_results: z.array(stepResultSchema),
	validation: z
		.object({
			intent_fulfilled: z.boolean(),
			missing_information: z.array(z.string()),
			confidence: z.number().int().min(0).max(100),
			recommendation: z.enum(RECOMMENDATIONS),
		})
		.optional(),
	final_response: z.string(),
	retry_count: z.number().int().nonnegative(),
	total_tokens: z.number().int().nonnegative(),
	errors: z.array(z.string()),
	warnings: z.array(z.string()),
});

export function createAgentState(query: string, sessionId: string = randomUUID()): AgentState {
	return {
		session_id: sessionId,
		original_query: query,
		timestamp: new Date().toISOString(),
		current_phase: "init",
		step_results: [],
		final_response: "",
		retry_count: 0,
		total_tokens: 0,
		errors: [],
		warnings: [],
	};
}

export function emptyStepResult(): StepResult {
	return { step_number: 0, status: "", result: "", observation: "", error: "", duration_ms: 0 };
}

export function addError(state: AgentState, error: unknown): void {
	const message = error instanceof Error ? error.message : String(error);
	state.errors.push(`[${state.current_phase}] ${message}`);
}

export function addWarning(state: AgentState, warning: string): void {
	state.warnings.push(`[${state.current_phase}] ${warning}`);
}

export function addTokens(state: AgentState, tokens: number): void {
	if (!Number.isFinite(tokens) || tokens < 0) {
		throw new RangeError(`token count must be a non-negative number, got ${tokens}`);
	}
	state.total_tokens += tokens;
}

/** Step observations that point at a tool the model made up or misused. */
export function countHallucinations(state: AgentState): number {
	return state.step_results.filter(
		(r) => r.observation.includes("unknown tool") || r.observation.includes("invalid arguments"),
	).length;
}

export function stateFilePath(state: Pick<AgentState, "session_id">, dir?: string): string {
	return path.join(dir || tmpdir(), `${path.basename(state.session_id)}.json`);
}

/**
 * Writes `<session_id>.json` through a temp file and a rename, so a reader
 * never sees a half-written state. Failures are reported, never thrown.
 */
export async function saveState(state: AgentState, dir?: string): Promise<StateResult<string>> {
	const filePath = stateFilePath(state, dir);
	const tempPath = `${filePath}.tmp.${Math.random().toString(36).slice(2, 11)}`;

	try {
		await fs.mkdir(path.dirname(filePath), { recursive: true });
		await fs.writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`, "utf-8");
		await fs.rename(tempPath, filePath);
		return { success: true, data: filePath };
	} catch (err) {
		await fs.rm(tempPath, { force: true }).catch(() => undefined);
		return { success: false, error: `Failed to write state file: ${err instanceof Error ? err.message : String(err)}` };
	}
}

export async function loadState(filePath: string): Promise<StateResult<AgentState>> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf-8");
	} catch (err) {
		return { success: false, error: `Failed to read state file: ${err instanceof Error ? err.message : String(err)}` };
	}

	let data: unknown;
	try {
		data = JSON.parse(content);
	} catch {
		return { success: false, error: `Invalid JSON in state file: ${filePath}` };
	}

	const parsed = agentStateSchema.safeParse(data);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
		return { success: false, error: `Invalid state file format: ${issues.join("; ")}` };
	}
	return { success: true, data: parsed.data };
}
