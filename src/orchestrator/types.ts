export const INTENT_TYPES = [
	"search",
	"fetch",
	"analyze",
	"execute",
	"create",
	"modify",
	"deep_research",
	"general",
] as const;

export const COMPLEXITY_LEVELS = ["simple", "moderate", "complex"] as const;

export const STEP_STATUSES = ["success", "failure"] as const;

export const RECOMMENDATIONS = ["proceed", "retry", "replan"] as const;

export const PHASES = ["init", "intent", "planning", "execution", "validation", "synthesis"] as const;

export type IntentType = (typeof INTENT_TYPES)[number];
export type Complexity = (typeof COMPLEXITY_LEVELS)[number];
export type StepStatus = (typeof STEP_STATUSES)[number];
export type Recommendation = (typeof RECOMMENDATIONS)[number];
export type Phase = (typeof PHASES)[number];

export interface Intent {
	reasoning: string;
	intent_type: IntentType;
	requires_tools: boolean;
	entities: string[];
	complexity: Complexity;
}

export interface PlanStep {
	step_number: number;
	action: string;
	parameters: Record<string, unknown>;
	reasoning: string;
	/** 1-based numbers of earlier steps; omitted means "after the previous step" */
	depends_on?: number[];
}

export interface Plan {
	steps: PlanStep[];
	expected_outcome: string;
}

/**
 * Outcome of one plan step. A slot for a step that never ran holds the
 * zero value: step_number 0 and an empty status.
 */
export interface StepResult {
	step_number: number;
	status: StepStatus | "";
	result: string;
	observation: string;
	error: string;
	duration_ms: number;
}

export interface Validation {
	intent_fulfilled: boolean;
	missing_information: string[];
	confidence: number;
	recommendation: Recommendation;
}

/** One query's lifecycle; serialized as-is, so field names stay snake_case. */
export interface AgentState {
	session_id: string;
	original_query: string;
	timestamp: string;
	current_phase: Phase;
	intent?: Intent;
	plan?: Plan;
	step_results: StepResult[];
	validation?: Validation;
	final_response: string;
	retry_count: number;
	total_tokens: number;
	errors: string[];
	warnings: string[];
}

export type SchedulingMode = "sequential" | "parallel";

export type ReplanStrategy = "restart" | "keep-intent";
