export type {
	AgentState,
	Complexity,
	Intent,
	IntentType,
	Phase,
	Plan,
	PlanStep,
	Recommendation,
	ReplanStrategy,
	SchedulingMode,
	StepResult,
	StepStatus,
	Validation,
} from "./types.js";
export { COMPLEXITY_LEVELS, INTENT_TYPES, PHASES, RECOMMENDATIONS, STEP_STATUSES } from "./types.js";

export {
	cleanJsonOutput,
	createDefaultIntent,
	createDefaultValidation,
	stripCodeFences,
	validateIntent,
	validatePlan,
	validateStepResult,
	validateValidation,
	type ParseResult,
} from "./validation.js";

export {
	INTENT_PARSER_PROMPT,
	buildIntentPrompt,
	buildPlannerPrompt,
	buildRetryPrompt,
	buildSynthesisPrompt,
	buildValidationPrompt,
} from "./prompts.js";

export {
	extractDynamicParams,
	extractFirstUrl,
	extractJsonField,
	extractWithRegex,
	resolvePlaceholder,
} from "./extraction.js";

export { effectiveDependencies, groupStepsByDependencies, type SchedulerOptions } from "./scheduler.js";

export {
	ExecutionEngine,
	Semaphore,
	isDeadlineAbort,
	WaveError,
	type ExecutionEngineOptions,
	type PlanExecution,
} from "./executor.js";

export {
	createBasicResponse,
	createPlan,
	parseIntent,
	synthesizeResponse,
	validateResults,
	type CallModel,
} from "./phases.js";

export {
	addError,
	addTokens,
	addWarning,
	countHallucinations,
	createAgentState,
	emptyStepResult,
	loadState,
	saveState,
	stateFilePath,
	type StateResult,
} from "./state.js";

export { OrchestratorError, type OrchestratorErrorCode } from "./errors.js";

export {
	Orchestrator,
	type OrchestratorEvent,
	type OrchestratorOptions,
	type QueryOptions,
	type QueryResult,
} from "./orchestrator.js";
