import type { Provider } from "../providers/types.js";
import type { ConfirmationHandler } from "../tools/confirmation.js";
import type { ToolRegistry } from "../tools/registry.js";
import { bufferStream } from "../utils/channel.js";
import { OrchestratorError } from "./errors.js";
import { abortError, DEADLINE_EXCEEDED, DEFAULT_MAX_CONCURRENCY, DEFAULT_STEP_TIMEOUT_MS, ExecutionEngine } from "./executor.js";
import {
	allStepsSucceeded,
	createBasicResponse,
	createPlan,
	parseIntent,
	synthesizeResponse,
	validateResults,
	type CallModel,
} from "./phases.js";
import { addError, addTokens, addWarning, createAgentState, saveState } from "./state.js";
import type {
	AgentState,
	Intent,
	Phase,
	Plan,
	ReplanStrategy,
	SchedulingMode,
	StepResult,
	Validation,
} from "./types.js";
import { createDefaultIntent, createDefaultValidation, DEFAULT_MAX_STEPS } from "./validation.js";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_STREAM_BUFFER = 64;

export type OrchestratorEvent =
	| { type: "phase"; phase: Phase; attempt: number }
	| { type: "step"; result: StepResult }
	| { type: "thinking"; phase: Phase; text: string }
	| { type: "warning"; message: string }
	| { type: "state_saved"; path: string };

export interface OrchestratorOptions {
	provider: Provider;
	registry: ToolRegistry;
	/** Extra attempts after the first; also bounds the in-phase validator retries */
	maxRetries?: number;
	maxSteps?: number;
	/** Where `<session_id>.json` is written; defaults to the OS temp dir */
	stateDir?: string;
	/** Run independent steps concurrently, wave by wave */
	enableParallel?: boolean;
	schedulingMode?: SchedulingMode;
	maxConcurrency?: number;
	stepTimeoutMs?: number;
	/** Chunks a provider stream may run ahead of the consumer */
	streamBuffer?: number;
	replanStrategy?: ReplanStrategy;
	approve?: ConfirmationHandler;
	onEvent?: (event: OrchestratorEvent) => void;
	verbose?: boolean;
}

export interface QueryOptions {
	signal?: AbortSignal;
}

export interface QueryResult {
	response: string;
	state: AgentState;
}

function messageOf(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Drives one query through intent, planning, execution, validation and
 * synthesis. The registry is sealed on the first query; the orchestrator
 * itself holds no per-query state, so queries may run concurrently.
 */
export class Orchestrator {
	private readonly _provider: Provider;
	private readonly _registry: ToolRegistry;
	private readonly _maxRetries: number;
	private readonly _maxSteps: number;
	private readonly _stateDir?: string;
	private readonly _enableParallel: boolean;
	private readonly _streamBuffer: number;
	private readonly _replanStrategy: ReplanStrategy;
	private readonly _onEvent?: (event: OrchestratorEvent) => void;
	private readonly _verbose: boolean;
	private readonly _engine: ExecutionEngine;

	constructor(options: OrchestratorOptions) {
		this._provider = options.provider;
		this._registry = options.registry;
		this._maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
		this._maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
		this._stateDir = options.stateDir;
		this._enableParallel = options.enableParallel ?? false;
		this._streamBuffer = options.streamBuffer ?? DEFAULT_STREAM_BUFFER;
		this._replanStrategy = options.replanStrategy ?? "restart";
		this._onEvent = options.onEvent;
		this._verbose = options.verbose ?? false;
		this._engine = new ExecutionEngine({
			registry: options.registry,
			maxConcurrency: options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY,
			stepTimeoutMs: options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS,
			schedulingMode: options.schedulingMode,
			approve: options.approve,
			onStepStart: (step) => this._log(`Step ${step.step_number}: ${step.action}`),
			onStepComplete: (result) => this._emit({ type: "step", result }),
		});
	}

	get provider(): Provider {
		return this._provider;
	}

	get registry(): ToolRegistry {
		return this._registry;
	}

	/**
	 * Resolves with the answer and the final state. Rejects with an
	 * OrchestratorError when planning fails or `signal` aborts (`CANCELLED`, or
	 * `DEADLINE_EXCEEDED` for a timeout reason); the state is saved either way.
	 */
	async processQuery(query: string, options: QueryOptions = {}): Promise<QueryResult> {
		const signal = options.signal ?? new AbortController().signal;
		this._registry.seal();

		const state = createAgentState(query);
		try {
			const response = await this._run(query, state, signal);
			return { response, state };
		} finally {
			await this._save(state);
		}
	}

	private async _run(query: string, state: AgentState, signal: AbortSignal): Promise<string> {
		let pinnedIntent: Intent | undefined;

		for (let attempt = 0; attempt <= this._maxRetries; attempt++) {
			state.retry_count = attempt;
			this._throwIfCancelled(state, signal);

			let intent: Intent;
			if (pinnedIntent) {
				intent = pinnedIntent;
			} else {
				await this._enterPhase(state, "intent", attempt);
				intent = await this._intentPhase(query, state, signal);
			}
			state.intent = intent;

			await this._enterPhase(state, "planning", attempt);
			const plan = await this._planningPhase(intent, state, signal);
			state.plan = plan;

			await this._enterPhase(state, "execution", attempt);
			const execution = await this._engine.executePlan(plan, signal, this._enableParallel);
			state.step_results = execution.results;
			this._throwIfCancelled(state, signal);
			if (execution.error) {
				addError(state, execution.error);
				this._warn(state, "Execution stopped after a failed wave, validating partial results");
			}

			await this._enterPhase(state, "validation", attempt);
			const validation = await this._validationPhase(intent, plan, state, signal);
			state.validation = validation;

			if (validation.recommendation === "proceed") {
				break;
			}
			if (attempt < this._maxRetries) {
				if (validation.recommendation === "replan") {
					this._warn(state, `Replanning (attempt ${attempt + 1}/${this._maxRetries})`);
					pinnedIntent = this._replanStrategy === "keep-intent" ? intent : undefined;
				} else {
					this._warn(state, `Retrying execution (attempt ${attempt + 1}/${this._maxRetries})`);
					pinnedIntent = undefined;
				}
				continue;
			}
			this._warn(state, `Max retries reached (${this._maxRetries}), proceeding with current results`);
		}

		await this._enterPhase(state, "synthesis", state.retry_count);
		const response = await this._synthesisPhase(query, state, signal);
		state.final_response = response;
		return response;
	}

	private async _intentPhase(query: string, state: AgentState, signal: AbortSignal): Promise<Intent> {
		try {
			const parsed = await parseIntent(query, this._modelCaller(state, signal), {
				maxAttempts: this._maxRetries,
				onRejected: ({ attempt, error }) => this._warn(state, `Intent attempt ${attempt} rejected: ${error}`),
			});
			if (parsed.ok) return parsed.value;
			addError(state, parsed.error);
			this._warn(state, `Intent parsing failed, using default: ${parsed.error}`);
		} catch (err) {
			this._throwIfCancelled(state, signal);
			addError(state, err);
			this._warn(state, `Intent parsing failed, using default: ${messageOf(err)}`);
		}
		return createDefaultIntent(query);
	}

	private async _planningPhase(intent: Intent, state: AgentState, signal: AbortSignal): Promise<Plan> {
		let failure: string;
		let details: unknown;
		try {
			const parsed = await createPlan(intent, this._registry.toolDefinitions(), this._modelCaller(state, signal), {
				maxAttempts: this._maxRetries,
				maxSteps: this._maxSteps,
				onRejected: ({ attempt, error }) => this._warn(state, `Plan attempt ${attempt} rejected: ${error}`),
			});
			if (parsed.ok) return parsed.value;
			failure = parsed.error;
		} catch (err) {
			this._throwIfCancelled(state, signal);
			failure = messageOf(err);
			details = err;
		}

		addError(state, failure);
		throw new OrchestratorError(`planning failed: ${failure}`, "PLANNING_FAILED", state, details);
	}

	private async _validationPhase(
		intent: Intent,
		plan: Plan,
		state: AgentState,
		signal: AbortSignal,
	): Promise<Validation> {
		try {
			const outcome = await validateResults(intent, plan, state.step_results, this._modelCaller(state, signal));
			if (outcome.fallbackReason) {
				this._warn(state, `Validation failed, using default: ${outcome.fallbackReason}`);
			}
			return outcome.validation;
		} catch (err) {
			this._throwIfCancelled(state, signal);
			addError(state, err);
			this._warn(state, `Validation failed, using default: ${messageOf(err)}`);
			return createDefaultValidation(allStepsSucceeded(state.step_results));
		}
	}

	private async _synthesisPhase(query: string, state: AgentState, signal: AbortSignal): Promise<string> {
		try {
			return await synthesizeResponse(query, state.step_results, this._modelCaller(state, signal));
		} catch (err) {
			this._throwIfCancelled(state, signal);
			addError(state, err);
			this._warn(state, `Synthesis failed, using basic response: ${messageOf(err)}`);
			return createBasicResponse(state.step_results);
		}
	}

	/**
	 * Streams one single-turn chat through the bounded buffer. Visible text is
	 * collected, thinking is forwarded as events, usage is added to the state.
	 * A provider failure, thrown or in-band, rejects.
	 */
	private _modelCaller(state: AgentState, signal: AbortSignal): CallModel {
		return async (prompt) => {
			const stream = this._provider.chat([{ role: "user", content: prompt }], undefined, { signal });
			let text = "";
			for await (const chunk of bufferStream(stream, this._streamBuffer)) {
				if (chunk.usage) addTokens(state, chunk.usage.totalTokens);
				if (chunk.thinking) this._emit({ type: "thinking", phase: state.current_phase, text: chunk.thinking });
				if (chunk.delta) text += chunk.delta;
				if (chunk.error) throw chunk.error;
			}
			return text;
		};
	}

	private async _enterPhase(state: AgentState, phase: Phase, attempt: number): Promise<void> {
		await this._save(state);
		state.current_phase = phase;
		this._log(`Phase: ${phase} (attempt ${attempt + 1}/${this._maxRetries + 1})`);
		this._emit({ type: "phase", phase, attempt });
	}

	private _throwIfCancelled(state: AgentState, signal: AbortSignal): void {
		if (!signal.aborted) return;
		const reason = abortError(signal);
		addError(state, `execution cancelled: ${reason}`);
		const code = reason === DEADLINE_EXCEEDED ? "DEADLINE_EXCEEDED" : "CANCELLED";
		throw new OrchestratorError(`query cancelled: ${reason}`, code, state, signal.reason);
	}

	private async _save(state: AgentState): Promise<void> {
		const saved = await saveState(state, this._stateDir);
		if (saved.success && saved.data) {
			this._emit({ type: "state_saved", path: saved.data });
		} else {
			this._warn(state, saved.error ?? "Failed to save state");
		}
	}

	private _warn(state: AgentState, message: string): void {
		addWarning(state, message);
		this._emit({ type: "warning", message });
		if (this._verbose) {
			console.warn(`[Orchestrator] ${message}`);
		}
	}

	private _log(message: string): void {
		if (this._verbose) {
			console.log(`[Orchestrator] ${message}`);
		}
	}

	private _emit(event: OrchestratorEvent): void {
		this._onEvent?.(event);
	}
}
