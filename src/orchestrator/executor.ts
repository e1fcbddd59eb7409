import type { ConfirmationHandler } from "../tools/confirmation.js";
import type { ToolRegistry } from "../tools/registry.js";
import { extractDynamicParams } from "./extraction.js";
import { groupStepsByDependencies } from "./scheduler.js";
import { emptyStepResult } from "./state.js";
import type { Plan, PlanStep, SchedulingMode, StepResult } from "./types.js";

export const DEFAULT_MAX_CONCURRENCY = 3;
export const DEFAULT_STEP_TIMEOUT_MS = 30_000;

export const DEADLINE_EXCEEDED = "context deadline exceeded";
export const CANCELED = "context canceled";

/** Aggregate failure of one wave: how many steps failed and the first error. */
export class WaveError extends Error {
	readonly code = "WAVE_FAILED";

	constructor(
		readonly failures: string[],
		readonly wave: number,
	) {
		super(`wave execution failed: ${failures.length} errors: ${failures[0] ?? "unknown error"}`);
		this.name = "WaveError";
	}
}

export class Semaphore {
	private _permits: number;
	private _queue: Array<() => void> = [];

	constructor(permits: number) {
		if (permits < 1) throw new RangeError("semaphore needs at least one permit");
		this._permits = permits;
	}

	async acquire(): Promise<() => void> {
		if (this._permits > 0) {
			this._permits--;
			return () => this._release();
		}

		return new Promise((resolve) => {
			this._queue.push(() => {
				this._permits--;
				resolve(() => this._release());
			});
		});
	}

	private _release(): void {
		this._permits++;
		const next = this._queue.shift();
		if (next) {
			next();
		}
	}
}

class StepInterrupted extends Error {
	constructor() {
		super("step interrupted");
		this.name = "StepInterrupted";
	}
}

/** Settles with `work`, or rejects as soon as `signal` aborts; `work` keeps its handlers either way. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(new StepInterrupted());
		if (signal.aborted) {
			onAbort();
		} else {
			signal.addEventListener("abort", onAbort, { once: true });
		}
		void work.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
	});
}

/** True when `signal` was aborted by a deadline such as `AbortSignal.timeout`. */
export function isDeadlineAbort(signal: AbortSignal): boolean {
	const reason: unknown = signal.reason;
	return signal.aborted && typeof reason === "object" && reason !== null && "name" in reason && reason.name === "TimeoutError";
}

/** Error string for an aborted query signal. */
export function abortError(signal: AbortSignal): string {
	return isDeadlineAbort(signal) ? DEADLINE_EXCEEDED : CANCELED;
}

function describeThrown(value: unknown): string {
	return value instanceof Error ? value.message : String(value);
}

export interface ExecutionEngineOptions {
	registry: ToolRegistry;
	/** Steps in flight per wave */
	maxConcurrency?: number;
	stepTimeoutMs?: number;
	/** How the scheduler reads omitted or empty `depends_on` */
	schedulingMode?: SchedulingMode;
	approve?: ConfirmationHandler;
	onStepStart?: (step: PlanStep) => void;
	onStepComplete?: (result: StepResult) => void;
	onOutput?: (step: number, text: string) => void;
}

export interface PlanExecution {
	results: StepResult[];
	/** Set when a wave had failures; later waves did not run */
	error?: WaveError;
}

export class ExecutionEngine {
	private readonly _registry: ToolRegistry;
	private readonly _maxConcurrency: number;
	private readonly _stepTimeoutMs: number;
	private readonly _mode: SchedulingMode;
	private readonly _options: ExecutionEngineOptions;

	constructor(options: ExecutionEngineOptions) {
		this._registry = options.registry;
		this._maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
		this._stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
		this._mode = options.schedulingMode ?? "sequential";
		this._options = options;
	}

	/**
	 * Runs every step of `plan`. In parallel mode steps go wave by wave and a
	 * wave with failures stops the plan; otherwise they run one after another
	 * and a failure does not stop the next step. Cancellation stops new steps
	 * from starting; their slots keep the zero value.
	 */
	async executePlan(plan: Plan, signal: AbortSignal, parallel: boolean): Promise<PlanExecution> {
		const results = plan.steps.map(() => emptyStepResult());

		if (!parallel) {
			for (const step of plan.steps) {
				if (signal.aborted) break;
				results[step.step_number - 1] = await this.executeStep(step, results, signal);
			}
			return { results };
		}

		const waves = groupStepsByDependencies(plan.steps, { mode: this._mode });
		for (const [index, wave] of waves.entries()) {
			if (signal.aborted) break;
			const error = await this.runWave(wave, results, signal, index + 1);
			if (error) {
				return { results, error };
			}
		}
		return { results };
	}

	/**
	 * Runs one wave with at most `maxConcurrency` steps in flight. Every step
	 * runs to completion or timeout regardless of its peers. Each writes only
	 * its own slot, `results[step_number - 1]`.
	 */
	async runWave(
		steps: PlanStep[],
		results: StepResult[],
		signal: AbortSignal,
		wave = 1,
	): Promise<WaveError | undefined> {
		const semaphore = new Semaphore(this._maxConcurrency);
		const failures: string[] = [];

		await Promise.all(
			steps.map(async (step) => {
				const release = await semaphore.acquire();
				try {
					if (signal.aborted) {
						failures.push(abortError(signal));
						return;
					}
					const result = await this.executeStep(step, results, signal);
					results[step.step_number - 1] = result;
					if (result.status === "failure") {
						failures.push(result.error);
					}
				} finally {
					release();
				}
			}),
		);

		return failures.length > 0 ? new WaveError(failures, wave) : undefined;
	}

	/**
	 * Executes a single step under its own deadline. Never rejects: failures,
	 * timeouts, cancellation and exceptions thrown by the tool all come back
	 * as a failed StepResult.
	 */
	async executeStep(step: PlanStep, results: StepResult[], signal: AbortSignal): Promise<StepResult> {
		const started = Date.now();
		const controller = new AbortController();
		let timedOut = false;
		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, this._stepTimeoutMs);
		const onAbort = () => controller.abort();
		signal.addEventListener("abort", onAbort, { once: true });
		if (signal.aborted) controller.abort();

		const finish = (fields: Pick<StepResult, "status" | "result" | "observation" | "error">): StepResult => ({
			step_number: step.step_number,
			...fields,
			duration_ms: Date.now() - started,
		});

		this._options.onStepStart?.(step);

		let result: StepResult;
		try {
			if (controller.signal.aborted) throw new StepInterrupted();
			const params = extractDynamicParams(step.parameters, results.slice(0, step.step_number - 1));
			const onOutput = this._options.onOutput;
			const outcome = await untilAborted(
				this._registry.execute(step.action, JSON.stringify(params), {
					signal: controller.signal,
					approve: this._options.approve,
					onOutput: onOutput ? (text) => onOutput(step.step_number, text) : undefined,
				}),
				controller.signal,
			);

			if (outcome.success) {
				result = finish({
					status: "success",
					result: outcome.output ?? "",
					observation: `Executed ${step.action} successfully`,
					error: "",
				});
			} else {
				const error = outcome.error || "tool reported failure without an error message";
				result = finish({ status: "failure", result: outcome.output ?? "", observation: `Step failed: ${error}`, error });
			}
		} catch (err) {
			if (controller.signal.aborted) {
				const error = timedOut ? DEADLINE_EXCEEDED : abortError(signal);
				result = finish({ status: "failure", result: "", observation: `Step failed: ${error}`, error });
			} else {
				const value = describeThrown(err);
				result = finish({ status: "failure", result: "", observation: `Panic: ${value}`, error: `panic: ${value}` });
			}
		} finally {
			clearTimeout(timer);
			signal.removeEventListener("abort", onAbort);
		}

		this._options.onStepComplete?.(result);
		return result;
	}
}
