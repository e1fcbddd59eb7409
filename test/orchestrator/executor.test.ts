import { describe, expect, it, vi } from "vitest";
import { ExecutionEngine, isDeadlineAbort, Semaphore, WaveError } from "../../src/orchestrator/executor.js";
import { emptyStepResult } from "../../src/orchestrator/state.js";
import type { Plan, PlanStep, StepResult } from "../../src/orchestrator/types.js";
import { denyAll } from "../../src/tools/confirmation.js";
import { ToolRegistry } from "../../src/tools/registry.js";
import type { Tool } from "../../src/tools/types.js";
import { createTool, delay, echoTool } from "../fixtures/tools.js";

function step(n: number, action: string, parameters: Record<string, unknown> = {}, dependsOn?: number[]): PlanStep {
	const planStep: PlanStep = { step_number: n, action, parameters, reasoning: `step ${n}` };
	if (dependsOn) planStep.depends_on = dependsOn;
	return planStep;
}

function plan(...steps: PlanStep[]): Plan {
	return { steps, expected_outcome: "done" };
}

function signal(): AbortSignal {
	return new AbortController().signal;
}

function registryWith(...tools: Tool[]): ToolRegistry {
	const registry = new ToolRegistry();
	registry.registerMany(tools);
	return registry;
}

describe("Semaphore", () => {
	it("needs at least one permit", () => {
		expect(() => new Semaphore(0)).toThrow(RangeError);
	});

	it("hands permits to waiters in order", async () => {
		const semaphore = new Semaphore(1);
		const order: string[] = [];
		const releaseFirst = await semaphore.acquire();

		const second = semaphore.acquire().then((release) => {
			order.push("second");
			return release;
		});
		const third = semaphore.acquire().then((release) => {
			order.push("third");
			release();
		});

		order.push("first");
		releaseFirst();
		(await second)();
		await third;

		expect(order).toEqual(["first", "second", "third"]);
	});
});

describe("isDeadlineAbort", () => {
	it("tells a timeout from a plain abort", async () => {
		const cancelled = new AbortController();
		cancelled.abort();
		const expired = AbortSignal.timeout(1);
		await delay(20);

		expect(isDeadlineAbort(expired)).toBe(true);
		expect(isDeadlineAbort(cancelled.signal)).toBe(false);
		expect(isDeadlineAbort(signal())).toBe(false);
	});
});

describe("ExecutionEngine.executeStep", () => {
	it("records a successful tool call", async () => {
		const engine = new ExecutionEngine({ registry: registryWith(echoTool()) });
		const result = await engine.executeStep(step(1, "echo", { input: "hi" }), [], signal());

		expect(result).toMatchObject({
			step_number: 1,
			status: "success",
			result: "echo: hi",
			observation: "Executed echo successfully",
			error: "",
		});
		expect(result.duration_ms).toBeGreaterThanOrEqual(0);
	});

	it("resolves placeholders from earlier results", async () => {
		const fetch = vi.fn(async (args: Record<string, unknown>) => ({ success: true, output: `page at ${String(args.url)}` }));
		const engine = new ExecutionEngine({
			registry: registryWith(createTool("web_fetch", fetch, { parameters: { type: "object", properties: { url: { type: "string" } } } })),
		});
		const earlier: StepResult[] = [
			{ ...emptyStepResult(), step_number: 1, status: "success", result: "top hit: https://example.com/releases" },
			emptyStepResult(),
		];

		const result = await engine.executeStep(step(2, "web_fetch", { url: "$EXTRACT_URL_FROM_STEP_1" }), earlier, signal());

		expect(fetch.mock.calls[0]?.[0]).toEqual({ url: "https://example.com/releases" });
		expect(result.result).toBe("page at https://example.com/releases");
	});

	it("turns a failed tool result into a failed step", async () => {
		const engine = new ExecutionEngine({
			registry: registryWith(createTool("lookup", async () => ({ success: false, output: "partial", error: "not found" }))),
		});
		await expect(engine.executeStep(step(1, "lookup"), [], signal())).resolves.toMatchObject({
			status: "failure",
			result: "partial",
			observation: "Step failed: not found",
			error: "not found",
		});
	});

	it("supplies an error message when the tool gives none", async () => {
		const engine = new ExecutionEngine({ registry: registryWith(createTool("quiet", async () => ({ success: false }))) });
		const result = await engine.executeStep(step(1, "quiet"), [], signal());
		expect(result.error).toBe("tool reported failure without an error message");
	});

	it("reports unknown tools", async () => {
		const engine = new ExecutionEngine({ registry: registryWith() });
		await expect(engine.executeStep(step(1, "quantum_search"), [], signal())).resolves.toMatchObject({
			step_number: 1,
			status: "failure",
			observation: "Step failed: unknown tool: quantum_search",
			error: "unknown tool: quantum_search",
		});
	});

	it("isolates exceptions thrown by a tool", async () => {
		const engine = new ExecutionEngine({
			registry: registryWith(
				createTool("crash", async () => {
					throw new Error("nil map");
				}),
			),
		});
		await expect(engine.executeStep(step(1, "crash"), [], signal())).resolves.toMatchObject({
			status: "failure",
			result: "",
			observation: "Panic: nil map",
			error: "panic: nil map",
		});
	});

	it("enforces the step timeout", async () => {
		const engine = new ExecutionEngine({
			registry: registryWith(
				createTool("slow", async () => {
					await delay(1000);
					return { success: true, output: "late" };
				}),
			),
			stepTimeoutMs: 20,
		});
		await expect(engine.executeStep(step(1, "slow"), [], signal())).resolves.toMatchObject({
			status: "failure",
			observation: "Step failed: context deadline exceeded",
			error: "context deadline exceeded",
		});
	});

	it("reports a query deadline shorter than the step timeout as exceeded", async () => {
		const engine = new ExecutionEngine({
			registry: registryWith(
				createTool("slow", async (_args, context) => {
					await delay(2000, context.signal);
					return { success: true };
				}),
			),
		});

		await expect(engine.executeStep(step(1, "slow"), [], AbortSignal.timeout(50))).resolves.toMatchObject({
			status: "failure",
			observation: "Step failed: context deadline exceeded",
			error: "context deadline exceeded",
		});
	});

	it("passes the step deadline to the tool", async () => {
		let toolSignal: AbortSignal | undefined;
		const engine = new ExecutionEngine({
			registry: registryWith(
				createTool("watch", async (_args, context) => {
					toolSignal = context.signal;
					await delay(1000, context.signal);
					return { success: true };
				}),
			),
			stepTimeoutMs: 20,
		});
		await engine.executeStep(step(1, "watch"), [], signal());
		expect(toolSignal?.aborted).toBe(true);
	});

	it("does not start a tool once the query is cancelled", async () => {
		const execute = vi.fn(async () => ({ success: true }));
		const engine = new ExecutionEngine({ registry: registryWith(createTool("never", execute)) });
		const controller = new AbortController();
		controller.abort();

		await expect(engine.executeStep(step(1, "never"), [], controller.signal)).resolves.toMatchObject({
			status: "failure",
			error: "context canceled",
		});
		expect(execute).not.toHaveBeenCalled();
	});

	it("forwards approval and streamed output", async () => {
		const outputs: Array<[number, string]> = [];
		const engine = new ExecutionEngine({
			registry: registryWith(
				createTool(
					"talk",
					async (_args, context) => {
						context.onOutput?.("line 1");
						return { success: true, output: "line 1" };
					},
				),
				createTool("rm", async () => ({ success: true }), { dangerous: "Deletes files" }),
			),
			approve: denyAll,
			onOutput: (stepNumber, text) => outputs.push([stepNumber, text]),
		});

		await engine.executeStep(step(3, "talk"), [], signal());
		const denied = await engine.executeStep(step(4, "rm"), [], signal());

		expect(outputs).toEqual([[3, "line 1"]]);
		expect(denied.error).toBe("User declined confirmation for rm");
	});

	it("notifies step start and completion", async () => {
		const onStepStart = vi.fn();
		const onStepComplete = vi.fn();
		const engine = new ExecutionEngine({ registry: registryWith(echoTool()), onStepStart, onStepComplete });
		const planned = step(1, "echo");

		const result = await engine.executeStep(planned, [], signal());

		expect(onStepStart).toHaveBeenCalledWith(planned);
		expect(onStepComplete).toHaveBeenCalledWith(result);
	});
});

describe("ExecutionEngine.executePlan", () => {
	it("runs every step sequentially, even after a failure", async () => {
		const engine = new ExecutionEngine({ registry: registryWith(echoTool()) });
		const { results, error } = await engine.executePlan(
			plan(step(1, "quantum_search"), step(2, "echo", { input: "still runs" })),
			signal(),
			false,
		);

		expect(error).toBeUndefined();
		expect(results.map((r) => [r.step_number, r.status])).toEqual([
			[1, "failure"],
			[2, "success"],
		]);
	});

	it("stops starting steps after cancellation and leaves zero-value slots", async () => {
		const controller = new AbortController();
		const engine = new ExecutionEngine({
			registry: registryWith(
				echoTool(),
				createTool("wait", async (_args, context) => {
					await delay(5000, context.signal);
					return { success: true };
				}),
			),
		});
		setTimeout(() => controller.abort(), 20);

		const { results } = await engine.executePlan(
			plan(step(1, "echo"), step(2, "wait"), step(3, "echo")),
			controller.signal,
			false,
		);

		expect(results).toHaveLength(3);
		expect(results[0]?.status).toBe("success");
		expect(results[1]).toMatchObject({ step_number: 2, status: "failure", error: "context canceled" });
		expect(results[2]).toEqual(emptyStepResult());
	});

	it("runs steps that share a dependency as one concurrent wave", async () => {
		const slow = createTool("slow", async () => {
			await delay(100);
			return { success: true, output: "ok" };
		});
		const engine = new ExecutionEngine({ registry: registryWith(echoTool(), slow) });
		const started = Date.now();

		const { results, error } = await engine.executePlan(
			plan(step(1, "echo"), step(2, "slow", {}, [1]), step(3, "slow", {}, [1]), step(4, "slow", {}, [1])),
			signal(),
			true,
		);

		expect(error).toBeUndefined();
		expect(results.map((r) => r.step_number)).toEqual([1, 2, 3, 4]);
		expect(results.every((r) => r.status === "success")).toBe(true);
		expect(Date.now() - started).toBeLessThan(280);
	});

	it("caps the number of steps in flight", async () => {
		let inFlight = 0;
		let peak = 0;
		const tracked = createTool("tracked", async () => {
			inFlight++;
			peak = Math.max(peak, inFlight);
			await delay(20);
			inFlight--;
			return { success: true };
		});
		const engine = new ExecutionEngine({
			registry: registryWith(tracked),
			maxConcurrency: 2,
			schedulingMode: "parallel",
		});

		const steps = [1, 2, 3, 4, 5].map((n) => step(n, "tracked", {}, []));
		const { results } = await engine.executePlan(plan(...steps), signal(), true);

		expect(peak).toBe(2);
		expect(results.every((r) => r.status === "success")).toBe(true);
	});

	it("finishes a wave despite failures and skips the waves after it", async () => {
		const engine = new ExecutionEngine({ registry: registryWith(echoTool()), schedulingMode: "parallel" });

		const { results, error } = await engine.executePlan(
			plan(step(1, "quantum_search", {}, []), step(2, "echo", {}, []), step(3, "echo", {}, [1])),
			signal(),
			true,
		);

		expect(error).toBeInstanceOf(WaveError);
		expect(error?.message).toBe("wave execution failed: 1 errors: unknown tool: quantum_search");
		expect(error?.wave).toBe(1);
		expect(error?.code).toBe("WAVE_FAILED");
		expect(results[0]?.status).toBe("failure");
		expect(results[1]?.status).toBe("success");
		expect(results[2]).toEqual(emptyStepResult());
	});

	it("reports how many steps of a wave failed", async () => {
		const engine = new ExecutionEngine({ registry: registryWith() });
		const results = [emptyStepResult(), emptyStepResult()];

		const error = await engine.runWave([step(1, "a"), step(2, "b")], results, signal(), 2);

		expect(error?.failures).toEqual(["unknown tool: a", "unknown tool: b"]);
		expect(error?.message).toBe("wave execution failed: 2 errors: unknown tool: a");
		expect(error?.wave).toBe(2);
	});
});
