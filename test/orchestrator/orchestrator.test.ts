import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { OrchestratorError } from "../../src/orchestrator/errors.js";
import { Orchestrator, type OrchestratorEvent, type OrchestratorOptions } from "../../src/orchestrator/orchestrator.js";
import { countHallucinations, emptyStepResult, loadState, stateFilePath } from "../../src/orchestrator/state.js";
import { ProviderError } from "../../src/providers/errors.js";
import { ToolRegistry } from "../../src/tools/registry.js";
import type { Tool } from "../../src/tools/types.js";
import { ScriptedProvider, type ScriptedReply } from "../fixtures/scripted-provider.js";
import { createTool, delay, echoTool } from "../fixtures/tools.js";

function intentReply(overrides: Record<string, unknown> = {}): string {
	return JSON.stringify({
		reasoning: "User wants information",
		intent_type: "search",
		requires_tools: true,
		entities: ["topic"],
		complexity: "simple",
		...overrides,
	});
}

function planReply(steps: Array<Record<string, unknown>>, expected = "A useful answer"): string {
	return JSON.stringify({
		steps: steps.map((step, i) => ({ step_number: i + 1, parameters: {}, reasoning: `step ${i + 1}`, ...step })),
		expected_outcome: expected,
	});
}

function validationReply(recommendation: string, fulfilled = recommendation === "proceed"): string {
	return JSON.stringify({ intent_fulfilled: fulfilled, missing_information: [], confidence: 80, recommendation });
}

const ANSWER = "Here is a complete answer to the question.";

describe("Orchestrator", () => {
	let stateDir: string;
	let events: OrchestratorEvent[];

	beforeEach(() => {
		stateDir = mkdtempSync(join(tmpdir(), "orchestrator-test-"));
		events = [];
	});

	afterEach(() => {
		rmSync(stateDir, { recursive: true, force: true });
	});

	function setup(replies: ScriptedReply[], tools: Tool[], options: Partial<OrchestratorOptions> = {}) {
		const provider = new ScriptedProvider(replies);
		const registry = new ToolRegistry();
		registry.registerMany(tools);
		const orchestrator = new Orchestrator({
			provider,
			registry,
			stateDir,
			onEvent: (event) => events.push(event),
			...options,
		});
		return { provider, registry, orchestrator };
	}

	function phases(): string[] {
		return events.flatMap((event) => (event.type === "phase" ? [event.phase] : []));
	}

	it("answers a trivial general question", async () => {
		const { orchestrator, provider, registry } = setup(
			[
				intentReply({ intent_type: "general", requires_tools: false, entities: ["France"] }),
				planReply([{ action: "echo", parameters: { input: "France" } }]),
				validationReply("proceed"),
				"The capital of France is Paris.",
			],
			[echoTool()],
		);

		const { response, state } = await orchestrator.processQuery("What is the capital of France?");

		expect(response).toBe("The capital of France is Paris.");
		expect(state.final_response).toBe(response);
		expect(state.step_results.length).toBeLessThanOrEqual(1);
		expect(state.validation?.recommendation).toBe("proceed");
		expect(state.intent?.intent_type).toBe("general");
		expect(state.retry_count).toBe(0);
		expect(state.total_tokens).toBe(40);
		expect(state.current_phase).toBe("synthesis");
		expect(state.warnings).toEqual([]);
		expect(provider.remaining).toBe(0);
		expect(registry.sealed).toBe(true);
		expect(phases()).toEqual(["intent", "planning", "execution", "validation", "synthesis"]);

		const saved = await loadState(stateFilePath(state, stateDir));
		expect(saved.data).toEqual(state);
	});

	it("chains a URL from a search into a fetch", async () => {
		const fetched: string[] = [];
		const search = createTool("web_search", async () => ({
			success: true,
			output: "1. Lumen 3.2 Release Notes - https://example.com/lumen/v3.2. See also https://example.com/blog",
		}));
		const fetch = createTool(
			"web_fetch",
			async (args) => {
				const url = String(args.url);
				fetched.push(url);
				return { success: true, output: `Content of ${url}: Lumen 3.2 adds incremental builds.` };
			},
			{ parameters: { type: "object", properties: { url: { type: "string" } }, required: ["url"] } },
		);
		const { orchestrator } = setup(
			[
				intentReply({ intent_type: "fetch", reasoning: "Summarize release notes" }),
				planReply([
					{ action: "web_search", parameters: { query: "lumen release notes" } },
					{ action: "web_fetch", parameters: { url: "$EXTRACT_URL_FROM_STEP_1" } },
				]),
				validationReply("proceed"),
				(prompt) =>
					prompt.includes("Lumen 3.2 adds incremental builds.")
						? "The fetched release notes say Lumen 3.2 adds incremental builds."
						: "The release notes could not be read.",
			],
			[search, fetch],
		);

		const { response, state } = await orchestrator.processQuery("Fetch the latest Lumen release notes and summarize.");

		expect(fetched).toEqual(["https://example.com/lumen/v3.2"]);
		expect(state.step_results.map((r) => r.status)).toEqual(["success", "success"]);
		expect(response).toBe("The fetched release notes say Lumen 3.2 adds incremental builds.");
	});

	it("records a call to a tool that does not exist", async () => {
		const { orchestrator } = setup(
			[
				intentReply(),
				planReply([{ action: "quantum_search", parameters: { query: "entangled" } }]),
				validationReply("retry"),
				"I could not find anything useful for that query.",
			],
			[echoTool()],
			{ maxRetries: 0 },
		);

		const { state } = await orchestrator.processQuery("Search the quantum web");

		expect(state.step_results[0]).toMatchObject({
			step_number: 1,
			status: "failure",
			observation: "Step failed: unknown tool: quantum_search",
		});
		expect(countHallucinations(state)).toBe(1);
		expect(state.validation?.recommendation).toBe("retry");
		expect(state.warnings).toEqual(["[validation] Max retries reached (0), proceeding with current results"]);
	});

	it("retries a rejected plan with the validator's feedback", async () => {
		const bad = '{"steps":[{"step_number":2,"action":"echo","parameters":{},"reasoning":"r"}],"expected_outcome":"x"}';
		const { orchestrator, provider } = setup(
			[intentReply(), bad, planReply([{ action: "echo" }]), validationReply("proceed"), ANSWER],
			[echoTool()],
		);

		const { state } = await orchestrator.processQuery("Echo something");

		expect(provider.prompts[2]).toContain(`Previous attempt produced invalid output: ${bad}`);
		expect(provider.prompts[2]).toContain("Error: step numbers not sequential: expected 1, got 2");
		expect(state.warnings).toContain("[planning] Plan attempt 1 rejected: step numbers not sequential: expected 1, got 2");
		expect(state.plan?.steps).toHaveLength(1);
		expect(state.step_results[0]?.status).toBe("success");
	});

	it("runs steps with a shared dependency concurrently", async () => {
		const slow = createTool("slow", async () => {
			await delay(100);
			return { success: true, output: "done" };
		});
		const { orchestrator } = setup(
			[
				intentReply(),
				planReply([
					{ action: "echo" },
					{ action: "slow", depends_on: [1] },
					{ action: "slow", depends_on: [1] },
					{ action: "slow", depends_on: [1] },
				]),
				validationReply("proceed"),
				ANSWER,
			],
			[echoTool(), slow],
			{ enableParallel: true },
		);

		const started = Date.now();
		const { state } = await orchestrator.processQuery("Do four things");

		expect(Date.now() - started).toBeLessThan(280);
		expect(state.step_results.map((r) => [r.step_number, r.status])).toEqual([
			[1, "success"],
			[2, "success"],
			[3, "success"],
			[4, "success"],
		]);
	});

	it("stops and saves the state when cancelled mid-execution", async () => {
		const controller = new AbortController();
		const wait = createTool("wait", async (_args, context) => {
			setTimeout(() => controller.abort(), 0);
			await delay(5000, context.signal);
			return { success: true };
		});
		const { orchestrator } = setup(
			[intentReply(), planReply([{ action: "echo" }, { action: "wait" }, { action: "echo" }])],
			[echoTool(), wait],
		);

		const error = await orchestrator.processQuery("Three steps", { signal: controller.signal }).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(OrchestratorError);
		if (!(error instanceof OrchestratorError)) throw error;
		expect(error.code).toBe("CANCELLED");
		expect(error.message).toBe("query cancelled: context canceled");
		expect(error.state.errors).toContain("[execution] execution cancelled: context canceled");

		const saved = await loadState(stateFilePath(error.state, stateDir));
		expect(saved.success).toBe(true);
		const results = saved.data?.step_results ?? [];
		expect(results[0]?.status).toBe("success");
		expect(results[1]).toMatchObject({ status: "failure", error: "context canceled" });
		expect(results[2]).toEqual(emptyStepResult());
	});

	it("reports a query deadline instead of a cancellation", async () => {
		const wait = createTool("wait", async (_args, context) => {
			await delay(5000, context.signal);
			return { success: true };
		});
		const { orchestrator } = setup([intentReply(), planReply([{ action: "echo" }, { action: "wait" }])], [echoTool(), wait]);

		const error = await orchestrator
			.processQuery("Two steps", { signal: AbortSignal.timeout(300) })
			.catch((err: unknown) => err);

		expect(error).toBeInstanceOf(OrchestratorError);
		if (!(error instanceof OrchestratorError)) throw error;
		expect(error.code).toBe("DEADLINE_EXCEEDED");
		expect(error.message).toBe("query cancelled: context deadline exceeded");
		expect(error.state.errors).toContain("[execution] execution cancelled: context deadline exceeded");
		expect(error.state.step_results[1]).toMatchObject({ status: "failure", error: "context deadline exceeded" });
	});

	it("fails the query when no valid plan can be made", async () => {
		const { orchestrator } = setup([intentReply(), planReply([])], [echoTool()], { maxRetries: 1 });

		const error = await orchestrator.processQuery("Plan nothing").catch((err: unknown) => err);

		if (!(error instanceof OrchestratorError)) throw new Error("expected an OrchestratorError");
		expect(error.code).toBe("PLANNING_FAILED");
		expect(error.message).toBe(
			"planning failed: plan creation failed after 1 attempts: plan must have at least one step",
		);
		expect(error.state.errors).toEqual([
			"[planning] plan creation failed after 1 attempts: plan must have at least one step",
		]);
		const saved = await loadState(stateFilePath(error.state, stateDir));
		expect(saved.data?.current_phase).toBe("planning");
	});

	it("falls back to a default intent when the provider fails", async () => {
		const { orchestrator } = setup(
			[
				new ProviderError("provider scripted: connection refused (is the service running?)", "unreachable", "scripted"),
				planReply([{ action: "echo" }]),
				validationReply("proceed"),
				ANSWER,
			],
			[echoTool()],
		);

		const { state } = await orchestrator.processQuery("hello");

		expect(state.intent).toEqual({
			reasoning: "Could not parse intent from model output",
			intent_type: "general",
			requires_tools: true,
			entities: ["hello"],
			complexity: "simple",
		});
		expect(state.warnings).toEqual([
			"[intent] Intent parsing failed, using default: provider scripted: connection refused (is the service running?)",
		]);
	});

	it("keeps the intent when replanning under keep-intent", async () => {
		const { orchestrator, provider } = setup(
			[
				intentReply(),
				planReply([{ action: "echo" }]),
				validationReply("replan"),
				planReply([{ action: "echo", parameters: { input: "again" } }]),
				validationReply("proceed"),
				ANSWER,
			],
			[echoTool()],
			{ maxRetries: 1, replanStrategy: "keep-intent" },
		);

		const { state } = await orchestrator.processQuery("Try twice");

		expect(provider.remaining).toBe(0);
		expect(state.retry_count).toBe(1);
		expect(state.warnings).toEqual(["[validation] Replanning (attempt 1/1)"]);
		expect(state.step_results[0]?.result).toBe("echo: again");
		expect(phases()).toEqual([
			"intent",
			"planning",
			"execution",
			"validation",
			"planning",
			"execution",
			"validation",
			"synthesis",
		]);
	});

	it("re-parses the intent on retry", async () => {
		const { orchestrator } = setup(
			[
				intentReply(),
				planReply([{ action: "echo" }]),
				validationReply("retry"),
				intentReply({ reasoning: "Second look" }),
				planReply([{ action: "echo" }]),
				validationReply("proceed"),
				ANSWER,
			],
			[echoTool()],
			{ maxRetries: 2 },
		);

		const { state } = await orchestrator.processQuery("Try again");

		expect(state.intent?.reasoning).toBe("Second look");
		expect(state.retry_count).toBe(1);
		expect(state.warnings).toEqual(["[validation] Retrying execution (attempt 1/2)"]);
	});

	it("validates partial results after a failed wave", async () => {
		const { orchestrator } = setup(
			[
				intentReply(),
				planReply([{ action: "quantum_search" }, { action: "echo", depends_on: [1] }]),
				validationReply("proceed"),
				ANSWER,
			],
			[echoTool()],
			{ enableParallel: true },
		);

		const { state } = await orchestrator.processQuery("Partial");

		expect(state.errors).toEqual(["[execution] wave execution failed: 1 errors: unknown tool: quantum_search"]);
		expect(state.warnings).toEqual(["[execution] Execution stopped after a failed wave, validating partial results"]);
		expect(state.step_results[1]).toEqual(emptyStepResult());
		expect(state.final_response).toBe(ANSWER);
	});

	it("uses the default validation when the validator output is unusable", async () => {
		const { orchestrator } = setup(
			[intentReply(), planReply([{ action: "echo" }]), "All good!", ANSWER],
			[echoTool()],
		);

		const { state } = await orchestrator.processQuery("Check");

		expect(state.validation).toEqual({
			intent_fulfilled: true,
			missing_information: [],
			confidence: 50,
			recommendation: "proceed",
		});
		expect(state.warnings).toHaveLength(1);
		expect(state.warnings[0]).toMatch(/^\[validation\] Validation failed, using default: invalid JSON: /);
	});

	it("falls back to the basic response when synthesis breaks off", async () => {
		const { orchestrator } = setup(
			[
				intentReply(),
				planReply([{ action: "echo" }]),
				validationReply("proceed"),
				[{ delta: "The answer is" }, { done: true, error: new ProviderError("provider scripted: network error", "unreachable", "scripted") }],
			],
			[echoTool()],
		);

		const { response, state } = await orchestrator.processQuery("Synthesize");

		expect(response).toBe("Here's what I found:\n\n1. Executed echo successfully\n");
		expect(state.warnings).toEqual(["[synthesis] Synthesis failed, using basic response: provider scripted: network error"]);
		expect(state.errors).toEqual(["[synthesis] provider scripted: network error"]);
	});

	it("forwards thinking and counts streamed usage", async () => {
		const { orchestrator } = setup(
			[
				[
					{ thinking: "The user wants a search." },
					{ delta: intentReply() },
					{ done: true, usage: { inputTokens: 3, outputTokens: 2, totalTokens: 5 } },
				],
				planReply([{ action: "echo" }]),
				validationReply("proceed"),
				ANSWER,
			],
			[echoTool()],
		);

		const { state } = await orchestrator.processQuery("Think first");

		expect(events).toContainEqual({ type: "thinking", phase: "intent", text: "The user wants a search." });
		expect(state.total_tokens).toBe(35);
	});

	it("logs phase transitions when verbose", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		try {
			const { orchestrator } = setup(
				[intentReply(), planReply([{ action: "echo" }]), validationReply("proceed"), ANSWER],
				[echoTool()],
				{ verbose: true },
			);
			await orchestrator.processQuery("Verbose");

			expect(log).toHaveBeenCalledWith("[Orchestrator] Phase: intent (attempt 1/4)");
			expect(log).toHaveBeenCalledWith("[Orchestrator] Step 1: echo");
		} finally {
			log.mockRestore();
		}
	});
});
