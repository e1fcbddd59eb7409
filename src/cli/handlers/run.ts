import type { Config } from "../../config/schema.js";
import { OrchestratorError } from "../../orchestrator/errors.js";
import { Orchestrator, type OrchestratorEvent } from "../../orchestrator/orchestrator.js";
import { stateFilePath } from "../../orchestrator/state.js";
import type { Provider } from "../../providers/types.js";
import type { ToolRegistry } from "../../tools/registry.js";
import { createApprovalHandler, createProviderFromConfig, setupTools, type CliOptions } from "../shared.js";

export interface RunDependencies {
	provider?: Provider;
	registry?: ToolRegistry;
	signal?: AbortSignal;
}

export function describeEvent(event: OrchestratorEvent): string | undefined {
	switch (event.type) {
		case "phase":
			return `[${event.phase}]`;
		case "step": {
			const mark = event.result.status === "success" ? "✓" : "✗";
			const error = event.result.error ? ` ${event.result.error}` : "";
			return `[step ${event.result.step_number} ${mark} ${event.result.duration_ms}ms]${error}`;
		}
		case "warning":
			return `[warning] ${event.message}`;
		default:
			return undefined;
	}
}

/** Runs one query and returns the process exit code. */
export async function handleRun(
	config: Config,
	args: string[],
	options: CliOptions,
	deps: RunDependencies = {},
): Promise<number> {
	const query = args.join(" ").trim();
	if (!query) {
		console.error("Error: run command requires a query");
		return 1;
	}

	const provider = deps.provider ?? createProviderFromConfig(config, options);
	const registry = deps.registry ?? (await setupTools(config, options));
	if (registry.list().length === 0) {
		console.warn("[CLI] No tools registered; every plan step will fail with an unknown tool error");
	}

	const controller = new AbortController();
	const onAbort = () => controller.abort();
	const forward = () => controller.abort(deps.signal?.reason);
	process.once("SIGINT", onAbort);
	deps.signal?.addEventListener("abort", forward, { once: true });
	if (deps.signal?.aborted) forward();
	const signal = controller.signal;

	const orchestrator = new Orchestrator({
		provider,
		registry,
		maxRetries: config.maxRetries,
		maxSteps: config.maxSteps,
		stateDir: options.stateDir ?? config.stateDir,
		enableParallel: options.parallel || config.enableParallel,
		schedulingMode: config.schedulingMode,
		maxConcurrency: config.maxConcurrency,
		stepTimeoutMs: config.stepTimeoutMs,
		streamBuffer: config.streamBuffer,
		replanStrategy: config.replanStrategy,
		approve: createApprovalHandler(),
		verbose: options.verbose,
		onEvent: options.json
			? undefined
			: (event) => {
					const line = describeEvent(event);
					if (line) process.stderr.write(`${line}\n`);
				},
	});

	try {
		const { response, state } = await orchestrator.processQuery(query, { signal });
		if (options.json) {
			console.log(JSON.stringify({ response, state }, null, 2));
		} else {
			console.log(response);
			console.error(`[state: ${stateFilePath(state, options.stateDir ?? config.stateDir)}]`);
		}
		return 0;
	} catch (err) {
		if (!(err instanceof OrchestratorError)) throw err;
		if (options.json) {
			console.log(JSON.stringify({ error: err.message, code: err.code, state: err.state }, null, 2));
		} else {
			console.error(`Error: ${err.message}`);
			console.error(`[state: ${stateFilePath(err.state, options.stateDir ?? config.stateDir)}]`);
		}
		return err.code === "CANCELLED" ? 130 : 1;
	} finally {
		process.off("SIGINT", onAbort);
		deps.signal?.removeEventListener("abort", forward);
	}
}
