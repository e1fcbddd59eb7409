import { countHallucinations, loadState } from "../../orchestrator/state.js";
import type { AgentState } from "../../orchestrator/types.js";
import type { CliOptions } from "../shared.js";

export function formatStateSummary(state: AgentState): string {
	const lines = [
		`Session: ${state.session_id}`,
		`Query: ${state.original_query}`,
		`Started: ${state.timestamp}`,
		`Phase: ${state.current_phase} | Attempts: ${state.retry_count + 1} | Tokens: ${state.total_tokens}`,
	];

	if (state.intent) {
		lines.push(`Intent: ${state.intent.intent_type} (${state.intent.complexity}) - ${state.intent.reasoning}`);
	}

	if (state.plan) {
		lines.push(`Plan: ${state.plan.steps.length} step(s), expecting: ${state.plan.expected_outcome}`);
		for (const step of state.plan.steps) {
			const result = state.step_results[step.step_number - 1];
			const outcome =
				result && result.status !== ""
					? `${result.status === "success" ? "✓" : "✗"} ${result.duration_ms}ms ${result.observation}`
					: "- not run";
			lines.push(`  ${step.step_number}. ${step.action} ${outcome}`);
		}
	}

	if (state.validation) {
		const v = state.validation;
		lines.push(`Validation: ${v.recommendation} (confidence ${v.confidence}, fulfilled: ${v.intent_fulfilled})`);
		if (v.missing_information.length > 0) {
			lines.push(`  Missing: ${v.missing_information.join("; ")}`);
		}
	}

	lines.push(`Hallucinated tool calls: ${countHallucinations(state)}`);

	for (const error of state.errors) lines.push(`Error: ${error}`);
	for (const warning of state.warnings) lines.push(`Warning: ${warning}`);

	if (state.final_response) {
		lines.push("", state.final_response);
	}

	return lines.join("\n");
}

export async function handleState(args: string[], options: CliOptions): Promise<number> {
	const file = args[0];
	if (!file) {
		console.error("Usage: phaseflow state <file>");
		return 2;
	}

	const loaded = await loadState(file);
	if (!loaded.success || !loaded.data) {
		console.error(loaded.error ?? `Cannot load state from ${file}`);
		return 1;
	}

	console.log(options.json ? JSON.stringify(loaded.data, null, 2) : formatStateSummary(loaded.data));
	return 0;
}
