import type { AgentState } from "./types.js";

export type OrchestratorErrorCode = "PLANNING_FAILED" | "CANCELLED" | "DEADLINE_EXCEEDED";

/** A query that could not finish. `state` is the record as it was saved. */
export class OrchestratorError extends Error {
	constructor(
		message: string,
		public readonly code: OrchestratorErrorCode,
		public readonly state: AgentState,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "OrchestratorError";
	}
}
