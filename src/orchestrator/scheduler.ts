import type { PlanStep, SchedulingMode } from "./types.js";

export interface SchedulerOptions {
	/**
	 * `sequential` (default): a step above 1 with no dependencies runs after the
	 * step before it. `parallel`: an explicit empty list means independent.
	 */
	mode?: SchedulingMode;
}

/** Dependencies the scheduler enforces for `step`. */
export function effectiveDependencies(step: PlanStep, mode: SchedulingMode = "sequential"): number[] {
	const deps = step.depends_on;
	if (deps && deps.length > 0) return deps;
	if (step.step_number <= 1) return [];
	if (mode === "parallel" && deps !== undefined) return [];
	return [step.step_number - 1];
}

/**
 * Groups steps into waves: each wave holds every step whose dependencies all
 * ran in earlier waves, in ascending step order. When nothing is ready (a
 * cycle, or a dependency on a step that does not exist) the lowest remaining
 * step is released on its own so scheduling always terminates.
 */
export function groupStepsByDependencies(steps: PlanStep[], options: SchedulerOptions = {}): PlanStep[][] {
	const mode = options.mode ?? "sequential";
	const pending = [...steps].sort((a, b) => a.step_number - b.step_number);
	const done = new Set<number>();
	const waves: PlanStep[][] = [];

	while (pending.length > 0) {
		let wave = pending.filter((step) => effectiveDependencies(step, mode).every((dep) => done.has(dep)));
		if (wave.length === 0) {
			wave = pending.slice(0, 1);
		}

		for (const step of wave) {
			done.add(step.step_number);
			pending.splice(pending.indexOf(step), 1);
		}
		waves.push(wave);
	}

	return waves;
}
