import type { ToolCall } from "./types.js";

interface PartialToolCall {
	id: string;
	name: string;
	arguments: string;
}

/**
 * Reassembles tool calls that vendors stream as fragments keyed by an index.
 */
export class ToolCallAccumulator {
	private _calls = new Map<number, PartialToolCall>();

	add(index: number, fragment: { id?: string | null; name?: string | null; arguments?: string | null }): void {
		const existing = this._calls.get(index) ?? { id: "", name: "", arguments: "" };
		if (fragment.id) existing.id = fragment.id;
		if (fragment.name) existing.name = fragment.name;
		if (fragment.arguments) existing.arguments += fragment.arguments;
		this._calls.set(index, existing);
	}

	get size(): number {
		return this._calls.size;
	}

	complete(): ToolCall[] | undefined {
		if (this._calls.size === 0) return undefined;

		return [...this._calls.entries()]
			.sort(([a], [b]) => a - b)
			.map(([index, call]) => ({
				id: call.id || `call_${index}`,
				name: call.name,
				arguments: call.arguments || "{}",
			}));
	}
}
