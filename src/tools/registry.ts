import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import type { ToolDefinition } from "../providers/types.js";
import type { ConfirmationHandler } from "./confirmation.js";
import type { Tool, ToolResult } from "./types.js";

export interface ToolRegistryOptions {
	/** Tool names that never need approval */
	autoApprove?: string[];
	/** Skip approval for every tool */
	allowAll?: boolean;
}

export interface ExecuteOptions {
	signal?: AbortSignal;
	onOutput?: (text: string) => void;
	approve?: ConfirmationHandler;
}

function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
	if (!errors?.length) return "does not match schema";
	return errors.map((e) => `${e.instancePath || "(root)"} ${e.message ?? "is invalid"}`).join("; ");
}

function parseArgs(argsJson: string): Record<string, unknown> | string {
	let parsed: unknown;
	try {
		parsed = JSON.parse(argsJson.trim() || "{}");
	} catch (err) {
		return `malformed JSON: ${err instanceof Error ? err.message : String(err)}`;
	}
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		return "arguments must be a JSON object";
	}
	return Object.fromEntries(Object.entries(parsed));
}

export class ToolRegistry {
	private _tools: Map<string, Tool> = new Map();
	private _validators: Map<string, ValidateFunction> = new Map();
	private _autoApprove: Set<string>;
	private _allowAll: boolean;
	private _sealed = false;
	private _ajv = new Ajv({ allErrors: true, strict: false });

	constructor(options: ToolRegistryOptions = {}) {
		this._autoApprove = new Set(options.autoApprove ?? []);
		this._allowAll = options.allowAll ?? false;
	}

	register(tool: Tool): void {
		if (this._sealed) {
			throw new Error(`Cannot register tool "${tool.name}": registry is sealed`);
		}
		if (this._tools.has(tool.name)) {
			throw new Error(`Tool "${tool.name}" is already registered`);
		}
		this._validators.set(tool.name, this._ajv.compile(tool.parameters));
		this._tools.set(tool.name, tool);
	}

	registerMany(tools: Tool[]): void {
		for (const tool of tools) {
			this.register(tool);
		}
	}

	/**
	 * Freezes the catalog. Lookups stay read-only from here on, so concurrent
	 * steps can share the registry without coordination.
	 */
	seal(): void {
		this._sealed = true;
	}

	get sealed(): boolean {
		return this._sealed;
	}

	get(name: string): Tool | undefined {
		return this._tools.get(name);
	}

	has(name: string): boolean {
		return this._tools.has(name);
	}

	list(): Tool[] {
		return Array.from(this._tools.values());
	}

	names(): string[] {
		return Array.from(this._tools.keys());
	}

	toolDefinitions(): ToolDefinition[] {
		return this.list().map((tool) => ({
			name: tool.name,
			description: tool.description,
			parameters: tool.parameters,
		}));
	}

	private _getDangerLevel(name: string, args: Record<string, unknown>): string | undefined {
		const tool = this._tools.get(name);
		const dangerous = tool?.dangerous;
		if (!dangerous) return undefined;

		if (typeof dangerous === "function") {
			const result = dangerous(args);
			if (typeof result === "string") return result;
			if (result === true) return `Execute ${name}`;
			return undefined;
		}

		return typeof dangerous === "string" ? dangerous : `Execute ${name}`;
	}

	getDangerLevel(name: string, args: Record<string, unknown> = {}): string | undefined {
		return this._getDangerLevel(name, args);
	}

	needsConfirmation(name: string, args: Record<string, unknown> = {}): boolean {
		if (this._allowAll || this._autoApprove.has(name)) return false;
		if (!this._tools.has(name)) return true;
		return this._getDangerLevel(name, args) !== undefined;
	}

	/**
	 * Validates, optionally waits for approval, then runs the tool.
	 *
	 * Expected failures come back as `{ success: false, error }`. An exception
	 * thrown by the tool itself is deliberately not caught here; the execution
	 * engine treats it as a panic of that step.
	 */
	async execute(name: string, argsJson: string, options: ExecuteOptions = {}): Promise<ToolResult> {
		const tool = this._tools.get(name);
		const validate = this._validators.get(name);
		if (!tool || !validate) {
			return { success: false, error: `unknown tool: ${name}` };
		}

		const args = parseArgs(argsJson);
		if (typeof args === "string") {
			return { success: false, error: `invalid arguments for tool ${name}: ${args}` };
		}
		if (!validate(args)) {
			return { success: false, error: `invalid arguments for tool ${name}: ${formatSchemaErrors(validate.errors)}` };
		}

		const signal = options.signal ?? new AbortController().signal;

		if (this.needsConfirmation(name, args)) {
			if (!options.approve) {
				return { success: false, error: `tool ${name} requires approval but no approval handler is configured` };
			}
			const approved = await options.approve(
				{ tool: name, description: this._getDangerLevel(name, args) ?? `Execute ${name}`, args },
				signal,
			);
			if (!approved) {
				return { success: false, error: `User declined confirmation for ${name}` };
			}
		}

		return tool.execute(args, { signal, onOutput: options.onOutput });
	}
}
