export interface ToolResult {
	success: boolean;
	output?: string;
	error?: string;
}

export type ToolDangerLevel = boolean | string | ((args: Record<string, unknown>) => boolean | string | undefined);

export interface ToolContext {
	signal: AbortSignal;
	/** Incremental output sink for tools that stream (e.g. a long-running command) */
	onOutput?: (text: string) => void;
}

export interface Tool {
	name: string;
	description: string;
	parameters: ToolParameters;
	/** Marks calls that need approval before they run, unless auto-approved */
	dangerous?: ToolDangerLevel;
	execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult>;
}

export interface ToolParameters {
	type: "object";
	properties: Record<string, unknown>;
	required?: string[];
	[key: string]: unknown;
}
