/**
 * Approval requests for dangerous tool calls.
 *
 * The registry never prompts on its own; whoever drives execution passes an
 * approval handler in (the CLI asks on the terminal, tests answer directly).
 * Policy that skips approval (auto-approve list, allow-all) lives on the registry.
 */

export type ConfirmationRequest = {
	tool: string;
	description: string;
	args: Record<string, unknown>;
};

export type ConfirmationHandler = (request: ConfirmationRequest, signal: AbortSignal) => Promise<boolean>;

export const approveAll: ConfirmationHandler = async () => true;

export const denyAll: ConfirmationHandler = async () => false;
