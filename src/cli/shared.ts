import { join } from "node:path";
import { createInterface } from "node:readline/promises";
import { CONFIG_DIR } from "../config/loader.js";
import type { Config } from "../config/schema.js";
import { Semaphore } from "../orchestrator/executor.js";
import { createProvider, detectProvider, isProviderType, parseModelString, type ProviderType } from "../providers/factory.js";
import type { Provider } from "../providers/types.js";
import type { ConfirmationHandler } from "../tools/confirmation.js";
import { loadPlugins } from "../tools/plugin-loader.js";
import { ToolRegistry } from "../tools/registry.js";

export interface CliOptions {
	model?: string;
	provider?: string;
	verbose?: boolean;
	help?: boolean;
	parallel?: boolean;
	allowAll?: boolean;
	stateDir?: string;
	config?: string;
	pluginDir?: string;
	json?: boolean;
}

export interface ParsedArgs {
	command: string;
	args: string[];
	options: CliOptions;
}

export function parseArgs(args: string[] = process.argv.slice(2)): ParsedArgs {
	const options: CliOptions = {};
	const positionalArgs: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--model":
			case "-m":
				options.model = args[++i];
				break;
			case "--provider":
				options.provider = args[++i];
				break;
			case "-v":
			case "--verbose":
				options.verbose = true;
				break;
			case "--parallel":
				options.parallel = true;
				break;
			case "--allow-all":
			case "-y":
				options.allowAll = true;
				break;
			case "--state-dir":
				options.stateDir = args[++i];
				break;
			case "--config":
				options.config = args[++i];
				break;
			case "--plugin-dir":
				options.pluginDir = args[++i];
				break;
			case "--json":
				options.json = true;
				break;
			default:
				if (arg && !arg.startsWith("-")) {
					positionalArgs.push(arg);
				}
		}
	}

	return {
		command: positionalArgs[0] ?? "help",
		args: positionalArgs.slice(1),
		options,
	};
}

const API_KEY_ENV: Record<ProviderType, string[]> = {
	openai: ["OPENAI_API_KEY"],
	anthropic: ["ANTHROPIC_API_KEY"],
	google: ["GEMINI_API_KEY", "GOOGLE_API_KEY"],
	ollama: ["OLLAMA_API_KEY"],
};

/** Provider type for a model string, honoring `@provider` and `--provider`. */
export function resolveProviderType(model: string, explicit?: string): ProviderType {
	const parsed = parseModelString(model);
	if (parsed.provider) return parsed.provider;
	if (explicit !== undefined) {
		if (!isProviderType(explicit)) {
			throw new Error(`Unknown provider: ${explicit}`);
		}
		return explicit;
	}
	return detectProvider(parsed.model);
}

export function createProviderFromConfig(
	config: Config,
	options: CliOptions,
	env: Record<string, string | undefined> = process.env,
): Provider {
	const model = options.model || config.model;
	const type = resolveProviderType(model, options.provider ?? config.provider);
	const providerConfig = config.providers[type];
	const apiKey = providerConfig?.apiKey ?? API_KEY_ENV[type].map((name) => env[name]).find(Boolean);

	if (type !== "ollama" && !apiKey) {
		throw new Error(
			`${type} API key not configured. Set providers.${type}.apiKey in config or ${API_KEY_ENV[type].join(" / ")}`,
		);
	}

	return createProvider({
		model,
		provider: type,
		apiKey,
		baseUrl: providerConfig?.baseUrl,
		thinking: config.thinking,
		maxRetries: config.maxRetries,
	});
}

export async function setupTools(config: Config, options: CliOptions): Promise<ToolRegistry> {
	const registry = new ToolRegistry({
		autoApprove: config.autoApprove,
		allowAll: options.allowAll || config.allowAll,
	});

	const pluginDir = options.pluginDir ?? config.pluginDir ?? join(CONFIG_DIR, "plugins");
	const { tools } = await loadPlugins(pluginDir);
	for (const tool of tools) {
		try {
			registry.register(tool);
		} catch (err) {
			console.warn(`[CLI] Skipping plugin tool: ${err instanceof Error ? err.message : String(err)}`);
		}
	}

	return registry;
}

/**
 * Asks on the terminal before a dangerous tool runs. Prompts are serialized
 * so concurrent steps never share the input stream.
 */
export function createApprovalHandler(
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stderr,
): ConfirmationHandler {
	const turn = new Semaphore(1);

	return async (request, signal) => {
		const release = await turn.acquire();
		const rl = createInterface({ input, output });
		try {
			const answer = await rl.question(
				`\n${request.description}\n  ${request.tool} ${JSON.stringify(request.args)}\nAllow? [y/N] `,
				{ signal },
			);
			return /^y(es)?$/i.test(answer.trim());
		} catch (err) {
			if (signal.aborted) return false;
			throw err;
		} finally {
			rl.close();
			release();
		}
	};
}
