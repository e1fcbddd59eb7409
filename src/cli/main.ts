import { loadConfig } from "../config/loader.js";
import { handleModels } from "./handlers/models.js";
import { handleRun } from "./handlers/run.js";
import { handleState } from "./handlers/state.js";
import { parseArgs } from "./shared.js";

export const HELP_TEXT = `phaseflow - plan, execute and validate multi-step answers with LLM tools

USAGE:
    phaseflow run <query>              Answer a query (intent, plan, execute, validate, synthesize)
    phaseflow state <file>             Summarize a saved run
    phaseflow models                   List models offered by the configured provider

OPTIONS:
    --model, -m <model>                Override the model (accepts model@provider)
    --provider <provider>              openai | anthropic | google | ollama
    --parallel                         Run independent plan steps concurrently
    --allow-all, -y                    Run dangerous tools without asking
    --state-dir <dir>                  Where run state is saved (default: OS temp dir)
    --config <file>                    Config file (default: ~/.phaseflow/config.yaml)
    --plugin-dir <dir>                 Compiled .js/.mjs tool plugins (default: ~/.phaseflow/plugins)
    --json                             Machine-readable output
    --verbose, -v                      Log phase transitions
    --help, -h                         Show this help
`;

/** Resolves to the process exit code. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
	const { command, args, options } = parseArgs(argv);

	if (options.help || command === "help") {
		console.log(HELP_TEXT);
		return 0;
	}

	try {
		switch (command) {
			case "run":
				return await handleRun(loadConfig({ path: options.config }), args, options);
			case "state":
				return await handleState(args, options);
			case "models":
				return await handleModels(loadConfig({ path: options.config }), options);
			default:
				console.error(`Unknown command: ${command}`);
				console.error("Available commands: run <query>, state <file>, models");
				return 1;
		}
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		console.error(`Error: ${message}`);
		return 1;
	}
}
