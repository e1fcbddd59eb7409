import type { Config } from "../../config/schema.js";
import type { Provider } from "../../providers/types.js";
import { createProviderFromConfig, type CliOptions } from "../shared.js";

export async function handleModels(config: Config, options: CliOptions, provider?: Provider): Promise<number> {
	const client = provider ?? createProviderFromConfig(config, options);
	const models = await client.models();

	if (options.json) {
		console.log(JSON.stringify({ provider: client.name, models }, null, 2));
		return 0;
	}

	console.log(`Models available from ${client.name}:`);
	for (const model of models) {
		console.log(`  ${model === client.modelName ? "*" : " "} ${model}`);
	}
	return 0;
}
