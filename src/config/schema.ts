import { z } from "zod";
import { PROVIDER_TYPES } from "../providers/factory.js";

export const providerConfigSchema = z.object({
	apiKey: z.string().optional(),
	baseUrl: z.string().optional(),
});

export const thinkingConfigSchema = z.object({
	enabled: z.boolean().optional(),
	budgetTokens: z.number().int().positive().optional(),
});

export const configSchema = z
	.object({
		/** Model name, optionally suffixed with `@provider` */
		model: z.string().trim().min(1, "model must be a non-empty string").default("llama3.2"),
		provider: z.enum(PROVIDER_TYPES).optional(),
		providers: z
			.object({
				openai: providerConfigSchema.optional(),
				anthropic: providerConfigSchema.optional(),
				google: providerConfigSchema.optional(),
				ollama: providerConfigSchema.optional(),
			})
			.default({}),
		thinking: thinkingConfigSchema.optional(),
		maxRetries: z.number().int().nonnegative().default(3),
		maxSteps: z.number().int().positive().default(10),
		maxConcurrency: z.number().int().positive().default(3),
		stepTimeoutMs: z.number().int().positive().default(30_000),
		streamBuffer: z.number().int().positive().default(64),
		enableParallel: z.boolean().default(false),
		schedulingMode: z.enum(["sequential", "parallel"]).default("sequential"),
		replanStrategy: z.enum(["restart", "keep-intent"]).default("restart"),
		/** Defaults to the OS temp dir */
		stateDir: z.string().optional(),
		autoApprove: z.array(z.string()).default([]),
		allowAll: z.boolean().default(false),
		pluginDir: z.string().optional(),
	})
	.strict();

export type Config = z.infer<typeof configSchema>;
export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type ThinkingConfig = z.infer<typeof thinkingConfigSchema>;

export interface ConfigValidationError {
	field: string;
	message: string;
}

export type ConfigErrorCode = "CONFIG_NOT_FOUND" | "CONFIG_PARSE" | "CONFIG_INVALID" | "CONFIG_ENV";

export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly code: ConfigErrorCode,
		public readonly issues: ConfigValidationError[] = [],
	) {
		super(message);
		this.name = "ConfigError";
	}
}

export function validateConfig(config: unknown): { config?: Config; errors: ConfigValidationError[] } {
	const parsed = configSchema.safeParse(config);
	if (parsed.success) {
		return { config: parsed.data, errors: [] };
	}
	return {
		errors: parsed.error.issues.map((issue) => ({
			field: issue.path.length > 0 ? issue.path.join(".") : "root",
			message: issue.message,
		})),
	};
}

export function getDefaultConfig(): Config {
	return configSchema.parse({});
}
