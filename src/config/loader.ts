import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { extname, join } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError, validateConfig, type Config } from "./schema.js";

export const CONFIG_DIR = join(homedir(), ".phaseflow");

export type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
	/** Explicit file; must exist */
	path?: string;
	env?: Env;
}

export function getYamlPath(env: Env = process.env): string {
	return env.PHASEFLOW_CONFIG_YAML ?? join(CONFIG_DIR, "config.yaml");
}

export function getJsonPath(env: Env = process.env): string {
	return env.PHASEFLOW_CONFIG_JSON ?? join(CONFIG_DIR, "config.json");
}

/** The file `loadConfig` reads when no path is given, if any exists. */
export function getConfigPath(env: Env = process.env): string | undefined {
	return [getYamlPath(env), getJsonPath(env)].find((path) => existsSync(path));
}

const SENSITIVE_KEY_PATTERNS = [/api[_-]?key/i, /secret/i, /password/i, /token/i, /credential/i];

function containsSensitivePattern(key: string): boolean {
	return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

function interpolateEnvVars(value: string, keyPath: string, env: Env): string {
	if (!value.includes("${") && containsSensitivePattern(keyPath)) {
		console.warn(`[Config] "${keyPath}" is set inline; prefer \${VAR_NAME} interpolation for secrets`);
	}
	return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
		const envValue = env[envVar];
		if (!envValue) {
			throw new ConfigError(`Environment variable ${envVar} is not set (referenced by ${keyPath})`, "CONFIG_ENV");
		}
		return envValue;
	});
}

function interpolateObject(value: unknown, env: Env, keyPath = ""): unknown {
	if (typeof value === "string") return interpolateEnvVars(value, keyPath, env);
	if (value === null || typeof value !== "object") return value;
	if (Array.isArray(value)) return value.map((item, index) => interpolateObject(item, env, `${keyPath}[${index}]`));

	const result: Record<string, unknown> = {};
	for (const [key, item] of Object.entries(value)) {
		result[key] = interpolateObject(item, env, keyPath ? `${keyPath}.${key}` : key);
	}
	return result;
}

function readConfigFile(path: string): unknown {
	let content: string;
	try {
		content = readFileSync(path, "utf-8");
	} catch (err) {
		throw new ConfigError(`Cannot read config ${path}: ${err instanceof Error ? err.message : String(err)}`, "CONFIG_NOT_FOUND");
	}

	try {
		const raw: unknown = extname(path) === ".json" ? JSON.parse(content) : parseYaml(content);
		return raw ?? {};
	} catch (err) {
		throw new ConfigError(`Invalid config syntax in ${path}: ${err instanceof Error ? err.message : String(err)}`, "CONFIG_PARSE");
	}
}

type Override = { key: string; envVar: string; parse: (value: string) => unknown };

const asInteger = (value: string): unknown => {
	const parsed = Number.parseInt(value, 10);
	return Number.isNaN(parsed) ? undefined : parsed;
};

const asBoolean = (value: string): unknown => {
	const normalized = value.trim().toLowerCase();
	if (["1", "true", "yes", "on"].includes(normalized)) return true;
	if (["0", "false", "no", "off"].includes(normalized)) return false;
	return undefined;
};

const asString = (value: string): unknown => value;

const ENV_OVERRIDES: Override[] = [
	{ key: "model", envVar: "PHASEFLOW_MODEL", parse: asString },
	{ key: "provider", envVar: "PHASEFLOW_PROVIDER", parse: asString },
	{ key: "maxRetries", envVar: "PHASEFLOW_MAX_RETRIES", parse: asInteger },
	{ key: "maxSteps", envVar: "PHASEFLOW_MAX_STEPS", parse: asInteger },
	{ key: "maxConcurrency", envVar: "PHASEFLOW_MAX_CONCURRENCY", parse: asInteger },
	{ key: "stepTimeoutMs", envVar: "PHASEFLOW_STEP_TIMEOUT_MS", parse: asInteger },
	{ key: "enableParallel", envVar: "PHASEFLOW_PARALLEL", parse: asBoolean },
	{ key: "stateDir", envVar: "PHASEFLOW_STATE_DIR", parse: asString },
	{ key: "pluginDir", envVar: "PHASEFLOW_PLUGIN_DIR", parse: asString },
];

function applyEnvOverrides(config: Record<string, unknown>, env: Env): Record<string, unknown> {
	const result = { ...config };
	for (const override of ENV_OVERRIDES) {
		const envValue = env[override.envVar];
		if (!envValue) continue;
		const parsed = override.parse(envValue);
		if (parsed === undefined) {
			console.warn(`[Config] Ignoring ${override.envVar}=${envValue}: not a valid value for ${override.key}`);
			continue;
		}
		result[override.key] = parsed;
	}
	return result;
}

function expandHome(path: string | undefined): string | undefined {
	if (path === undefined) return undefined;
	return path === "~" || path.startsWith("~/") ? join(homedir(), path.slice(1)) : path;
}

/**
 * Reads the YAML or JSON config (an explicit path, else the first of
 * `~/.phaseflow/config.yaml` and `config.json`), interpolates `${VAR}`
 * references, applies `PHASEFLOW_*` overrides and validates the result.
 * Without any file the defaults apply.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
	const env = options.env ?? process.env;
	const source = options.path ?? getConfigPath(env);

	if (options.path !== undefined && !existsSync(options.path)) {
		throw new ConfigError(`Config file not found: ${options.path}`, "CONFIG_NOT_FOUND");
	}

	const raw = source ? readConfigFile(source) : {};
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		throw new ConfigError(`Invalid config at ${source ?? "defaults"}: config must be an object`, "CONFIG_INVALID", [
			{ field: "root", message: "Config must be an object" },
		]);
	}

	const interpolated = interpolateObject(raw, env);
	const merged = applyEnvOverrides(
		typeof interpolated === "object" && interpolated !== null ? Object.fromEntries(Object.entries(interpolated)) : {},
		env,
	);

	const { config, errors } = validateConfig(merged);
	if (!config) {
		const details = errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
		throw new ConfigError(`Invalid config at ${source ?? "defaults"}:\n${details}`, "CONFIG_INVALID", errors);
	}

	return {
		...config,
		stateDir: expandHome(config.stateDir),
		pluginDir: expandHome(config.pluginDir),
	};
}
