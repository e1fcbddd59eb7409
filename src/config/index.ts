export { CONFIG_DIR, getConfigPath, loadConfig, type Env, type LoadConfigOptions } from "./loader.js";
export type { Config, ConfigErrorCode, ConfigValidationError, ProviderConfig, ThinkingConfig } from "./schema.js";
export { ConfigError, configSchema, getDefaultConfig, validateConfig } from "./schema.js";
