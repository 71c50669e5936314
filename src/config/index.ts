export { loadConfig, ConfigError } from "./loader.js";
export type { LoadedConfig } from "./loader.js";
export { generateDefaultConfig } from "./writer.js";
export type { DefaultConfigOptions } from "./writer.js";
export { snippetsConfigSchema, CONFIG_FILE } from "./schema.js";
export type { SnippetsConfig } from "./schema.js";
