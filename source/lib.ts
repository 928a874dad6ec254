export { ConfigManager, type PathConfig, PathConfigSchema } from "./config.ts";
export { NodeEnvironment, type NodeEnvironmentOptions } from "./environment.ts";
export { ConfigError, handleError, PromptPathError } from "./errors.ts";
export * from "./segments/index.ts";
