export * from "./types";
export * from "./defaults";
export { loadConfig, validate, validateConfig, defaultSchemaPath } from "./loader";
export { ConfigurationManager, createConfigManager } from "./manager";
export type { ConfigSection } from "./manager";
