export * from "./types";
export * from "./errors";
export * from "./angles";
export * from "./observability";
export * from "./env";
export { ConfigurationManager, createConfigManager } from "./config/manager";
export { loadConfig, validateConfig, defaultConfigPath, defaultSchemaPath } from "./config/loader";
export type {
  AlphaPolicyName,
  BendConfig,
  DeformationPolicyName,
  SynthesisConfig,
  ValidationResult
} from "./config/types";
