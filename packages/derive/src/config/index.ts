export {
  ConfigSchema,
  EnvSchema,
  LogLevelSchema,
  type Config,
  type ConfigDraft,
} from "./schema.js";
export { makeDefaults } from "./defaults.js";
export { readEnvMap, applyEnvOverrides, type EnvMap } from "./env.js";
export { loadConfig, summarizeConfig, type LoadOptions } from "./load.js";
