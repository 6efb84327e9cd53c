export { authCoreConfigSchema } from "./schema.js";
export type { AuthCoreConfig, AuthCoreConfigInput, AuthScheme } from "./schema.js";
export {
  ConfigError,
  ENV_PREFIX,
  loadAuthCoreConfig,
  parseAuthCoreConfig,
  readConfigFile,
  readEnvironmentOverrides,
} from "./load-config.js";
export type { EnvironmentLike, LoadAuthCoreConfigOptions } from "./load-config.js";
