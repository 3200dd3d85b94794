export type {
  DevprepConfig,
  PackageManagerConfig,
  EnvFileConfig,
  LogsConfig,
  ChecksConfig,
  LoadedConfig,
} from "./config.js";
export {
  getDefaultConfig,
  mergeConfig,
  freezeConfig,
  loadConfig,
  expandHome,
} from "./config.js";
