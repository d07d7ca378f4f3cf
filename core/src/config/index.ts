export {
  loadConfig,
  parseConfig,
  getDefaultConfig,
  getConfigPath,
  resolveHomeDir,
  DEFAULT_ZSH_PLUGINS,
  DEFAULT_PROMPT_THEME,
  type RigupConfig,
  type FontMode,
  type LoadConfigOptions,
} from "./config-store.js";
