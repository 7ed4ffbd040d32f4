// Re-export schema
export {
  ConfigFileSchema,
  createDefaultConfiguration,
  resolveConfiguration,
  toConfigFile,
  type Configuration,
  type ConfigurationPatch,
} from "./schema.js";

// Re-export store
export {
  loadConfiguration,
  loadOverride,
  saveConfiguration,
  serializeConfiguration,
  parseConfigurationPatch,
} from "./store.js";

// Re-export merge
export { applyOverrides, unionInto } from "./merge.js";

// Re-export flags
export {
  PROP_NAME,
  PROP_ID,
  PROP_STEAM_APPID,
  applyToggles,
  parseLaunchArgs,
  type LaunchContext,
  type ParsedArgs,
  type Toggle,
  type ToggleTarget,
} from "./flags.js";
