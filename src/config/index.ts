/**
 * Configuration module exports.
 */

export {
  Configuration,
  ConfigLoadError,
  ConfigValidationError,
  loadYamlFile,
  mergeSettings,
  readSettings,
  resolveConfigDirectory,
  validateSettings,
} from "./loader.js";

export {
  SettingsSchema,
  InstallSettingsSchema,
  TriggerSettingsSchema,
  BenchmarkSettingsSchema,
  PluginSettingsSchema,
  HelperSettingsSchema,
  LoggingSettingsSchema,
  CatalogSchema,
  BugEntrySchema,
  LaunchDefinitionSchema,
  HelperDefinitionSchema,
  BenchmarkOverridesSchema,
} from "./schema.js";

export {
  createDefaultSettings,
  DEFAULT_INSTALL,
  DEFAULT_TRIGGER,
  DEFAULT_BENCHMARK,
  DEFAULT_HELPERS,
  DEFAULT_LOGGING,
  DEFAULT_TUNING,
} from "./defaults.js";
