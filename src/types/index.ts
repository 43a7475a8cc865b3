/**
 * Type exports.
 */

export type {
  Settings,
  InstallSettings,
  TriggerSettings,
  BenchmarkSettings,
  HelperSettings,
  LoggingSettings,
  HelperIsolation,
  BugEntry,
  LaunchDefinition,
  LaunchKind,
  HelperDefinition,
  BenchmarkOverrides,
  ParamValue,
  TuningConfig,
} from "./config.js";

export type {
  Classification,
  TriggerState,
  WorkerResult,
  ClassificationContext,
  Classifier,
  HelperSpec,
} from "./trigger.js";

export type {
  PluginCapability,
  TriggerHookContext,
  TriggerRunContext,
  InstallHookContext,
  PluginHooks,
  MainPlugin,
  AnalysisPlugin,
  InstallPlugin,
  MetaOption,
  PluginSelection,
  PairStatus,
  PairOutcome,
  MetaRunContext,
  MetaResultContext,
  MetaPlugin,
  Plugin,
  PluginOf,
} from "./plugin.js";
