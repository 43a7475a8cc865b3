/**
 * Plugin types.
 */

import type { ProgramCatalog } from "../catalog/catalog.js";
import type { ProgramConfig } from "../catalog/program-config.js";
import type { PluginRegistry } from "../plugins/registry.js";
import type { Trigger } from "../trigger/trigger.js";
import type { Settings } from "./config.js";
import type { Classification } from "./trigger.js";

/**
 * What a plugin is used for.
 */
export type PluginCapability = "main" | "analysis" | "install" | "meta";

/**
 * Arguments of the per-pair hooks.
 */
export interface TriggerHookContext {
  trigger: Trigger;
  mainPlugin: MainPlugin;
  settings: Settings;
}

/**
 * Arguments of the hooks that run once the trigger has run.
 */
export interface TriggerRunContext extends TriggerHookContext {
  /** Classification returned by the run */
  error: Classification;
}

/**
 * Arguments of the install hooks.
 */
export interface InstallHookContext {
  program: ProgramConfig;
  settings: Settings;
}

/**
 * Hooks shared by every plugin. All are optional.
 */
export interface PluginHooks {
  /** Plugin-specific configuration; `force` redoes it from scratch */
  configure?(force: boolean, settings: Settings): Promise<void>;
  preTriggerRun?(context: TriggerHookContext): Promise<void>;
  postTriggerRun?(context: TriggerRunContext): Promise<void>;
  postTriggerClean?(context: TriggerHookContext): Promise<void>;
}

interface PluginIdentity {
  readonly name: string;
  readonly help: string;
}

/**
 * Decides how a bug is run and what counts as success.
 */
export interface MainPlugin extends PluginIdentity, PluginHooks {
  readonly capability: "main";
  /** Suffix of the variant binary the plugin runs, if any */
  readonly extension: string;
  /**
   * Turn the run's classification into the pair's exit code.
   *
   * @returns 0 when the run behaved the way the plugin wants
   */
  checkTriggerSuccess(context: TriggerRunContext): Promise<number>;
}

/**
 * Optional analysis stacked on any main plugin, enabled by a CLI flag.
 */
export interface AnalysisPlugin extends PluginIdentity, PluginHooks {
  readonly capability: "analysis";
  /** CLI flags enabling the plugin, e.g. ["-b", "--benchmark"] */
  readonly flags: readonly string[];
}

/**
 * Hooks run after a program is installed.
 */
export interface InstallPlugin extends PluginIdentity, PluginHooks {
  readonly capability: "install";
  postInstallRun(context: InstallHookContext): Promise<void>;
  postInstallClean?(context: InstallHookContext): Promise<void>;
}

/**
 * A command-line option of a meta plugin.
 */
export interface MetaOption {
  /** Commander flags, e.g. "-p, --plugin <name>" */
  flags: string;
  description: string;
  /** Collect repeated occurrences into a list */
  repeatable?: boolean;
  choices?: readonly string[];
  required?: boolean;
}

/**
 * Main and analysis plugins a meta plugin wants to run.
 */
export interface PluginSelection {
  mainPlugins: MainPlugin[];
  analysisPlugins: AnalysisPlugin[];
}

/**
 * Outcome of one (bug x main plugin) pair.
 */
export type PairStatus =
  | "passed"
  | "failed"
  | "not-installed"
  | "incompatible"
  | "error";

export interface PairOutcome {
  bug: string;
  plugin: string;
  status: PairStatus;
  /** Exit code of the pair; null when it did not run to the end */
  verdict: number | null;
  message?: string;
}

/**
 * Arguments of a meta plugin's `beforeRun`.
 */
export interface MetaRunContext {
  bugs: readonly string[];
  analysisPlugins: readonly AnalysisPlugin[];
  options: Readonly<Record<string, unknown>>;
  registry: PluginRegistry;
  settings: Settings;
}

/**
 * Arguments of a meta plugin's `afterRun`.
 */
export interface MetaResultContext {
  bugs: readonly string[];
  mainPlugins: readonly MainPlugin[];
  outcomes: readonly PairOutcome[];
  options: Readonly<Record<string, unknown>>;
  catalog: ProgramCatalog;
  settings: Settings;
}

/**
 * Runs a batch of main plugins and reports on the batch as a whole.
 */
export interface MetaPlugin extends PluginIdentity, PluginHooks {
  readonly capability: "meta";
  /** Options of the plugin's sub-command */
  options(registry: PluginRegistry): MetaOption[];
  beforeRun(context: MetaRunContext): Promise<PluginSelection>;
  /** @returns Exit code overriding the batch verdict when non-zero */
  afterRun(context: MetaResultContext): Promise<number>;
}

/**
 * Any plugin.
 */
export type Plugin = MainPlugin | AnalysisPlugin | InstallPlugin | MetaPlugin;

/**
 * Plugins of one capability.
 */
export type PluginOf<C extends PluginCapability> = Extract<Plugin, { capability: C }>;
