/**
 * Hook dispatcher: calls plugin hooks in a fixed order.
 */

import { CleanupError, toError } from "../errors.js";
import { logger } from "../utils/logging.js";

import type { PluginRegistry } from "./registry.js";
import type {
  AnalysisPlugin,
  InstallHookContext,
  MainPlugin,
  MetaPlugin,
  MetaResultContext,
  MetaRunContext,
  PluginSelection,
  Settings,
  TriggerHookContext,
  TriggerRunContext,
} from "../types/index.js";

/**
 * Cleanup callback run after every pair.
 */
export type Janitor = (context: TriggerHookContext) => Promise<void> | void;

interface JanitorEntry {
  janitor: Janitor;
  once: boolean;
}

/**
 * Dispatches the plugin lifecycle hooks.
 */
export class HookDispatcher {
  #janitors: JanitorEntry[] = [];

  constructor(readonly registry: PluginRegistry) {}

  /**
   * Register a cleanup callback run at the end of `postTriggerClean`.
   *
   * @param janitor - Callback
   * @param options - `once` removes it after its first run
   */
  registerJanitor(janitor: Janitor, options: { once?: boolean } = {}): void {
    this.#janitors.push({ janitor, once: options.once ?? false });
  }

  get janitorCount(): number {
    return this.#janitors.length;
  }

  /**
   * Let every registered plugin configure itself.
   *
   * @param force - Redo the configuration from scratch
   * @param settings - Global settings
   */
  async configure(force: boolean, settings: Settings): Promise<void> {
    for (const plugin of this.registry.all()) {
      await plugin.configure?.(force, settings);
    }
  }

  /**
   * Main plugin first, then each analysis plugin.
   */
  async preTriggerRun(
    analysisPlugins: readonly AnalysisPlugin[],
    context: TriggerHookContext,
  ): Promise<void> {
    await context.mainPlugin.preTriggerRun?.(context);
    for (const plugin of analysisPlugins) {
      await plugin.preTriggerRun?.(context);
    }
  }

  /**
   * Ask the main plugin whether the run counts as a success.
   *
   * @returns The pair's exit code
   */
  async checkTriggerSuccess(context: TriggerRunContext): Promise<number> {
    return context.mainPlugin.checkTriggerSuccess(context);
  }

  /**
   * Main plugin first, then each analysis plugin.
   */
  async postTriggerRun(
    analysisPlugins: readonly AnalysisPlugin[],
    context: TriggerRunContext,
  ): Promise<void> {
    await context.mainPlugin.postTriggerRun?.(context);
    for (const plugin of analysisPlugins) {
      await plugin.postTriggerRun?.(context);
    }
  }

  /**
   * Main plugin, analysis plugins, then every janitor. Each step runs even
   * when an earlier one failed.
   *
   * @throws CleanupError listing every failed step
   */
  async postTriggerClean(
    analysisPlugins: readonly AnalysisPlugin[],
    context: TriggerHookContext,
  ): Promise<void> {
    const failures: Error[] = [];
    const attempt = async (label: string, step: () => Promise<void> | void): Promise<void> => {
      try {
        await step();
      } catch (err) {
        const error = toError(err);
        logger.error(`Cleaning with ${label} failed: ${error.message}`);
        failures.push(error);
      }
    };

    const { mainPlugin } = context;
    await attempt(mainPlugin.name, () => mainPlugin.postTriggerClean?.(context));
    for (const plugin of analysisPlugins) {
      await attempt(plugin.name, () => plugin.postTriggerClean?.(context));
    }

    const janitors = this.#janitors;
    this.#janitors = janitors.filter((entry) => !entry.once);
    for (const { janitor } of janitors) {
      await attempt("janitor", () => janitor(context));
    }

    if (failures.length > 0) {
      throw new CleanupError(failures);
    }
  }

  /**
   * Let a meta plugin pick the plugins of the batch.
   */
  async beforeRun(plugin: MetaPlugin, context: MetaRunContext): Promise<PluginSelection> {
    return plugin.beforeRun(context);
  }

  /**
   * Let a meta plugin report on the batch.
   *
   * @returns The meta plugin's exit code
   */
  async afterRun(plugin: MetaPlugin, context: MetaResultContext): Promise<number> {
    return plugin.afterRun(context);
  }

  /**
   * Run every install plugin after a program was installed.
   */
  async postInstallRun(context: InstallHookContext): Promise<void> {
    for (const plugin of this.registry.list("install")) {
      await plugin.postInstallRun(context);
    }
  }

  /**
   * Let every install plugin clean after an installation.
   */
  async postInstallClean(context: InstallHookContext): Promise<void> {
    for (const plugin of this.registry.list("install")) {
      await plugin.postInstallClean?.(context);
    }
  }
}
