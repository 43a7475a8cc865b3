/**
 * Services shared by every run of the harness.
 */

import { ProgramCatalog } from "../catalog/catalog.js";
import { currentHost, type HostInfo } from "../catalog/trigger-factory.js";
import { CATALOG_FILE } from "../constants.js";
import { loadPlugins } from "../plugins/index.js";
import { HookDispatcher } from "../plugins/dispatcher.js";
import { PluginRegistry } from "../plugins/registry.js";
import { createWorkerFactory } from "../trigger/helpers/worker.js";
import { ExecaLauncher } from "../trigger/process-launcher.js";
import { sleep } from "../utils/retry.js";

import type { Configuration } from "../config/loader.js";
import type { TriggerContext } from "../trigger/trigger.js";
import type { Settings } from "../types/index.js";

/**
 * Everything a command of the CLI works with.
 */
export interface HarnessContext {
  settings: Settings;
  catalog: ProgramCatalog;
  registry: PluginRegistry;
  dispatcher: HookDispatcher;
  triggerContext: TriggerContext;
  host: HostInfo;
}

/**
 * Pieces of the context that may be swapped, mostly by tests.
 */
export interface HarnessOverrides {
  catalog?: ProgramCatalog;
  registry?: PluginRegistry;
  triggerContext?: Partial<TriggerContext>;
  host?: HostInfo;
}

/**
 * Load the catalog and the plugins, and wire the services together.
 *
 * @param configuration - Loaded configuration
 * @param overrides - Replacements for individual services
 * @returns Harness context
 */
export async function createHarnessContext(
  configuration: Configuration,
  overrides: HarnessOverrides = {},
): Promise<HarnessContext> {
  const { settings } = configuration;

  const catalog = overrides.catalog ?? ProgramCatalog.load(CATALOG_FILE, settings);

  let registry = overrides.registry;
  if (registry === undefined) {
    registry = new PluginRegistry();
    await loadPlugins(registry, settings.plugins.enabled);
  }

  const triggerContext: TriggerContext = {
    launcher: new ExecaLauncher(),
    createWorker: createWorkerFactory(settings.helpers.isolation),
    settings,
    sleep,
    now: () => performance.now(),
    ...overrides.triggerContext,
  };

  return {
    settings,
    catalog,
    registry,
    dispatcher: new HookDispatcher(registry),
    triggerContext,
    host: overrides.host ?? currentHost(),
  };
}
