/**
 * Plugin loading.
 */

import { pathToFileURL } from "node:url";
import path from "node:path";

import { z } from "zod";

import { BugbaseError, toError } from "../errors.js";
import { logger } from "../utils/logging.js";

import { registerBasePlugins } from "./base/index.js";

import type { PluginRegistry } from "./registry.js";

export { HookDispatcher } from "./dispatcher.js";
export type { Janitor } from "./dispatcher.js";
export { PluginRegistry } from "./registry.js";
export { registerBasePlugins } from "./base/index.js";

/**
 * Bundles shipped with the harness, by name.
 */
const BUILTIN_BUNDLES: Record<string, (registry: PluginRegistry) => void> = {
  base: registerBasePlugins,
};

/**
 * Shape of an external bundle module.
 */
const PluginBundleSchema = z.object({
  register: z.function().args(z.unknown()).returns(z.unknown()),
});

/**
 * Resolve the specifier of an external bundle. Paths are resolved against
 * the working directory; anything else is treated as a package name.
 */
function bundleSpecifier(name: string): string {
  if (name.startsWith(".") || path.isAbsolute(name)) {
    return pathToFileURL(path.resolve(name)).href;
  }
  return name;
}

/**
 * Load plugin bundles into the registry, in order.
 *
 * @param registry - Registry to fill
 * @param enabled - Bundle names: built-in bundles, package names or module paths
 * @throws BugbaseError when a bundle cannot be loaded
 */
export async function loadPlugins(
  registry: PluginRegistry,
  enabled: readonly string[],
): Promise<void> {
  for (const name of enabled) {
    const builtin = BUILTIN_BUNDLES[name];
    if (builtin !== undefined) {
      builtin(registry);
      logger.debug(`Loaded built-in plugin bundle ${name}`);
      continue;
    }

    let module: unknown;
    try {
      module = await import(bundleSpecifier(name));
    } catch (err) {
      throw new BugbaseError(`Cannot load plugin bundle ${name}`, { cause: toError(err) });
    }

    const parsed = PluginBundleSchema.safeParse(module);
    if (!parsed.success) {
      throw new BugbaseError(`Plugin bundle ${name} does not export a register function`);
    }
    await parsed.data.register(registry);
    logger.debug(`Loaded plugin bundle ${name}`);
  }
}
