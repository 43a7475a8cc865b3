/**
 * Plugin registry: explicit registration, lookup by capability.
 */

import { BugbaseError, UnknownPluginError } from "../errors.js";

import type { Plugin, PluginCapability, PluginOf } from "../types/index.js";

/**
 * Holds every loaded plugin in registration order.
 */
export class PluginRegistry {
  readonly #plugins: Plugin[] = [];

  /**
   * Add a plugin.
   *
   * @param plugin - Plugin to add
   * @returns The registry, for chaining
   * @throws BugbaseError when a plugin of the same capability has that name
   */
  register(plugin: Plugin): this {
    if (this.find(plugin.capability, plugin.name) !== undefined) {
      throw new BugbaseError(
        `A ${plugin.capability} plugin named ${plugin.name} is already registered`,
      );
    }
    this.#plugins.push(plugin);
    return this;
  }

  /**
   * Plugins of a capability, in registration order. Read on every call,
   * so plugins registered late are seen.
   *
   * @param capability - Capability to list
   * @returns Matching plugins
   */
  list<C extends PluginCapability>(capability: C): PluginOf<C>[] {
    return this.#plugins.filter(
      (plugin): plugin is PluginOf<C> => plugin.capability === capability,
    );
  }

  /**
   * Every plugin, in registration order.
   *
   * @returns All plugins
   */
  all(): readonly Plugin[] {
    return [...this.#plugins];
  }

  /**
   * Look up a plugin.
   *
   * @param capability - Capability
   * @param name - Plugin name
   * @returns The plugin, or undefined
   */
  find<C extends PluginCapability>(capability: C, name: string): PluginOf<C> | undefined {
    return this.list(capability).find((plugin) => plugin.name === name);
  }

  /**
   * Look up a plugin that must exist.
   *
   * @param capability - Capability
   * @param name - Plugin name
   * @returns The plugin
   * @throws UnknownPluginError when absent
   */
  get<C extends PluginCapability>(capability: C, name: string): PluginOf<C> {
    const plugin = this.find(capability, name);
    if (plugin === undefined) {
      throw new UnknownPluginError(name, capability);
    }
    return plugin;
  }
}
