/**
 * Built-in plugin bundle.
 */

import { BenchmarkPlugin } from "./benchmark.js";
import { FailPlugin } from "./fail.js";
import { OverheadPlugin } from "./overhead.js";
import { RRPlugin } from "./rr.js";
import { SuccessPlugin } from "./success.js";

import type { PluginRegistry } from "../registry.js";

export { BenchmarkPlugin } from "./benchmark.js";
export { FailPlugin } from "./fail.js";
export { OverheadPlugin } from "./overhead.js";
export { RRPlugin } from "./rr.js";
export { SuccessPlugin } from "./success.js";

/**
 * Register the built-in plugins.
 *
 * @param registry - Registry to fill
 */
export function registerBasePlugins(registry: PluginRegistry): void {
  registry
    .register(new SuccessPlugin())
    .register(new FailPlugin())
    .register(new RRPlugin())
    .register(new BenchmarkPlugin())
    .register(new OverheadPlugin());
}
