/**
 * Main plugin recording successful runs with rr.
 */

import path from "node:path";

import { MissingDependencyError, PluginIncompatibleError } from "../../errors.js";
import { expandPath, fileExists } from "../../utils/file-io.js";
import { logger } from "../../utils/logging.js";

import { SuccessPlugin } from "./success.js";

import type { Settings, TriggerHookContext } from "../../types/index.js";

/**
 * Location of the rr binary.
 *
 * @param settings - Global settings
 * @returns Path of `rr`
 */
export function rrPath(settings: Settings): string {
  return path.join(expandPath(settings.install.utilities_directory), "rr", "bin", "rr");
}

/**
 * Record & replay: a successful run under `rr record`.
 */
export class RRPlugin extends SuccessPlugin {
  override readonly name: string = "rr";
  override readonly help: string = "Mozilla's Record Replay";

  async configure(_force: boolean, settings: Settings): Promise<void> {
    const rr = rrPath(settings);
    if (!fileExists(rr)) {
      logger.warn(`rr is not installed at ${rr}`);
    }
  }

  override async preTriggerRun(context: TriggerHookContext): Promise<void> {
    // `httpd -k start` detaches from its parent; rr would only record the launcher.
    if (context.trigger.strategy.kind === "apache") {
      throw new PluginIncompatibleError(
        this.name,
        context.trigger.bug,
        "the server daemonizes outside of the recording",
      );
    }
    await super.preTriggerRun(context);

    const rr = rrPath(context.settings);
    if (!fileExists(rr)) {
      throw new MissingDependencyError("rr", rr);
    }
    context.trigger.command = `${rr} record ${context.trigger.command}`;
  }
}
