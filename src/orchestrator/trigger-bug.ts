/**
 * Triggering of one (bug x main plugin) pair.
 */

import path from "node:path";

import { cleanupPathsFor, createTrigger } from "../catalog/trigger-factory.js";
import { ProgramNotInstalledError, toError } from "../errors.js";
import { expandPath, removePath } from "../utils/file-io.js";
import { logger } from "../utils/logging.js";
import { withFileLock } from "../utils/scoped.js";

import type { HarnessContext } from "./context.js";
import type {
  AnalysisPlugin,
  MainPlugin,
  Settings,
  TriggerHookContext,
} from "../types/index.js";

/**
 * Lock serializing runs of one bug across harness processes.
 *
 * @param settings - Global settings
 * @param bug - Bug name
 * @returns Path of the lock
 */
export function bugLockPath(settings: Settings, bug: string): string {
  return path.join(expandPath(settings.trigger.lock_directory), `${bug}.lock`);
}

/**
 * Trigger a bug under a main plugin and its analysis plugins.
 *
 * @param context - Harness context
 * @param bug - Bug name
 * @param mainPlugin - Main plugin deciding the verdict
 * @param analysisPlugins - Analysis plugins stacked on the run
 * @returns 0 when the run behaved as the main plugin wants, its error code otherwise
 * @throws ProgramNotInstalledError when the bug's program is missing
 */
export async function triggerBug(
  context: HarnessContext,
  bug: string,
  mainPlugin: MainPlugin,
  analysisPlugins: readonly AnalysisPlugin[] = [],
): Promise<number> {
  const { catalog, dispatcher, settings } = context;

  logger.section(`${bug} (${mainPlugin.name})`, "triggering");

  const trigger = createTrigger(bug, catalog, context.triggerContext, context.host);
  if (!catalog.isInstalled(bug)) {
    throw new ProgramNotInstalledError(bug, catalog.installDirectory(bug));
  }

  for (const target of cleanupPathsFor(bug, trigger, catalog)) {
    dispatcher.registerJanitor(
      () => {
        logger.debug(`Removing ${target}`);
        removePath(target);
      },
      { once: true },
    );
  }

  const hookContext: TriggerHookContext = { trigger, mainPlugin, settings };

  return withFileLock(bugLockPath(settings, bug), async () => {
    let verdict: number;
    try {
      await dispatcher.preTriggerRun(analysisPlugins, hookContext);

      const error = await trigger.run();
      const runContext = { ...hookContext, error };

      verdict = await dispatcher.checkTriggerSuccess(runContext);
      if (verdict !== 0) {
        logger.error(`${bug} did not run successfully`);
      } else {
        await dispatcher.postTriggerRun(analysisPlugins, runContext);
      }
    } catch (err) {
      logger.verbose("Cleaning environment");
      try {
        await dispatcher.postTriggerClean(analysisPlugins, hookContext);
      } catch (cleanupErr) {
        logger.debug(`Cleanup after a failed run also failed: ${toError(cleanupErr).message}`);
      }
      throw err;
    }

    logger.verbose("Cleaning environment");
    await dispatcher.postTriggerClean(analysisPlugins, hookContext);
    return verdict;
  });
}
