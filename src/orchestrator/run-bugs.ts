/**
 * Batch runs: every selected main plugin against every requested bug.
 */

import {
  PluginIncompatibleError,
  ProgramNotInstalledError,
  toError,
} from "../errors.js";
import { applyCoredumpFilter } from "../system/coredump.js";
import { logger, table } from "../utils/logging.js";

import { triggerBug } from "./trigger-bug.js";

import type { HarnessContext } from "./context.js";
import type {
  AnalysisPlugin,
  MainPlugin,
  MetaPlugin,
  PairOutcome,
  PairStatus,
} from "../types/index.js";

/**
 * What a batch runs.
 */
export interface BatchRequest {
  bugs: readonly string[];
  /** A main plugin, or a meta plugin choosing the main plugins */
  plugin: MainPlugin | MetaPlugin;
  analysisPlugins?: readonly AnalysisPlugin[];
  /** Options of the meta plugin's sub-command */
  options?: Readonly<Record<string, unknown>>;
}

/**
 * Outcome of a batch.
 */
export interface BatchResult {
  /** Exit code of the batch */
  verdict: number;
  outcomes: PairOutcome[];
}

async function runPair(
  context: HarnessContext,
  bug: string,
  mainPlugin: MainPlugin,
  analysisPlugins: readonly AnalysisPlugin[],
): Promise<PairOutcome> {
  const outcome = (status: PairStatus, verdict: number | null, message?: string): PairOutcome =>
    message === undefined
      ? { bug, plugin: mainPlugin.name, status, verdict }
      : { bug, plugin: mainPlugin.name, status, verdict, message };

  try {
    const verdict = await triggerBug(context, bug, mainPlugin, analysisPlugins);
    return outcome(verdict === 0 ? "passed" : "failed", verdict);
  } catch (err) {
    if (err instanceof ProgramNotInstalledError) {
      logger.warn(err.message);
      return outcome("not-installed", null, err.message);
    }
    if (err instanceof PluginIncompatibleError) {
      logger.warn(err.message);
      return outcome("incompatible", null, err.message);
    }
    const error = toError(err);
    logger.error(`${bug} with ${mainPlugin.name} failed: ${error.message}`);
    return outcome("error", null, error.message);
  }
}

/**
 * Render the per-pair summary.
 *
 * @param outcomes - Outcomes of the batch
 * @returns Table text
 */
export function renderSummary(outcomes: readonly PairOutcome[]): string {
  return table(
    ["bug", "plugin", "status", "exit code"],
    outcomes.map((o) => [o.bug, o.plugin, o.status, o.verdict === null ? "-" : String(o.verdict)]),
  );
}

/**
 * Run a batch.
 *
 * @param context - Harness context
 * @param request - Bugs and plugins to run
 * @returns Batch verdict (0 only when every pair passed) and the outcomes
 */
export async function runBugs(
  context: HarnessContext,
  request: BatchRequest,
): Promise<BatchResult> {
  const { settings, dispatcher, registry } = context;
  const options = request.options ?? {};
  const { plugin, bugs } = request;

  applyCoredumpFilter(settings.trigger.core_dump_filter);

  let mainPlugins: MainPlugin[];
  let analysisPlugins: readonly AnalysisPlugin[] = request.analysisPlugins ?? [];
  if (plugin.capability === "meta") {
    const selection = await dispatcher.beforeRun(plugin, {
      bugs,
      analysisPlugins,
      options,
      registry,
      settings,
    });
    mainPlugins = selection.mainPlugins;
    analysisPlugins = selection.analysisPlugins;
  } else {
    mainPlugins = [plugin];
  }

  const outcomes: PairOutcome[] = [];
  for (const mainPlugin of mainPlugins) {
    for (const bug of bugs) {
      outcomes.push(await runPair(context, bug, mainPlugin, analysisPlugins));
    }
  }

  let metaVerdict = 0;
  if (plugin.capability === "meta") {
    metaVerdict = await dispatcher.afterRun(plugin, {
      bugs,
      mainPlugins,
      outcomes,
      options,
      catalog: context.catalog,
      settings,
    });
  }

  if (outcomes.length > 0) {
    console.log(renderSummary(outcomes));
  }

  const allPassed = outcomes.every((o) => o.status === "passed");
  const verdict = metaVerdict !== 0 ? metaVerdict : allPassed ? 0 : 1;
  if (verdict === 0) {
    logger.success(`All ${String(outcomes.length)} run(s) passed`);
  } else {
    logger.failure(
      `${String(outcomes.filter((o) => o.status !== "passed").length)} of ${String(outcomes.length)} run(s) did not pass`,
    );
  }

  return { verdict, outcomes };
}
