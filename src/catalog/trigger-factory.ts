/**
 * Builds Triggers from catalog entries.
 */

import { DEFAULT_TUNING } from "../config/defaults.js";
import { DATA_PATH, ROOT_PATH } from "../constants.js";
import { BugbaseError } from "../errors.js";
import {
  counterClassifier,
  errorLogClassifier,
  exitCodeClassifier,
} from "../trigger/classifiers.js";
import { ApacheLaunch, apacheEnvironment } from "../trigger/launch/apache.js";
import { ClientServerLaunch, type HelperPlan } from "../trigger/launch/client-server.js";
import { PlainLaunch } from "../trigger/launch/plain.js";
import { isSignalName } from "../trigger/process-launcher.js";
import { Trigger, type TriggerContext } from "../trigger/trigger.js";
import { expandPath } from "../utils/file-io.js";
import { formatTemplate } from "../utils/template.js";

import type { ProgramCatalog } from "./catalog.js";
import type { ProgramConfig } from "./program-config.js";
import type {
  BugEntry,
  HelperDefinition,
  ParamValue,
  Settings,
} from "../types/index.js";

/**
 * Host facts the factory depends on.
 */
export interface HostInfo {
  env: NodeJS.ProcessEnv;
  isRoot: boolean;
}

/**
 * Facts of the running host.
 *
 * @returns Environment and root status of this process
 */
export function currentHost(): HostInfo {
  return { env: process.env, isRoot: process.getuid?.() === 0 };
}

/**
 * Values available to every template of a bug.
 *
 * @param program - Program configuration
 * @param entry - Catalog entry
 * @param settings - Global settings
 * @returns Template values
 */
export function templateValuesFor(
  program: ProgramConfig,
  entry: BugEntry,
  settings: Settings,
): Record<string, ParamValue> {
  const values: Record<string, ParamValue> = {
    ...entry.options,
    install_directory: program.installDirectory,
    source_directory: expandPath(settings.install.source_directory),
    utilities_directory: expandPath(settings.install.utilities_directory),
    data: DATA_PATH.replace(/\/$/, ""),
    root: ROOT_PATH.replace(/\/$/, ""),
  };
  if (program.listeningPort !== undefined) {
    values["port"] = program.listeningPort;
  }
  return values;
}

function helperPlan(helper: HelperDefinition): HelperPlan {
  return {
    action: helper.action,
    commands: helper.commands,
    iterations: helper.iterations,
    timeoutMs: helper.timeout_ms,
    params: helper.params,
  };
}

/**
 * Build the trigger of a catalogued bug.
 *
 * @param bug - Bug name
 * @param catalog - Bug catalog
 * @param context - Services the trigger runs with
 * @param host - Host facts
 * @returns Trigger ready to run
 */
export function createTrigger(
  bug: string,
  catalog: ProgramCatalog,
  context: TriggerContext,
  host: HostInfo = currentHost(),
): Trigger {
  const entry = catalog.entry(bug);
  const program = catalog.program(bug);
  const templateValues = templateValuesFor(program, entry, context.settings);
  const format = (template: string): string =>
    formatTemplate(template, { ...templateValues, executable: program.executablePath() });
  const common = {
    bug,
    program,
    context,
    benchmark: entry.benchmark,
    templateValues,
  };

  const launch = entry.trigger;
  switch (launch.kind) {
    case "plain": {
      if (!isSignalName(launch.hang_signal)) {
        throw new BugbaseError(`${bug}: unknown signal ${launch.hang_signal}`);
      }
      const aliases = new Map(
        Object.entries(launch.exit_code_aliases).map(
          ([from, to]): [number, number] => [Number(from), to],
        ),
      );
      return new Trigger({
        ...common,
        command: format(launch.failure_cmd),
        successCommand: format(launch.success_cmd ?? launch.failure_cmd),
        strategy: new PlainLaunch({
          cwd: ROOT_PATH,
          hangTimeoutMs: launch.hang_timeout_ms,
          hangSignal: launch.hang_signal,
          hangExitCode: launch.hang_exit_code,
        }),
        classifier: exitCodeClassifier(launch.expected_failure, aliases),
      });
    }

    case "client-server": {
      const rootArgs =
        host.isRoot && launch.root_args !== undefined ? ` ${launch.root_args}` : "";
      return new Trigger({
        ...common,
        command: `${format(launch.start_cmd)}${rootArgs}`,
        strategy: new ClientServerLaunch({
          stopCommand: launch.stop_cmd,
          delayMs: launch.delay_ms ?? DEFAULT_TUNING.timeouts.settle_delay_ms,
          helper: helperPlan(launch.helper),
        }),
        classifier: counterClassifier(),
      });
    }

    case "apache": {
      const strategy = new ApacheLaunch(
        {
          stopCommand: "{executable} -k stop",
          delayMs: launch.delay_ms ?? DEFAULT_TUNING.timeouts.settle_delay_ms,
          helper: helperPlan(launch.helper),
          env: apacheEnvironment(host.env),
        },
        program.installDirectory,
      );
      return new Trigger({
        ...common,
        command: format("{executable} -k start"),
        strategy,
        classifier: errorLogClassifier(strategy.errorLog, new RegExp(launch.error_pattern)),
      });
    }
  }
}

/**
 * Transient paths to remove after a bug ran.
 *
 * @param bug - Bug name
 * @param trigger - The bug's trigger
 * @param catalog - Bug catalog
 * @returns Absolute paths
 */
export function cleanupPathsFor(
  bug: string,
  trigger: Trigger,
  catalog: ProgramCatalog,
): string[] {
  return catalog.entry(bug).cleanup_paths.map((template) => trigger.format(template));
}
