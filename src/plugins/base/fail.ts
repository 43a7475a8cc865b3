/**
 * Main plugin for runs that must reproduce the bug and leave a core dump.
 */

import path from "node:path";

import { PLUGIN_ERROR } from "../../constants.js";
import {
  ensureDir,
  expandPath,
  fileExists,
  moveFile,
  removePath,
} from "../../utils/file-io.js";
import { logger } from "../../utils/logging.js";
import { sleep } from "../../utils/retry.js";

import { switchToVariant } from "./variant.js";

import type { ProgramConfig } from "../../catalog/program-config.js";
import type {
  MainPlugin,
  TriggerHookContext,
  TriggerRunContext,
} from "../../types/index.js";

/**
 * Options of the fail plugin.
 */
export interface FailPluginOptions {
  /** Time the kernel gets to write the core dump */
  coreDumpWaitMs?: number;
  /** Directory a program may drop a `core` file into */
  cwd?: () => string;
}

/**
 * Places a program may leave its core dump in besides the configured path.
 *
 * @param program - Program configuration
 * @param cwd - Working directory of the harness
 * @returns Candidate paths, in the order they are collected
 */
export function coreDumpCandidates(program: ProgramConfig, cwd: string): string[] {
  const corePath = program.corePath();
  const withoutSuffix = corePath.split("-").slice(0, -1).join("-");
  return [
    path.join(program.installDirectory, "core"),
    path.join(cwd, "core"),
    path.join(program.installDirectory, "var", "core"),
    withoutSuffix,
  ].filter((candidate) => candidate !== "" && candidate !== corePath);
}

/**
 * Runs the `-fail` binary and checks the bug fired with its core dump.
 */
export class FailPlugin implements MainPlugin {
  readonly capability = "main" as const;
  readonly name = "fail";
  readonly help = "Simple trigger for failing runs";
  readonly extension = "fail";

  constructor(private readonly options: FailPluginOptions = {}) {}

  async preTriggerRun({ trigger, settings }: TriggerHookContext): Promise<void> {
    switchToVariant(trigger, this.extension);

    ensureDir(expandPath(settings.trigger.core_dump_location));
    const corePath = trigger.program.corePath();
    logger.verbose(`core_path: ${corePath}`);
    logger.debug(`Deleting any old core dump at ${corePath}`);
    removePath(corePath);
  }

  async checkTriggerSuccess({ trigger, error }: TriggerRunContext): Promise<number> {
    await sleep(this.options.coreDumpWaitMs ?? 100);

    const corePath = trigger.program.corePath();
    const cwd = this.options.cwd?.() ?? process.cwd();
    for (const candidate of coreDumpCandidates(trigger.program, cwd)) {
      if (fileExists(candidate)) {
        logger.debug(`Moving core dump ${candidate} to ${corePath}`);
        moveFile(candidate, corePath);
      }
    }

    if (!fileExists(corePath)) {
      logger.error(`Could not generate coredump for ${trigger.bug}`);
      return PLUGIN_ERROR;
    }
    logger.info(`Coredump generated at ${corePath}`);

    if (error === null) {
      logger.error("A bug was indeed triggered, but not the expected one. Be careful!");
      return PLUGIN_ERROR;
    }
    if (error === 0) {
      logger.error("The bug did not reproduce, the program exited normally");
      return PLUGIN_ERROR;
    }
    logger.info("The correct bug was triggered");
    return 0;
  }

  async postTriggerClean({ trigger, settings }: TriggerHookContext): Promise<void> {
    const corePath = trigger.program.corePath();
    if (!fileExists(corePath)) {
      return;
    }
    const destination = path.join(
      expandPath(settings.trigger.results_directory),
      trigger.bug,
      path.basename(corePath),
    );
    logger.verbose(`Saving core dump to ${destination}`);
    moveFile(corePath, destination);
  }
}
