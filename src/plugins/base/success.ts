/**
 * Main plugin for runs that must not reproduce the bug.
 */

import { PLUGIN_ERROR } from "../../constants.js";
import { logger } from "../../utils/logging.js";

import { switchToVariant } from "./variant.js";

import type {
  MainPlugin,
  TriggerHookContext,
  TriggerRunContext,
} from "../../types/index.js";

/**
 * Runs the bug's success command on the `-success` binary and expects a
 * normal run.
 */
export class SuccessPlugin implements MainPlugin {
  readonly capability = "main" as const;
  readonly name: string = "success";
  readonly help: string = "Simple trigger for successful runs";
  readonly extension: string = "success";

  async preTriggerRun({ trigger }: TriggerHookContext): Promise<void> {
    if (trigger.successCommand !== undefined) {
      trigger.command = trigger.successCommand;
    }
    switchToVariant(trigger, this.extension);
  }

  async checkTriggerSuccess({ trigger, error }: TriggerRunContext): Promise<number> {
    if (error === null) {
      logger.error("The bug failed with an unknown error code");
      return PLUGIN_ERROR;
    }
    if (error === 1) {
      logger.error(`${trigger.bug} reproduced the bug during a run meant to succeed`);
      return PLUGIN_ERROR;
    }
    logger.info(`${trigger.bug} ran successfully`);
    return 0;
  }
}
