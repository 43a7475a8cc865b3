/**
 * Switching a trigger to an instrumented variant of its binary.
 */

import { fileExists } from "../../utils/file-io.js";
import { logger } from "../../utils/logging.js";

import type { Trigger } from "../../trigger/trigger.js";

/**
 * Use `<binary>-<extension>` instead of the command's binary when the
 * variant is installed.
 *
 * @param trigger - Trigger to update
 * @param extension - Variant suffix, e.g. "fail"
 * @returns True when the variant was found and switched to
 */
export function switchToVariant(trigger: Trigger, extension: string): boolean {
  const binary = trigger.command.split(" ")[0] ?? "";
  if (binary === "") {
    return false;
  }

  const variant = `${binary}-${extension}`;
  if (!fileExists(variant)) {
    logger.debug(`No ${extension} variant at ${variant}`);
    return false;
  }

  trigger.command = trigger.command.replaceAll(binary, variant);
  trigger.program.executable = `${trigger.program.executable}-${extension}`;
  logger.verbose(`Using ${variant}`);
  return true;
}
