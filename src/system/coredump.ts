/**
 * Core dump settings of the harness process, inherited by every program
 * it launches.
 */

import { writeFileSync } from "node:fs";

import { toError } from "../errors.js";
import { logger } from "../utils/logging.js";

export const COREDUMP_FILTER_PATH = "/proc/self/coredump_filter";

/**
 * Set the memory mappings included in core dumps.
 *
 * @param filter - Hexadecimal bit mask, e.g. "0x7f"
 * @param target - File receiving the mask
 * @returns True when the mask was written
 */
export function applyCoredumpFilter(
  filter: string,
  target: string = COREDUMP_FILTER_PATH,
): boolean {
  try {
    writeFileSync(target, filter, "utf-8");
    logger.debug(`Core dump filter set to ${filter}`);
    return true;
  } catch (err) {
    logger.warn(`Cannot set the core dump filter: ${toError(err).message}`);
    return false;
  }
}
