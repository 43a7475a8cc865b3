/**
 * Classifiers turning run evidence into 0 (normal), 1 (bug reproduced) or
 * null (unexpected).
 */

import { existsSync, readFileSync } from "node:fs";

import { BugbaseError } from "../errors.js";
import { logger } from "../utils/logging.js";

import type {
  ClassificationContext,
  Classifier,
} from "../types/index.js";

function unsupported(description: string, context: ClassificationContext): never {
  throw new BugbaseError(`${description} cannot classify ${context.kind} evidence`);
}

/**
 * Classify by exit code.
 *
 * @param expectedFailure - Code the program exits with when the bug fires
 * @param aliases - Codes remapped before comparison
 * @returns Classifier
 */
export function exitCodeClassifier(
  expectedFailure: number,
  aliases: ReadonlyMap<number, number> = new Map(),
): Classifier {
  const description = `exit code (expected ${String(expectedFailure)})`;
  return {
    description,
    classify(context) {
      if (context.kind !== "exit-code") {
        return unsupported(description, context);
      }
      const code = aliases.get(context.errorCode) ?? context.errorCode;
      if (code === 0) {
        return 0;
      }
      if (code === expectedFailure) {
        return 1;
      }
      logger.verbose(
        `Got error code ${String(context.errorCode)}, expected ${String(expectedFailure)}`,
      );
      return null;
    },
  };
}

/**
 * Classify helper counters: every worker must report and at least one must
 * have seen all `workers x iterations` increments.
 *
 * @returns Classifier
 */
export function counterClassifier(): Classifier {
  const description = "shared counter";
  return {
    description,
    classify(context) {
      if (context.kind !== "worker-results") {
        return unsupported(description, context);
      }
      const { results, workers, iterations } = context;
      if (results.length < workers || results.includes(null)) {
        return 1;
      }
      if (!results.includes(workers * iterations)) {
        logger.verbose(
          `No helper reached ${String(workers * iterations)}: ${results.join(", ")}`,
        );
        return null;
      }
      return 0;
    },
  };
}

/**
 * Classify by scanning a log file for the bug's error line.
 *
 * @param logPath - Log file to scan
 * @param pattern - Pattern of the error line
 * @returns Classifier
 */
export function errorLogClassifier(logPath: string, pattern: RegExp): Classifier {
  const description = `error log ${logPath}`;
  return {
    description,
    classify(context) {
      if (context.kind !== "log-scan") {
        return unsupported(description, context);
      }
      if (!existsSync(logPath)) {
        return 0;
      }
      for (const line of readFileSync(logPath, "utf-8").split("\n")) {
        if (pattern.test(line)) {
          logger.debug(line);
          logger.debug("Found the error pattern in the log");
          return 1;
        }
      }
      logger.debug("No error pattern in the log");
      return 0;
    },
  };
}
