/**
 * Scoped resources: acquired before a function runs, released on every
 * exit path.
 */

import path from "node:path";

import lockfile from "proper-lockfile";

import { DEFAULT_TUNING } from "../config/defaults.js";
import { toError } from "../errors.js";

import { KeyedMutex } from "./concurrency.js";
import { ensureDir } from "./file-io.js";
import { logger } from "./logging.js";

const inProcessLocks = new KeyedMutex();

/**
 * Run a function while holding a cross-process lock on a path.
 *
 * Blocks until the lock is free. Callers in the same process queue on an
 * in-memory mutex first, so they never poll each other's lock directory.
 *
 * @param lockPath - Path identifying the locked resource
 * @param fn - Function to run under the lock
 * @returns Result of the function
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
): Promise<T> {
  const target = path.resolve(lockPath);
  ensureDir(path.dirname(target));

  return inProcessLocks.runExclusive(target, async () => {
    logger.debug(`Acquiring lock ${target}`);
    const release = await lockfile.lock(target, {
      realpath: false,
      stale: DEFAULT_TUNING.timeouts.lock_stale_ms,
      retries: { forever: true, minTimeout: 100, maxTimeout: 1000 },
      // Reported, never thrown from proper-lockfile's refresh timer.
      onCompromised: (err) => {
        logger.warn(`Lock ${target} was compromised: ${err.message}`);
      },
    });

    try {
      return await fn();
    } finally {
      try {
        await release();
        logger.debug(`Released lock ${target}`);
      } catch (err) {
        logger.warn(`Releasing lock ${target} failed: ${toError(err).message}`);
      }
    }
  });
}
