/**
 * Concurrency control utilities.
 */

import { Mutex } from "async-mutex";

/**
 * Wait for a promise, giving up after a timeout.
 *
 * @param promise - Promise to wait for
 * @param timeoutMs - Maximum wait; undefined waits forever
 * @returns True if the promise settled in time
 */
export async function waitFor(
  promise: Promise<unknown>,
  timeoutMs?: number,
): Promise<boolean> {
  if (timeoutMs === undefined) {
    await promise;
    return true;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => {
      resolve(false);
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Named mutexes, one per key, created on first use.
 */
export class KeyedMutex {
  readonly #mutexes = new Map<string, Mutex>();

  /**
   * Run a function while holding the mutex of a key.
   *
   * @param key - Resource key
   * @param fn - Function to run exclusively
   * @returns Result of the function
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.#mutexes.get(key);
    if (mutex === undefined) {
      mutex = new Mutex();
      this.#mutexes.set(key, mutex);
    }
    return mutex.runExclusive(fn);
  }

  /**
   * Check whether a key is currently held.
   *
   * @param key - Resource key
   * @returns True while a holder is running
   */
  isLocked(key: string): boolean {
    return this.#mutexes.get(key)?.isLocked() ?? false;
  }
}
