/**
 * Collects the values reported by helper workers.
 */
export class ResultsChannel<T> {
  readonly #items: T[] = [];

  /**
   * Add a value. Never blocks.
   *
   * @param value - Reported value
   */
  put(value: T): void {
    this.#items.push(value);
  }

  /**
   * Take up to `max` values, oldest first. Never waits for more.
   *
   * @param max - Maximum number of values to take
   * @returns The values available right now
   */
  drain(max = Number.POSITIVE_INFINITY): T[] {
    const count = Math.min(max, this.#items.length);
    return this.#items.splice(0, count);
  }

  get size(): number {
    return this.#items.length;
  }
}
