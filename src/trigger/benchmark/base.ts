/**
 * Benchmark strategies: repeat a trigger until enough well-behaved timed
 * samples are collected.
 */

import { TriggerFailedError, toError } from "../../errors.js";
import { logger } from "../../utils/logging.js";

import type { Trigger } from "../trigger.js";
import type { BenchmarkSettings, Classification } from "../../types/index.js";

/**
 * Sample counts and display of a benchmark.
 */
export interface BenchmarkOptions {
  /** Samples to collect */
  expectedResults: number;
  /** Attempts allowed before giving up */
  maximumTries: number;
  /** Trailing samples kept as the result */
  keptRuns: number;
  /** Requests per Apache bench run */
  apacheRequests: number;
  showProgress: boolean;
}

/**
 * Build benchmark options from the global settings.
 *
 * @param settings - Benchmark section of the settings
 * @param showProgress - Whether to draw a progress bar
 * @returns Benchmark options
 */
export function benchmarkOptionsFrom(
  settings: BenchmarkSettings,
  showProgress: boolean,
): BenchmarkOptions {
  return {
    expectedResults: settings.wanted_results,
    maximumTries: settings.maximum_tries,
    keptRuns: settings.kept_runs,
    apacheRequests: settings.apache_requests,
    showProgress,
  };
}

/**
 * A benchmark bound to one trigger.
 */
export abstract class BenchmarkStrategy {
  #attempts = 0;
  #samples: number[] = [];

  constructor(
    protected readonly trigger: Trigger,
    protected readonly options: BenchmarkOptions,
  ) {}

  /** Attempts made by the last run */
  get attempts(): number {
    return this.#attempts;
  }

  /** Samples accepted by the last run */
  get accepted(): readonly number[] {
    return this.#samples;
  }

  /**
   * Samples to collect and to keep.
   *
   * @returns Expected and kept sample counts
   */
  protected target(): { expected: number; kept: number } {
    return { expected: this.options.expectedResults, kept: this.options.keptRuns };
  }

  /**
   * Produce one sample, or throw when the attempt misbehaved.
   */
  protected abstract attempt(): Promise<number>;

  /**
   * Apply the bug's benchmark overrides.
   */
  async prepare(): Promise<void> {
    await this.trigger.prepareBenchmark();
  }

  /**
   * Collect samples until the target is met or attempts run out.
   *
   * @returns 0 when enough samples were collected, 1 otherwise
   */
  async run(): Promise<Classification> {
    const { expected, kept } = this.target();
    const { maximumTries, showProgress } = this.options;

    this.trigger.beginRun();
    this.#attempts = 0;
    this.#samples = [];

    while (this.#samples.length < expected && this.#attempts < maximumTries) {
      this.#attempts++;
      try {
        this.#samples.push(await this.attempt());
      } catch (err) {
        const error = toError(err);
        if (error instanceof TriggerFailedError) {
          logger.warn(`${error.message}, retrying`);
        } else {
          logger.warn(`A trigger failed, retrying one more time: ${error.message}`);
        }
      }
      if (showProgress) {
        logger.progress(this.#samples.length, expected, this.trigger.bug);
      }
    }

    this.trigger.settle();

    if (this.#samples.length < expected) {
      logger.error(
        `${this.trigger.bug}: only ${String(this.#samples.length)} of ${String(expected)} samples after ${String(this.#attempts)} tries`,
      );
      return 1;
    }

    const result = this.#samples.slice(expected - kept);
    logger.verbose(`Run times : ${result.join(", ")} secs`);
    this.trigger.recordResult(result);
    return 0;
  }
}
