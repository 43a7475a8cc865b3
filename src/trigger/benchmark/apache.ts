/**
 * Benchmark of Apache httpd with the `ab` utility.
 */

import { TriggerFailedError } from "../../errors.js";
import { logger } from "../../utils/logging.js";

import { BenchmarkStrategy, type BenchmarkOptions } from "./base.js";

import type { ApacheLaunch } from "../launch/apache.js";
import type { Trigger } from "../trigger.js";

/**
 * Extract the request rate from `ab` output.
 *
 * @param output - Output of `ab`
 * @returns Requests per second, or null when absent
 */
export function parseRequestsPerSecond(output: string): number | null {
  for (const line of output.split("\n")) {
    if (line.startsWith("Requests per second:")) {
      const value = Number.parseFloat(line.split(":")[1]?.trim() ?? "");
      return Number.isNaN(value) ? null : value;
    }
  }
  return null;
}

/**
 * Measures requests per second against a fresh server. One sample is
 * enough: `ab` already averages over its requests.
 */
export class ApacheBenchmark extends BenchmarkStrategy {
  constructor(
    trigger: Trigger,
    options: BenchmarkOptions,
    private readonly launch: ApacheLaunch,
  ) {
    super(trigger, options);
  }

  protected override target(): { expected: number; kept: number } {
    return { expected: 1, kept: 1 };
  }

  /**
   * URL fetched by `ab`.
   */
  get url(): string {
    return this.trigger.format(
      this.trigger.benchmarkOverrides.url ?? "http://127.0.0.1:{port}/",
    );
  }

  protected async attempt(): Promise<number> {
    const { launcher, sleep } = this.trigger.context;

    this.launch.beforeStart(this.trigger);
    const server = this.launch.startServer(this.trigger);
    try {
      await sleep(this.launch.server.delayMs);
      const command = ["ab", "-n", String(this.options.apacheRequests), "-c", "1", this.url];
      logger.verbose(command.join(" "));

      const result = await launcher.run(command);
      if (result.exitCode !== 0) {
        throw new TriggerFailedError(`ab exited with ${String(result.exitCode)}`);
      }
      if (this.trigger.checkSuccess({ kind: "log-scan" }) !== 0) {
        throw new TriggerFailedError("The bug showed up while benchmarking");
      }

      const rate = parseRequestsPerSecond(result.output);
      if (rate === null) {
        throw new TriggerFailedError("ab reported no request rate");
      }
      logger.verbose(`Requests per second : ${String(rate)}`);
      return rate;
    } finally {
      await this.launch.stopServer(this.trigger, server);
    }
  }
}
