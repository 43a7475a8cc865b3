/**
 * Benchmark of a program launched directly.
 */

import { TriggerFailedError } from "../../errors.js";

import { BenchmarkStrategy, type BenchmarkOptions } from "./base.js";

import type { Trigger } from "../trigger.js";

/**
 * Times one invocation of the trigger command per attempt.
 */
export class RepeatedInvocationBenchmark extends BenchmarkStrategy {
  constructor(
    trigger: Trigger,
    options: BenchmarkOptions,
    private readonly cwd?: string,
  ) {
    super(trigger, options);
  }

  protected async attempt(): Promise<number> {
    const { launcher, now } = this.trigger.context;

    const start = now();
    const result = await launcher.run(this.trigger.command, { cwd: this.cwd });
    const elapsed = (now() - start) / 1000;

    if (this.trigger.checkSuccess({ kind: "exit-code", errorCode: result.exitCode }) !== 0) {
      throw new TriggerFailedError(
        `${this.trigger.command} exited with ${String(result.exitCode)}`,
      );
    }
    return elapsed;
  }
}
