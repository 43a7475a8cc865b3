/**
 * Launch strategy contract.
 */

import type { BenchmarkOptions, BenchmarkStrategy } from "../benchmark/base.js";
import type { Trigger } from "../trigger.js";
import type { Classification, LaunchKind } from "../../types/index.js";

/**
 * How a trigger's program is started, exercised and stopped.
 */
export interface LaunchStrategy {
  readonly kind: LaunchKind;
  /** Run the trigger once and classify the outcome */
  run(trigger: Trigger): Promise<Classification>;
  /** Apply the bug's benchmark overrides to the trigger */
  prepareBenchmark(trigger: Trigger): Promise<void>;
  /** Benchmark strategy matching this launch */
  createBenchmark(trigger: Trigger, options: BenchmarkOptions): BenchmarkStrategy;
}
