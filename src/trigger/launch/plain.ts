/**
 * Plain launch: run one command and classify its exit code.
 */

import { BugbaseError } from "../../errors.js";
import { createWorkloadFile, expandPath } from "../../utils/file-io.js";
import { logger } from "../../utils/logging.js";
import { replaceLastArgument } from "../../utils/template.js";
import { RepeatedInvocationBenchmark } from "../benchmark/repeated.js";

import type { BenchmarkOptions, BenchmarkStrategy } from "../benchmark/base.js";
import type { Trigger } from "../trigger.js";
import type { LaunchStrategy } from "./types.js";
import type { Classification } from "../../types/index.js";

/**
 * Options of a plain launch.
 */
export interface PlainLaunchOptions {
  /** Working directory of the program */
  cwd?: string;
  /** A program still running after this long is considered hung */
  hangTimeoutMs?: number;
  /** Signal sent to a hung program */
  hangSignal?: NodeJS.Signals;
  /** Error code a hung program is classified with */
  hangExitCode?: number;
}

/**
 * Launches the trigger command directly, with core dumps enabled.
 */
export class PlainLaunch implements LaunchStrategy {
  readonly kind = "plain" as const;

  constructor(readonly options: PlainLaunchOptions = {}) {}

  async run(trigger: Trigger): Promise<Classification> {
    trigger.beginRun();

    const { hangTimeoutMs, hangSignal, hangExitCode } = this.options;
    const result = await trigger.context.launcher.run(trigger.command, {
      cwd: this.options.cwd,
      liftCoreLimit: true,
      timeoutMs: hangTimeoutMs,
      killSignal: hangSignal,
    });
    trigger.transition("stopped");

    let errorCode = result.exitCode;
    if (result.timedOut) {
      logger.verbose(
        `${trigger.bug} still running after ${String(hangTimeoutMs)}ms, considered hung`,
      );
      errorCode = hangExitCode ?? result.exitCode;
    }

    return trigger.finish({ kind: "exit-code", errorCode });
  }

  async prepareBenchmark(trigger: Trigger): Promise<void> {
    const overrides = trigger.benchmarkOverrides;
    const { settings, launcher } = trigger.context;

    if (overrides.prepare_cmd !== undefined) {
      const prepare = trigger.format(overrides.prepare_cmd);
      const result = await launcher.run(prepare);
      if (result.exitCode !== 0) {
        throw new BugbaseError(
          `Preparing the benchmark of ${trigger.bug} failed with code ${String(result.exitCode)}`,
        );
      }
    }

    let workload: string | undefined;
    if (overrides.workload_mb !== undefined) {
      logger.info(`Creating a ${String(overrides.workload_mb)}MB workload`);
      workload = createWorkloadFile(
        expandPath(settings.trigger.workloads_directory),
        overrides.workload_mb,
      );
    }

    if (overrides.last_argument !== undefined) {
      const argument = trigger.format(
        overrides.last_argument,
        workload === undefined ? {} : { workload },
      );
      trigger.command = replaceLastArgument(trigger.command, argument);
    }
  }

  createBenchmark(trigger: Trigger, options: BenchmarkOptions): BenchmarkStrategy {
    return new RepeatedInvocationBenchmark(trigger, options, this.options.cwd);
  }
}
