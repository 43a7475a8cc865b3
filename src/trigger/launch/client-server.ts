/**
 * Client/server launch: start a server, hammer it with helper workers,
 * stop it and classify what the helpers reported.
 */

import { DEFAULT_TUNING } from "../../config/defaults.js";
import { toError } from "../../errors.js";
import { logger } from "../../utils/logging.js";
import { ClientServerBenchmark } from "../benchmark/client-server.js";
import { getHelperAction } from "../helpers/actions.js";
import { ResultsChannel } from "../helpers/results-channel.js";

import type { BenchmarkOptions, BenchmarkStrategy } from "../benchmark/base.js";
import type { BackgroundProcess } from "../process-launcher.js";
import type { Trigger } from "../trigger.js";
import type { LaunchStrategy } from "./types.js";
import type {
  Classification,
  ClassificationContext,
  HelperSpec,
  LaunchKind,
  ParamValue,
  WorkerResult,
} from "../../types/index.js";

/**
 * Helpers to start against the server.
 */
export interface HelperPlan {
  action: string;
  /** One worker per command */
  commands: readonly string[];
  iterations: number;
  /** Per-worker join timeout */
  timeoutMs?: number | undefined;
  params: Readonly<Record<string, ParamValue>>;
}

/**
 * Server side of a client/server launch.
 */
export interface ServerDefinition {
  /** Template of the stop command, formatted with the trigger's values */
  stopCommand?: string | undefined;
  /** Wait after starting and after stopping the server */
  delayMs: number;
  helper: HelperPlan;
  /** Variables added to the server's environment */
  env?: Record<string, string> | undefined;
  /** Grace period before a server that ignores its stop is killed */
  stopGraceMs?: number;
}

/**
 * Starts the trigger command as a server and runs helper workers against it.
 */
export class ClientServerLaunch implements LaunchStrategy {
  readonly kind: LaunchKind = "client-server";

  constructor(readonly server: ServerDefinition) {}

  /**
   * Helper specs for one run.
   *
   * @param trigger - Trigger being run
   * @returns One spec per helper command
   */
  helperSpecs(trigger: Trigger): HelperSpec[] {
    const { helper } = this.server;
    return helper.commands.map((command) => ({
      action: helper.action,
      command: trigger.format(command),
      iterations: helper.iterations,
      maxErrors: trigger.context.settings.helpers.max_errors,
      params: { ...trigger.templateValues, ...helper.params, iterations: helper.iterations },
    }));
  }

  /**
   * Hook run before the server starts.
   */
  beforeStart(_trigger: Trigger): void {
    // Nothing to clean for a generic server.
  }

  /**
   * Start the server in the background.
   *
   * @param trigger - Trigger being run
   * @returns Handle on the server process
   */
  startServer(trigger: Trigger): BackgroundProcess {
    const server = trigger.context.launcher.spawn(trigger.command, {
      liftCoreLimit: true,
      env: this.server.env,
    });
    trigger.transition("server-started");
    return server;
  }

  /**
   * Run each helper's preparation in this process.
   *
   * @param specs - Helper specs of the run
   */
  async prepareHelpers(specs: readonly HelperSpec[]): Promise<void> {
    for (const spec of specs) {
      await getHelperAction(spec.action).prepare?.(spec);
    }
  }

  /**
   * Start every worker, join each in turn, then terminate them all.
   *
   * @param trigger - Trigger being run
   * @param specs - Helper specs of the run
   * @param channel - Channel the workers report into
   */
  async runWorkers(
    trigger: Trigger,
    specs: readonly HelperSpec[],
    channel: ResultsChannel<WorkerResult>,
  ): Promise<void> {
    const workers = specs.map((spec) => trigger.context.createWorker(spec, channel));
    trigger.transition("workers-running");
    try {
      for (const worker of workers) {
        worker.start();
      }
      for (const worker of workers) {
        await worker.join(this.server.helper.timeoutMs);
      }
    } finally {
      for (const worker of workers) {
        worker.terminate();
      }
    }
  }

  /**
   * Stop the server. Failures are logged, never raised.
   *
   * @param trigger - Trigger being run
   * @param server - Server process
   */
  async stopServer(trigger: Trigger, server: BackgroundProcess): Promise<void> {
    const { stopCommand, env } = this.server;
    const grace = this.server.stopGraceMs ?? DEFAULT_TUNING.timeouts.server_stop_grace_ms;

    if (stopCommand !== undefined) {
      const command = trigger.format(stopCommand);
      try {
        const result = await trigger.context.launcher.run(command, { env });
        if (result.exitCode !== 0) {
          logger.debug(`${command} exited with ${String(result.exitCode)}`);
        }
      } catch (err) {
        logger.warn(`Stopping ${trigger.bug} failed: ${toError(err).message}`);
      }
    }

    try {
      await server.stop(grace);
    } catch (err) {
      logger.warn(`Server of ${trigger.bug} did not stop cleanly: ${toError(err).message}`);
    }

    if (trigger.state === "server-started" || trigger.state === "workers-running") {
      trigger.transition("stopped");
    }
  }

  /**
   * Evidence handed to the classifier.
   *
   * @param results - Values the helpers reported
   * @param specs - Helper specs of the run
   * @returns Classification context
   */
  classificationContext(
    results: readonly WorkerResult[],
    specs: readonly HelperSpec[],
  ): ClassificationContext {
    return {
      kind: "worker-results",
      results,
      workers: specs.length,
      iterations: this.server.helper.iterations,
    };
  }

  async run(trigger: Trigger): Promise<Classification> {
    const { sleep } = trigger.context;
    trigger.beginRun();
    this.beforeStart(trigger);

    const specs = this.helperSpecs(trigger);
    const channel = new ResultsChannel<WorkerResult>();
    const server = this.startServer(trigger);
    try {
      await sleep(this.server.delayMs);
      await this.prepareHelpers(specs);
      await this.runWorkers(trigger, specs, channel);
    } finally {
      await this.stopServer(trigger, server);
    }

    const results = channel.drain(specs.length);
    await sleep(this.server.delayMs);
    return trigger.finish(this.classificationContext(results, specs));
  }

  async prepareBenchmark(trigger: Trigger): Promise<void> {
    const iterations = trigger.benchmarkOverrides.helper_iterations;
    if (iterations !== undefined) {
      logger.verbose(`${trigger.bug}: ${String(iterations)} helper iterations`);
      this.server.helper.iterations = iterations;
    }
  }

  createBenchmark(trigger: Trigger, options: BenchmarkOptions): BenchmarkStrategy {
    return new ClientServerBenchmark(trigger, options, this);
  }
}
