/**
 * Benchmark of a client/server bug.
 */

import { TriggerFailedError } from "../../errors.js";
import { ResultsChannel } from "../helpers/results-channel.js";

import { BenchmarkStrategy, type BenchmarkOptions } from "./base.js";

import type { ClientServerLaunch } from "../launch/client-server.js";
import type { Trigger } from "../trigger.js";
import type { WorkerResult } from "../../types/index.js";

/**
 * Times the helper workers against a fresh server per attempt. A sample is
 * kept only when the helpers' results classify as a normal run.
 */
export class ClientServerBenchmark extends BenchmarkStrategy {
  constructor(
    trigger: Trigger,
    options: BenchmarkOptions,
    private readonly launch: ClientServerLaunch,
  ) {
    super(trigger, options);
  }

  protected async attempt(): Promise<number> {
    const { sleep, now } = this.trigger.context;
    const { delayMs } = this.launch.server;

    this.launch.beforeStart(this.trigger);
    const specs = this.launch.helperSpecs(this.trigger);
    const channel = new ResultsChannel<WorkerResult>();
    const server = this.launch.startServer(this.trigger);

    let elapsed: number;
    try {
      await sleep(delayMs);
      await this.launch.prepareHelpers(specs);
      const start = now();
      await this.launch.runWorkers(this.trigger, specs, channel);
      elapsed = (now() - start) / 1000;
    } finally {
      await this.launch.stopServer(this.trigger, server);
    }

    const results = channel.drain(specs.length);
    if (this.trigger.checkSuccess(this.launch.classificationContext(results, specs)) !== 0) {
      throw new TriggerFailedError("Trigger did not work");
    }

    await sleep(delayMs);
    return elapsed;
  }
}
