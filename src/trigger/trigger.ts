/**
 * The Trigger: one bug, the command that reproduces it, how to launch it
 * and how to read the outcome.
 */

import {
  InvalidTriggerStateError,
  ResultAlreadyRecordedError,
} from "../errors.js";
import { logger } from "../utils/logging.js";
import { formatTemplate } from "../utils/template.js";

import type { ProgramConfig } from "../catalog/program-config.js";
import type { BenchmarkOptions, BenchmarkStrategy } from "./benchmark/base.js";
import type { WorkerFactory } from "./helpers/worker.js";
import type { LaunchStrategy } from "./launch/types.js";
import type { ProcessLauncher } from "./process-launcher.js";
import type {
  BenchmarkOverrides,
  Classification,
  ClassificationContext,
  Classifier,
  ParamValue,
  Settings,
  TriggerState,
} from "../types/index.js";

/**
 * Services a trigger needs to run.
 */
export interface TriggerContext {
  launcher: ProcessLauncher;
  createWorker: WorkerFactory;
  settings: Settings;
  sleep: (ms: number) => Promise<void>;
  /** Milliseconds clock used for benchmark timings */
  now: () => number;
}

/**
 * Replacement for the launch strategy's run.
 */
export type Runner = () => Promise<Classification>;

/**
 * Options for creating a Trigger.
 */
export interface TriggerOptions {
  bug: string;
  program: ProgramConfig;
  command: string;
  successCommand?: string | undefined;
  strategy: LaunchStrategy;
  classifier: Classifier;
  context: TriggerContext;
  benchmark?: BenchmarkOverrides;
  /** Values available to command and URL templates */
  templateValues?: Record<string, ParamValue>;
}

const TRANSITIONS: Record<TriggerState, readonly TriggerState[]> = {
  idle: ["command-set"],
  "command-set": ["server-started", "stopped"],
  "server-started": ["workers-running", "stopped"],
  "workers-running": ["stopped"],
  stopped: ["classified", "server-started"],
  classified: ["command-set"],
};

/**
 * A reproducible bug bound to a launch strategy and a classifier.
 */
export class Trigger {
  readonly bug: string;
  readonly program: ProgramConfig;
  readonly strategy: LaunchStrategy;
  readonly classifier: Classifier;
  readonly context: TriggerContext;
  readonly benchmarkOverrides: BenchmarkOverrides;
  readonly templateValues: Readonly<Record<string, ParamValue>>;
  /** Command producing a run free of the bug, when the bug is input dependent */
  successCommand: string | undefined;

  #command: string;
  #state: TriggerState = "idle";
  #result: readonly number[] | null = null;
  #runner: Runner | null = null;

  constructor(options: TriggerOptions) {
    this.bug = options.bug;
    this.program = options.program;
    this.strategy = options.strategy;
    this.classifier = options.classifier;
    this.context = options.context;
    this.benchmarkOverrides = options.benchmark ?? {};
    this.templateValues = options.templateValues ?? {};
    this.successCommand = options.successCommand;
    this.#command = options.command;
  }

  /**
   * Command launched by the next run. Plugins rewrite it before running.
   */
  get command(): string {
    return this.#command;
  }

  set command(command: string) {
    if (command.trim() === "") {
      throw new Error(`Empty command for ${this.bug}`);
    }
    this.#command = command;
  }

  get state(): TriggerState {
    return this.#state;
  }

  /**
   * Information the last run returned (benchmark samples), or null.
   */
  get result(): readonly number[] | null {
    return this.#result;
  }

  /**
   * Store the information of the current run. Allowed once per run.
   *
   * @param samples - Values to store
   * @throws ResultAlreadyRecordedError on a second write
   */
  recordResult(samples: readonly number[]): void {
    if (this.#result !== null) {
      throw new ResultAlreadyRecordedError(this.bug);
    }
    this.#result = [...samples];
  }

  /**
   * Move to another state.
   *
   * @param next - Target state
   * @throws InvalidTriggerStateError when the move is not allowed
   */
  transition(next: TriggerState): void {
    if (!TRANSITIONS[this.#state].includes(next)) {
      throw new InvalidTriggerStateError(this.#state, next);
    }
    logger.debug(`${this.bug}: ${this.#state} -> ${next}`);
    this.#state = next;
  }

  /**
   * Start a run: forget the previous result and fix the command.
   */
  beginRun(): void {
    this.#result = null;
    this.#state = "idle";
    this.transition("command-set");
    logger.verbose(this.#command);
  }

  /**
   * Bring the run to the stopped state, then to classified.
   */
  settle(): void {
    if (this.#state !== "stopped") {
      this.transition("stopped");
    }
    this.transition("classified");
  }

  /**
   * Settle the run and classify its evidence.
   *
   * @param context - Evidence of the run
   * @returns Classification of the run
   */
  finish(context: ClassificationContext): Classification {
    this.settle();
    return this.checkSuccess(context);
  }

  /**
   * Classify evidence without touching the run state.
   *
   * @param context - Evidence to classify
   * @returns Classification
   */
  checkSuccess(context: ClassificationContext): Classification {
    return this.classifier.classify(context);
  }

  /**
   * Replace the launch strategy's run, or restore it with null.
   *
   * @param runner - Runner to use from now on
   */
  useRunner(runner: Runner | null): void {
    this.#runner = runner;
  }

  /**
   * Run the active runner.
   *
   * @returns 0 normal run, 1 bug reproduced, null unexpected outcome
   */
  async run(): Promise<Classification> {
    if (this.#runner !== null) {
      return this.#runner();
    }
    return this.strategy.run(this);
  }

  /**
   * Apply the benchmark overrides of the bug (bigger workload, more
   * helper iterations).
   */
  async prepareBenchmark(): Promise<void> {
    await this.strategy.prepareBenchmark(this);
  }

  /**
   * Create the benchmark strategy matching the launch strategy.
   *
   * @param options - Benchmark settings
   * @returns Benchmark bound to this trigger
   */
  createBenchmark(options: BenchmarkOptions): BenchmarkStrategy {
    return this.strategy.createBenchmark(this, options);
  }

  /**
   * Fill a template with the trigger's values.
   *
   * @param template - Template with `{name}` placeholders
   * @param extra - Additional values
   * @returns Formatted string
   */
  format(template: string, extra: Record<string, ParamValue> = {}): string {
    return formatTemplate(template, {
      ...this.templateValues,
      executable: this.program.executablePath(),
      ...extra,
    });
  }
}
