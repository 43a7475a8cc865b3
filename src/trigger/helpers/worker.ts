/**
 * Helper workers: concurrent clients that hammer a server while a bug is
 * being triggered.
 */

import { fork, type ChildProcess } from "node:child_process";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import { DEFAULT_TUNING } from "../../config/defaults.js";
import { waitFor } from "../../utils/concurrency.js";
import { logger } from "../../utils/logging.js";

import { getHelperAction } from "./actions.js";

import type { ResultsChannel } from "./results-channel.js";
import type {
  HelperIsolation,
  HelperSpec,
  WorkerResult,
} from "../../types/index.js";

/**
 * Shape of a helper spec crossing the IPC channel.
 */
export const HelperSpecSchema = z.object({
  action: z.string(),
  command: z.string(),
  iterations: z.number().int().min(0),
  maxErrors: z.number().int().min(0),
  params: z.record(z.union([z.string(), z.number()])),
});

/**
 * Message a helper process sends back.
 */
export const WorkerMessageSchema = z.object({
  type: z.literal("result"),
  value: z.union([z.number(), z.string(), z.null()]),
});

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

/**
 * One helper worker.
 */
export interface HelperWorker {
  readonly spec: HelperSpec;
  start(): void;
  /**
   * Wait for the worker to finish.
   *
   * @param timeoutMs - Give up waiting after this long
   */
  join(timeoutMs?: number): Promise<void>;
  /** Stop the worker. Does nothing once it has exited. */
  terminate(): void;
}

/**
 * Creates workers writing into a shared channel.
 */
export type WorkerFactory = (
  spec: HelperSpec,
  channel: ResultsChannel<WorkerResult>,
) => HelperWorker;

/**
 * Runs the action inside the orchestrating process.
 */
export class InlineHelperWorker implements HelperWorker {
  readonly #controller = new AbortController();
  #done: Promise<void> | null = null;

  constructor(
    readonly spec: HelperSpec,
    private readonly channel: ResultsChannel<WorkerResult>,
  ) {}

  start(): void {
    if (this.#done !== null) {
      throw new Error(`Helper ${this.spec.command} already started`);
    }
    const action = getHelperAction(this.spec.action);
    const signal = this.#controller.signal;

    this.#done = action.run(this.spec, signal).then(
      (value) => {
        if (!signal.aborted && value !== undefined) {
          this.channel.put(value);
        }
      },
      (err: unknown) => {
        logger.warn(
          `Helper ${this.spec.command} failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      },
    );
  }

  async join(timeoutMs?: number): Promise<void> {
    if (this.#done !== null) {
      await waitFor(this.#done, timeoutMs);
    }
  }

  terminate(): void {
    this.#controller.abort();
  }
}

/**
 * Resolve the helper process entry point next to this module.
 *
 * @returns Entry path and the node arguments needed to load it
 */
export function resolveHelperEntry(): { entry: string; execArgv: string[] } {
  const compiled = fileURLToPath(new URL("./helper-process.js", import.meta.url));
  if (existsSync(compiled)) {
    return { entry: compiled, execArgv: [] };
  }
  return {
    entry: fileURLToPath(new URL("./helper-process.ts", import.meta.url)),
    execArgv: ["--import", "tsx"],
  };
}

/**
 * Runs the action in a separate OS process and receives its result over IPC.
 */
export class ProcessHelperWorker implements HelperWorker {
  #child: ChildProcess | null = null;
  #exited: Promise<void> | null = null;
  #terminated = false;
  #reported = false;

  constructor(
    readonly spec: HelperSpec,
    private readonly channel: ResultsChannel<WorkerResult>,
  ) {}

  start(): void {
    if (this.#child !== null) {
      throw new Error(`Helper ${this.spec.command} already started`);
    }
    const { entry, execArgv } = resolveHelperEntry();
    const child = fork(entry, [], {
      execArgv,
      serialization: "json",
      stdio: ["ignore", "inherit", "inherit", "ipc"],
    });
    this.#child = child;

    // "close" follows the IPC disconnect, so every message has arrived.
    this.#exited = new Promise((resolve) => {
      child.once("close", () => {
        resolve();
      });
      child.once("error", (err) => {
        logger.warn(`Helper process for ${this.spec.command} failed: ${err.message}`);
        resolve();
      });
    });

    child.on("message", (message: unknown) => {
      const parsed = WorkerMessageSchema.safeParse(message);
      if (!parsed.success) {
        logger.debug(`Ignoring malformed helper message: ${JSON.stringify(message)}`);
        return;
      }
      if (!this.#terminated && !this.#reported) {
        this.#reported = true;
        this.channel.put(parsed.data.value);
      }
    });

    child.send(this.spec);
  }

  async join(timeoutMs?: number): Promise<void> {
    if (this.#exited !== null) {
      await waitFor(this.#exited, timeoutMs);
    }
  }

  /**
   * Ask a running helper to abort with SIGTERM and kill it if it is still
   * alive after the grace period. An exited helper keeps its result.
   *
   * @param graceMs - Wait before SIGKILL
   */
  terminate(graceMs: number = DEFAULT_TUNING.timeouts.helper_kill_grace_ms): void {
    const child = this.#child;
    if (child === null || child.exitCode !== null || child.signalCode !== null) {
      return;
    }
    this.#terminated = true;
    child.kill("SIGTERM");
    const escalation = setTimeout(() => {
      if (child.exitCode === null && child.signalCode === null) {
        logger.debug(`Helper ${this.spec.command} ignored SIGTERM, killing it`);
        child.kill("SIGKILL");
      }
    }, graceMs);
    escalation.unref();
    child.once("exit", () => {
      clearTimeout(escalation);
    });
  }
}

/**
 * Pick the worker implementation for an isolation mode.
 *
 * @param isolation - `process` or `inline`
 * @returns Factory creating workers of that kind
 */
export function createWorkerFactory(isolation: HelperIsolation): WorkerFactory {
  return isolation === "process"
    ? (spec, channel) => new ProcessHelperWorker(spec, channel)
    : (spec, channel) => new InlineHelperWorker(spec, channel);
}
