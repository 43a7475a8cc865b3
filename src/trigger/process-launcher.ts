/**
 * Launching external programs.
 *
 * Every launch resolves with the exit code and captured output, whatever
 * the code: an expected crash is data, not an exception. Only a process
 * that could not be spawned at all raises ProcessLaunchError.
 */

import { constants as osConstants } from "node:os";

import { execa } from "execa";

import { ProcessLaunchError, toError } from "../errors.js";
import { logger } from "../utils/logging.js";
import { waitFor } from "../utils/concurrency.js";

/**
 * A shell command line, or an argument vector run without shell parsing.
 */
export type Command = string | readonly string[];

/**
 * Options of a launch.
 */
export interface LaunchOptions {
  cwd?: string;
  /** Variables added to the inherited environment of the child */
  env?: Record<string, string>;
  /** Kill the process after this long */
  timeoutMs?: number;
  /** Signal used on timeout or stop (default SIGTERM) */
  killSignal?: NodeJS.Signals;
  /** Allow the child to write unlimited core dumps */
  liftCoreLimit?: boolean;
}

/**
 * Outcome of a finished process.
 */
export interface LaunchResult {
  /** Exit code; 128 + signal number for a process killed by a signal */
  exitCode: number;
  /** Interleaved stdout and stderr */
  output: string;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
}

/**
 * A process running in the background.
 */
export interface BackgroundProcess {
  readonly pid: number | undefined;
  isRunning(): boolean;
  /** Resolves when the process exits */
  wait(): Promise<LaunchResult>;
  /** Ask the process to stop, kill it after the grace period */
  stop(graceMs: number): Promise<void>;
}

/**
 * Starts programs. Tests substitute an in-memory implementation.
 */
export interface ProcessLauncher {
  run(command: Command, options?: LaunchOptions): Promise<LaunchResult>;
  spawn(command: Command, options?: LaunchOptions): BackgroundProcess;
}

/**
 * Quote one argument for `/bin/sh`.
 *
 * @param argument - Raw argument
 * @returns Single-quoted argument
 */
export function shellQuote(argument: string): string {
  return /^[\w@%+=:,./-]+$/.test(argument)
    ? argument
    : `'${argument.replaceAll("'", `'\\''`)}'`;
}

/**
 * Render a command as a shell script line.
 *
 * @param command - Command line or argument vector
 * @returns Shell script
 */
export function toScript(command: Command): string {
  return typeof command === "string"
    ? command
    : command.map((argument) => shellQuote(argument)).join(" ");
}

/**
 * Build the script handed to `/bin/sh -c`.
 *
 * @param command - Command to run
 * @param liftCoreLimit - Prefix with an unlimited core size
 * @param replaceShell - `exec` the command so signals reach it directly
 * @returns Shell script
 */
export function buildScript(
  command: Command,
  liftCoreLimit: boolean,
  replaceShell = false,
): string {
  const body = replaceShell ? `exec ${toScript(command)}` : toScript(command);
  return liftCoreLimit ? `ulimit -c unlimited 2>/dev/null; ${body}` : body;
}

/**
 * Number of a signal, by name.
 *
 * @param signal - Signal name such as SIGSEGV
 * @returns The signal number, undefined for unknown names
 */
export function signalNumber(signal: string): number | undefined {
  const entry = Object.entries(osConstants.signals).find(
    ([name]) => name === signal,
  );
  return entry?.[1];
}

/**
 * Check that a string names a signal this platform knows.
 *
 * @param value - Candidate signal name
 * @returns True for names such as SIGKILL
 */
export function isSignalName(value: string | undefined): value is NodeJS.Signals {
  return value !== undefined && signalNumber(value) !== undefined;
}

interface ExecaOutcome {
  exitCode?: number | undefined;
  signal?: string | undefined;
  all?: string | undefined;
  timedOut: boolean;
  failed: boolean;
  message?: string;
}

/**
 * Convert an execa result into a LaunchResult.
 *
 * @param script - Script that was run, for error messages
 * @param outcome - Settled execa result (`reject: false`)
 * @returns Normalised result
 * @throws ProcessLaunchError when the process never started
 */
export function toLaunchResult(
  script: string,
  outcome: ExecaOutcome,
): LaunchResult {
  const signal = isSignalName(outcome.signal) ? outcome.signal : null;
  const output = outcome.all ?? "";

  if (signal !== null) {
    return {
      exitCode: 128 + (signalNumber(signal) ?? 0),
      output,
      signal,
      timedOut: outcome.timedOut,
    };
  }

  if (outcome.exitCode === undefined) {
    throw new ProcessLaunchError(script, {
      cause: new Error(outcome.message ?? "process did not start"),
    });
  }

  return { exitCode: outcome.exitCode, output, signal: null, timedOut: outcome.timedOut };
}

function logOutput(output: string): void {
  for (const line of output.split("\n")) {
    if (line.length > 0) {
      logger.debug(line);
    }
  }
}

/**
 * Signal every process of the group led by `pid`.
 *
 * @param pid - Group leader
 * @param signal - Signal to send
 */
export function killProcessGroup(pid: number | undefined, signal: NodeJS.Signals): void {
  if (pid === undefined) {
    return;
  }
  try {
    process.kill(-pid, signal);
  } catch (err) {
    // ESRCH: the group exited between the timeout and the kill.
    logger.debug(`Process group ${String(pid)} not signalled: ${toError(err).message}`);
  }
}

/**
 * ProcessLauncher backed by execa, running everything through `/bin/sh -c`.
 */
export class ExecaLauncher implements ProcessLauncher {
  async run(command: Command, options: LaunchOptions = {}): Promise<LaunchResult> {
    const script = buildScript(command, options.liftCoreLimit ?? false);
    const killSignal = options.killSignal ?? "SIGTERM";
    const { timeoutMs } = options;
    logger.debug(`Running: ${script}`);

    // A timed run leads its own process group so the timeout reaches the
    // program, not only the shell wrapping it.
    const child = execa("/bin/sh", ["-c", script], {
      cwd: options.cwd,
      env: options.env,
      extendEnv: true,
      all: true,
      reject: false,
      stdin: "ignore",
      detached: timeoutMs !== undefined,
      killSignal,
    });

    let timedOut = false;
    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            logger.debug(`${script} timed out after ${String(timeoutMs)}ms, sending ${killSignal}`);
            killProcessGroup(child.pid, killSignal);
          }, timeoutMs);

    let outcome: ExecaOutcome;
    try {
      outcome = await child;
    } finally {
      clearTimeout(timer);
    }

    const result = toLaunchResult(script, { ...outcome, timedOut: outcome.timedOut || timedOut });
    logOutput(result.output);
    return result;
  }

  spawn(command: Command, options: LaunchOptions = {}): BackgroundProcess {
    const script = buildScript(command, options.liftCoreLimit ?? false, true);
    logger.debug(`Starting in background: ${script}`);

    const child = execa("/bin/sh", ["-c", script], {
      cwd: options.cwd,
      env: options.env,
      extendEnv: true,
      all: true,
      reject: false,
      stdin: "ignore",
      timeout: options.timeoutMs,
      killSignal: options.killSignal ?? "SIGTERM",
    });

    let running = true;
    const settled = child.then((outcome) => {
      running = false;
      return outcome;
    });

    const wait = async (): Promise<LaunchResult> => {
      const result = toLaunchResult(script, await settled);
      logOutput(result.output);
      return result;
    };

    return {
      pid: child.pid,
      isRunning: () => running,
      wait,
      stop: async (graceMs: number): Promise<void> => {
        if (!running) {
          return;
        }
        child.kill(options.killSignal ?? "SIGTERM");
        if (!(await waitFor(settled, graceMs))) {
          logger.warn(`Process ${String(child.pid)} ignored its stop signal, killing it`);
          child.kill("SIGKILL");
          await settled;
        }
      },
    };
  }
}
