/**
 * Typed errors raised by the harness.
 *
 * Expected program failures are never errors: launching a process always
 * resolves with its exit code. These classes cover the conditions that
 * stop a (bug x plugin) pair from being triggered at all.
 */

/**
 * Base class for every harness error.
 */
export class BugbaseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BugbaseError";
  }
}

/**
 * The program a bug lives in has no install directory.
 */
export class ProgramNotInstalledError extends BugbaseError {
  constructor(
    public readonly program: string,
    public readonly installDirectory: string,
  ) {
    super(`${program} is not installed (missing ${installDirectory})`);
    this.name = "ProgramNotInstalledError";
  }
}

/**
 * A plugin cannot work with the requested bug.
 */
export class PluginIncompatibleError extends BugbaseError {
  constructor(
    public readonly plugin: string,
    public readonly bug: string,
    reason: string,
  ) {
    super(`${plugin} cannot run ${bug}: ${reason}`);
    this.name = "PluginIncompatibleError";
  }
}

/**
 * A process could not be spawned at all.
 */
export class ProcessLaunchError extends BugbaseError {
  constructor(
    public readonly command: string,
    options?: ErrorOptions,
  ) {
    super(`Could not launch: ${command}`, options);
    this.name = "ProcessLaunchError";
  }
}

/**
 * A timed benchmark attempt did not behave and must be retried.
 */
export class TriggerFailedError extends BugbaseError {
  constructor(message: string) {
    super(message);
    this.name = "TriggerFailedError";
  }
}

/**
 * An external tool a plugin relies on is absent.
 */
export class MissingDependencyError extends BugbaseError {
  constructor(
    public readonly dependency: string,
    public readonly location: string,
  ) {
    super(`${dependency} not found at ${location}`);
    this.name = "MissingDependencyError";
  }
}

/**
 * The bug name is not in the catalog.
 */
export class UnknownBugError extends BugbaseError {
  constructor(public readonly bug: string) {
    super(`Unknown bug: ${bug}`);
    this.name = "UnknownBugError";
  }
}

/**
 * No plugin of the given capability is registered under that name.
 */
export class UnknownPluginError extends BugbaseError {
  constructor(
    public readonly plugin: string,
    public readonly capability: string,
  ) {
    super(`Unknown ${capability} plugin: ${plugin}`);
    this.name = "UnknownPluginError";
  }
}

/**
 * A run tried to record its returned information twice.
 */
export class ResultAlreadyRecordedError extends BugbaseError {
  constructor(bug: string) {
    super(`Result for ${bug} was already recorded during this run`);
    this.name = "ResultAlreadyRecordedError";
  }
}

/**
 * A trigger was asked to move between states in an order it does not allow.
 */
export class InvalidTriggerStateError extends BugbaseError {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Illegal trigger transition: ${from} -> ${to}`);
    this.name = "InvalidTriggerStateError";
  }
}

/**
 * One or more cleanup steps failed after all of them were attempted.
 */
export class CleanupError extends BugbaseError {
  constructor(public readonly failures: readonly Error[]) {
    super(
      `${String(failures.length)} cleanup step(s) failed: ${failures
        .map((failure) => failure.message)
        .join("; ")}`,
    );
    this.name = "CleanupError";
  }
}

/**
 * Normalise a thrown value into an Error.
 *
 * @param value - Anything caught by a `catch` clause
 * @returns The value itself when it is an Error, otherwise a wrapping Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
