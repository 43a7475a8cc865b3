/**
 * Trigger, classification and helper types.
 */

/**
 * Outcome of a run: 0 the program behaved, 1 the bug reproduced as
 * expected, null something unexpected happened.
 */
export type Classification = 0 | 1 | null;

/**
 * Lifecycle states of a trigger run.
 */
export type TriggerState =
  | "idle"
  | "command-set"
  | "server-started"
  | "workers-running"
  | "stopped"
  | "classified";

/**
 * Value a helper worker reports.
 */
export type WorkerResult = number | string | null;

/**
 * Evidence handed to a classifier.
 */
export type ClassificationContext =
  | { kind: "exit-code"; errorCode: number }
  | {
      kind: "worker-results";
      results: readonly WorkerResult[];
      workers: number;
      iterations: number;
    }
  | { kind: "log-scan" };

/**
 * Maps run evidence to a classification.
 */
export interface Classifier {
  readonly description: string;
  classify(context: ClassificationContext): Classification;
}

/**
 * Work description for one helper worker. Serialisable: it crosses the
 * IPC channel of process-isolated workers.
 */
export interface HelperSpec {
  action: string;
  command: string;
  iterations: number;
  maxErrors: number;
  params: Record<string, string | number>;
}
