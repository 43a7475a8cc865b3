/**
 * Apache httpd launch: a client/server launch classified by the error log.
 */

import path from "node:path";

import { removePath } from "../../utils/file-io.js";
import { ApacheBenchmark } from "../benchmark/apache.js";

import { ClientServerLaunch, type ServerDefinition } from "./client-server.js";

import type { BenchmarkOptions, BenchmarkStrategy } from "../benchmark/base.js";
import type { Trigger } from "../trigger.js";
import type {
  ClassificationContext,
  LaunchKind,
} from "../../types/index.js";

/**
 * Environment httpd needs to pick its run user.
 *
 * @param env - Environment of the harness
 * @returns Variables to add to the server environment
 */
export function apacheEnvironment(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const user = env["USER"] ?? "root";
  return { APACHE_RUN_USER: user, APACHE_RUN_GROUP: user };
}

/**
 * Starts and stops httpd through `httpd -k`, clears its logs before each
 * run and scans `logs/error_log` for the bug.
 */
export class ApacheLaunch extends ClientServerLaunch {
  override readonly kind: LaunchKind = "apache";

  constructor(
    server: ServerDefinition,
    readonly installDirectory: string,
  ) {
    super(server);
  }

  get errorLog(): string {
    return path.join(this.installDirectory, "logs", "error_log");
  }

  get accessLog(): string {
    return path.join(this.installDirectory, "logs", "access_log");
  }

  /**
   * Remove the logs of the previous run.
   */
  override beforeStart(_trigger: Trigger): void {
    removePath(this.errorLog);
    removePath(this.accessLog);
  }

  override classificationContext(): ClassificationContext {
    return { kind: "log-scan" };
  }

  override createBenchmark(
    trigger: Trigger,
    options: BenchmarkOptions,
  ): BenchmarkStrategy {
    return new ApacheBenchmark(trigger, options, this);
  }
}
