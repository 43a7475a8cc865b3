/**
 * Helper actions: the work a helper worker performs against a server.
 */

import { BugbaseError } from "../../errors.js";
import { logger } from "../../utils/logging.js";
import { withRetry } from "../../utils/retry.js";
import { formatTemplate } from "../../utils/template.js";

import { MemcachedClient, MemcachedError } from "./memcached-client.js";

import type { HelperSpec, WorkerResult } from "../../types/index.js";

/**
 * A named piece of helper work.
 */
export interface HelperAction {
  readonly name: string;
  /**
   * Runs once per worker in the orchestrating process, before any worker
   * of the run starts.
   */
  prepare?(spec: HelperSpec): Promise<void>;
  /**
   * Performs the work. Resolves with the value to report, or undefined to
   * report nothing.
   */
  run(spec: HelperSpec, signal: AbortSignal): Promise<WorkerResult | undefined>;
}

const ACTIONS = new Map<string, HelperAction>();

/**
 * Make an action available to workers by name.
 *
 * @param action - Action to register
 */
export function registerHelperAction(action: HelperAction): void {
  ACTIONS.set(action.name, action);
}

/**
 * Look up an action.
 *
 * @param name - Action name
 * @returns The action
 * @throws BugbaseError when no action has that name
 */
export function getHelperAction(name: string): HelperAction {
  const action = ACTIONS.get(name);
  if (action === undefined) {
    throw new BugbaseError(`Unknown helper action: ${name}`);
  }
  return action;
}

/**
 * Names of every registered action.
 *
 * @returns Action names
 */
export function listHelperActions(): string[] {
  return [...ACTIONS.keys()];
}

/**
 * Fetches a URL template `iterations` times. Reports nothing.
 */
export const urlFetcher: HelperAction = {
  name: "url-fetcher",

  async run(spec, signal) {
    let errors = 0;

    for (let iteration = 0; iteration < spec.iterations; iteration++) {
      if (signal.aborted) {
        return undefined;
      }
      const url = formatTemplate(spec.command, { ...spec.params, iteration });
      try {
        const response = await fetch(url, { signal });
        await response.arrayBuffer();
      } catch (err) {
        if (signal.aborted) {
          return undefined;
        }
        errors++;
        logger.debug(`Fetching ${url} failed: ${err instanceof Error ? err.message : String(err)}`);
        if (errors > spec.maxErrors) {
          logger.debug(`Giving up on ${spec.command} after ${String(errors)} errors`);
          break;
        }
      }
    }

    return undefined;
  },
};

function connectionOf(spec: HelperSpec): { host: string; port: number } {
  const host = spec.params["host"];
  const port = spec.params["port"];
  return {
    host: typeof host === "string" ? host : "127.0.0.1",
    port: typeof port === "number" ? port : Number(port ?? 11211),
  };
}

/**
 * Increments a memcached key `iterations` times and reports its final value.
 * The helper command is the key.
 */
export const memcachedCounter: HelperAction = {
  name: "memcached-counter",

  async prepare(spec) {
    const { host, port } = connectionOf(spec);
    const client = await withRetry(async () => MemcachedClient.connect(host, port));
    try {
      await client.set(spec.command, 0);
    } finally {
      client.close();
    }
  },

  async run(spec, signal) {
    const { host, port } = connectionOf(spec);
    const client = await MemcachedClient.connect(host, port);
    try {
      for (let iteration = 0; iteration < spec.iterations; iteration++) {
        if (signal.aborted) {
          return undefined;
        }
        try {
          await client.incr(spec.command);
        } catch (err) {
          if (!(err instanceof MemcachedError)) {
            throw err;
          }
          logger.debug(`incr ${spec.command} rejected: ${err.reply.trim()}`);
        }
      }
      const value = await client.get(spec.command);
      if (value === null) {
        return null;
      }
      const counter = Number(value);
      return Number.isNaN(counter) ? value : counter;
    } finally {
      client.close();
    }
  },
};

registerHelperAction(urlFetcher);
registerHelperAction(memcachedCounter);
