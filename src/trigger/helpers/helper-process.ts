/**
 * Entry point of a process-isolated helper worker.
 *
 * Receives one HelperSpec over IPC, runs the named action, sends back its
 * result (if any) and exits.
 */

import { logger } from "../../utils/logging.js";

import { getHelperAction } from "./actions.js";
import { HelperSpecSchema, type WorkerMessage } from "./worker.js";

async function runHelper(message: unknown): Promise<number> {
  const parsed = HelperSpecSchema.safeParse(message);
  if (!parsed.success) {
    logger.error(`Invalid helper spec: ${parsed.error.message}`);
    return 1;
  }

  const spec = parsed.data;
  const controller = new AbortController();
  process.once("SIGTERM", () => {
    controller.abort();
  });

  const value = await getHelperAction(spec.action).run(spec, controller.signal);
  if (value !== undefined && process.send !== undefined) {
    const reply: WorkerMessage = { type: "result", value };
    await new Promise<void>((resolve, reject) => {
      process.send?.(reply, undefined, {}, (err: Error | null) => {
        if (err === null) {
          resolve();
        } else {
          reject(err);
        }
      });
    });
  }
  return 0;
}

process.once("message", (message: unknown) => {
  runHelper(message)
    .then((code) => {
      process.exit(code);
    })
    .catch((err: unknown) => {
      logger.error(`Helper failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
});
