#!/usr/bin/env node
/**
 * bugbase CLI entry point.
 *
 * env.js must be the first import so variables are loaded before any
 * other module reads them.
 */
import "./env.js";

import path from "node:path";

import { createProgram } from "./cli.js";
import { Configuration } from "./config/index.js";
import { toError } from "./errors.js";
import { createHarnessContext } from "./orchestrator/index.js";
import { ensureDir, expandPath, logger } from "./utils/index.js";

async function main(): Promise<void> {
  const configuration = Configuration.load();
  const { logging, install } = configuration.settings;

  const file = install.log_file === undefined ? undefined : expandPath(install.log_file);
  if (file !== undefined) {
    ensureDir(path.dirname(file));
  }
  logger.configure({
    level: logging.level,
    timestamps: logging.timestamps,
    colors: logging.colors,
    file,
  });

  const context = await createHarnessContext(configuration);
  await createProgram(context).parseAsync(process.argv);
}

main().catch((err: unknown) => {
  logger.error(toError(err).message);
  process.exit(1);
});
