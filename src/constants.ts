/**
 * Paths and exit codes shared across the harness.
 */

import { fileURLToPath } from "node:url";
import path from "node:path";

/**
 * Repository root (one level above `src/` or `dist/`).
 */
export const ROOT_PATH = fileURLToPath(new URL("../", import.meta.url));

/** Directory holding `default.yaml` and the optional `custom.yaml`. */
export const CONF_PATH = path.join(ROOT_PATH, "conf");

/** Directory holding the bug catalog and per-bug input files. */
export const DATA_PATH = path.join(ROOT_PATH, "data");

/** Bug catalog file. */
export const CATALOG_FILE = path.join(DATA_PATH, "bugs.yaml");

/**
 * Exit code reported by a plugin that detected a harness-side problem
 * (missing core dump, missing tool).
 */
export const PLUGIN_ERROR = 255;

/**
 * Exit code for invalid command line arguments.
 */
export const PROGRAM_ARGUMENT_ERROR = 1;

/**
 * Name of the benchmark log inside the results directory.
 */
export const BENCHMARK_LOG = "benchmark.log";
