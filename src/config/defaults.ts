/**
 * Default configuration values.
 */

import type { Settings, TuningConfig } from "../types/index.js";

/**
 * Default install configuration.
 */
export const DEFAULT_INSTALL = {
  install_directory: "~/.bugbase/install",
  utilities_directory: "~/.bugbase/utilities",
  source_directory: "~/.bugbase/sources",
};

/**
 * Default trigger configuration.
 */
export const DEFAULT_TRIGGER = {
  core_dump_location: "/tmp/bugbase/cores",
  core_dump_pattern: "%E-core",
  core_dump_filter: "0x7f",
  results_directory: "~/.bugbase/results",
  workloads_directory: "~/.bugbase/workloads",
  lock_directory: "/tmp/bugbase/locks",
  show_progress: true,
};

/**
 * Default benchmark configuration.
 */
export const DEFAULT_BENCHMARK = {
  wanted_results: 20,
  maximum_tries: 100,
  kept_runs: 10,
  apache_requests: 30000,
};

/**
 * Default helper configuration.
 */
export const DEFAULT_HELPERS = {
  isolation: "process" as const,
  max_errors: 20,
};

/**
 * Default logging configuration.
 */
export const DEFAULT_LOGGING = {
  level: "info" as const,
  timestamps: false,
  colors: true,
};

/**
 * Fixed timings and limits that are not worth a configuration key.
 */
export const DEFAULT_TUNING: TuningConfig = {
  timeouts: {
    server_stop_grace_ms: 5000,
    helper_kill_grace_ms: 1000,
    settle_delay_ms: 2000,
    retry_initial_ms: 200,
    retry_max_ms: 2000,
    lock_stale_ms: 600000,
  },
  retry: {
    max_retries: 5,
    backoff_multiplier: 2,
    jitter_factor: 0.1,
  },
  limits: {
    progress_bar_width: 20,
    workload_chunk_bytes: 1024 * 1024,
  },
};

/**
 * Build a settings object holding nothing but defaults.
 *
 * @returns Complete settings
 */
export function createDefaultSettings(): Settings {
  return {
    install: { ...DEFAULT_INSTALL },
    trigger: { ...DEFAULT_TRIGGER },
    benchmark: { ...DEFAULT_BENCHMARK },
    plugins: { enabled: ["base"] },
    helpers: { ...DEFAULT_HELPERS },
    logging: { ...DEFAULT_LOGGING },
  };
}
