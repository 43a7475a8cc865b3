/**
 * Configuration types.
 */

import type {
  BenchmarkOverridesSchema,
  BugEntrySchema,
  HelperDefinitionSchema,
  LaunchDefinitionSchema,
  SettingsSchema,
} from "../config/schema.js";
import type { z } from "zod";

/**
 * Validated global settings.
 */
export type Settings = z.infer<typeof SettingsSchema>;

export type InstallSettings = Settings["install"];
export type TriggerSettings = Settings["trigger"];
export type BenchmarkSettings = Settings["benchmark"];
export type HelperSettings = Settings["helpers"];
export type LoggingSettings = Settings["logging"];

/**
 * Helper isolation mode.
 */
export type HelperIsolation = HelperSettings["isolation"];

/**
 * Catalog entry for one bug.
 */
export type BugEntry = z.infer<typeof BugEntrySchema>;

/**
 * Launch definition of a catalog entry.
 */
export type LaunchDefinition = z.infer<typeof LaunchDefinitionSchema>;

/**
 * Launch kinds known to the harness.
 */
export type LaunchKind = LaunchDefinition["kind"];

/**
 * Helper definition of a client/server entry.
 */
export type HelperDefinition = z.infer<typeof HelperDefinitionSchema>;

/**
 * Benchmark overrides of a catalog entry.
 */
export type BenchmarkOverrides = z.infer<typeof BenchmarkOverridesSchema>;

/**
 * Template parameter values.
 */
export type ParamValue = string | number;

/**
 * Fixed timings and limits.
 */
export interface TuningConfig {
  timeouts: {
    server_stop_grace_ms: number;
    helper_kill_grace_ms: number;
    settle_delay_ms: number;
    retry_initial_ms: number;
    retry_max_ms: number;
    lock_stale_ms: number;
  };
  retry: {
    max_retries: number;
    backoff_multiplier: number;
    jitter_factor: number;
  };
  limits: {
    progress_bar_width: number;
    workload_chunk_bytes: number;
  };
}
