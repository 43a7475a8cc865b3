/**
 * Zod validation schemas for configuration and the bug catalog.
 */

import { z } from "zod";

import {
  DEFAULT_BENCHMARK,
  DEFAULT_HELPERS,
  DEFAULT_INSTALL,
  DEFAULT_LOGGING,
  DEFAULT_TRIGGER,
} from "./defaults.js";

// =============================================================================
// Global settings (conf/default.yaml, conf/custom.yaml)
// =============================================================================

/**
 * Install configuration schema.
 */
export const InstallSettingsSchema = z.object({
  install_directory: z.string().min(1).default(DEFAULT_INSTALL.install_directory),
  utilities_directory: z
    .string()
    .min(1)
    .default(DEFAULT_INSTALL.utilities_directory),
  source_directory: z.string().min(1).default(DEFAULT_INSTALL.source_directory),
  log_file: z.string().optional(),
});

/**
 * Trigger configuration schema.
 */
export const TriggerSettingsSchema = z.object({
  core_dump_location: z.string().default(DEFAULT_TRIGGER.core_dump_location),
  core_dump_pattern: z.string().default(DEFAULT_TRIGGER.core_dump_pattern),
  core_dump_filter: z
    .string()
    .regex(/^0x[0-9a-fA-F]+$/, "Must be a hexadecimal bit mask")
    .default(DEFAULT_TRIGGER.core_dump_filter),
  results_directory: z.string().default(DEFAULT_TRIGGER.results_directory),
  workloads_directory: z.string().default(DEFAULT_TRIGGER.workloads_directory),
  lock_directory: z.string().default(DEFAULT_TRIGGER.lock_directory),
  show_progress: z.boolean().default(DEFAULT_TRIGGER.show_progress),
});

/**
 * Benchmark configuration schema.
 */
export const BenchmarkSettingsSchema = z
  .object({
    wanted_results: z
      .number()
      .int()
      .min(1)
      .default(DEFAULT_BENCHMARK.wanted_results),
    maximum_tries: z
      .number()
      .int()
      .min(1)
      .default(DEFAULT_BENCHMARK.maximum_tries),
    kept_runs: z.number().int().min(1).default(DEFAULT_BENCHMARK.kept_runs),
    apache_requests: z
      .number()
      .int()
      .min(1)
      .default(DEFAULT_BENCHMARK.apache_requests),
  })
  .refine((value) => value.kept_runs <= value.wanted_results, {
    message: "kept_runs cannot exceed wanted_results",
    path: ["kept_runs"],
  });

/**
 * Plugin bundles to load.
 */
export const PluginSettingsSchema = z.object({
  enabled: z.array(z.string().min(1)).default(["base"]),
});

/**
 * Helper worker configuration schema.
 */
export const HelperSettingsSchema = z.object({
  isolation: z.enum(["process", "inline"]).default(DEFAULT_HELPERS.isolation),
  max_errors: z.number().int().min(1).default(DEFAULT_HELPERS.max_errors),
});

/**
 * Logging configuration schema.
 */
export const LoggingSettingsSchema = z.object({
  level: z
    .enum(["debug", "verbose", "info", "warn", "error"])
    .default(DEFAULT_LOGGING.level),
  timestamps: z.boolean().default(DEFAULT_LOGGING.timestamps),
  colors: z.boolean().default(DEFAULT_LOGGING.colors),
});

/**
 * Complete settings schema.
 */
export const SettingsSchema = z.object({
  install: InstallSettingsSchema.default({}),
  trigger: TriggerSettingsSchema.default({}),
  benchmark: BenchmarkSettingsSchema.default({}),
  plugins: PluginSettingsSchema.default({}),
  helpers: HelperSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
});

// =============================================================================
// Bug catalog (data/bugs.yaml)
// =============================================================================

const ParamValueSchema = z.union([z.string(), z.number()]);

/**
 * Helper worker definition for client/server bugs.
 */
export const HelperDefinitionSchema = z.object({
  action: z.string().min(1),
  commands: z.array(z.string()).min(1, "At least one helper is required"),
  iterations: z.number().int().min(1).default(1),
  timeout_ms: z.number().int().positive().optional(),
  params: z.record(ParamValueSchema).default({}),
});

/**
 * Program launched directly, classified by its exit code.
 */
export const PlainLaunchSchema = z.object({
  kind: z.literal("plain"),
  failure_cmd: z.string().min(1),
  success_cmd: z.string().min(1).optional(),
  expected_failure: z.number().int(),
  exit_code_aliases: z.record(z.string().regex(/^\d+$/), z.number().int()).default({}),
  hang_timeout_ms: z.number().int().positive().optional(),
  hang_signal: z.string().default("SIGKILL"),
  hang_exit_code: z.number().int().default(1),
});

/**
 * Server started in the background and exercised by helper workers.
 */
export const ClientServerLaunchSchema = z.object({
  kind: z.literal("client-server"),
  start_cmd: z.string().min(1),
  stop_cmd: z.string().min(1).optional(),
  root_args: z.string().optional(),
  delay_ms: z.number().int().min(0).optional(),
  helper: HelperDefinitionSchema,
});

/**
 * Apache httpd, classified by its error log.
 */
export const ApacheLaunchSchema = z.object({
  kind: z.literal("apache"),
  error_pattern: z.string().min(1),
  delay_ms: z.number().int().min(0).optional(),
  helper: HelperDefinitionSchema,
});

/**
 * Launch definition, discriminated by kind.
 */
export const LaunchDefinitionSchema = z.discriminatedUnion("kind", [
  PlainLaunchSchema,
  ClientServerLaunchSchema,
  ApacheLaunchSchema,
]);

/**
 * Changes applied when a bug is benchmarked instead of triggered.
 */
export const BenchmarkOverridesSchema = z.object({
  prepare_cmd: z.string().optional(),
  workload_mb: z.number().int().positive().optional(),
  last_argument: z.string().optional(),
  helper_iterations: z.number().int().positive().optional(),
  url: z.string().optional(),
});

/**
 * One catalogued bug.
 */
export const BugEntrySchema = z.object({
  location: z.enum(["install", "utility", "system"]).default("install"),
  install_directory: z.string().min(1),
  executable_directory: z.string().default("bin"),
  executable: z.string().min(1),
  listening_port: z.number().int().min(1).max(65535).optional(),
  options: z.record(ParamValueSchema).default({}),
  trigger: LaunchDefinitionSchema,
  benchmark: BenchmarkOverridesSchema.default({}),
  cleanup_paths: z.array(z.string()).default([]),
});

/**
 * The whole catalog: bug name to entry.
 */
export const CatalogSchema = z.record(
  z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, "Invalid bug name"),
  BugEntrySchema,
);
