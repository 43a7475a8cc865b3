/**
 * Configuration loader with YAML support and Zod validation.
 */

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { CONF_PATH } from "../constants.js";

import { SettingsSchema } from "./schema.js";

import type { Settings } from "../types/index.js";
import type { ZodError } from "zod";

/**
 * Configuration load error.
 */
export class ConfigLoadError extends Error {
  override readonly cause?: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = "ConfigLoadError";
    this.cause = cause;
  }
}

/**
 * Configuration validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly zodError: ZodError,
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

/**
 * Read and parse a YAML file.
 *
 * @param filePath - Path to the file
 * @returns Parsed content (`{}` for an empty document)
 * @throws ConfigLoadError if the file is missing, unreadable or not YAML
 */
export function loadYamlFile(filePath: string): unknown {
  const absolutePath = path.resolve(filePath);

  if (!existsSync(absolutePath)) {
    throw new ConfigLoadError(`Configuration file not found: ${absolutePath}`);
  }

  let content: string;
  try {
    content = readFileSync(absolutePath, "utf-8");
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to read configuration file: ${absolutePath}`,
      err instanceof Error ? err : undefined,
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to parse configuration file: ${absolutePath}`,
      err instanceof Error ? err : undefined,
    );
  }

  return parsed ?? {};
}

/**
 * Validate raw settings.
 *
 * @param rawSettings - Raw settings object
 * @returns Validated settings
 * @throws ConfigValidationError if validation fails
 */
export function validateSettings(rawSettings: unknown): Settings {
  const result = SettingsSchema.safeParse(rawSettings);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigValidationError(
      `Configuration validation failed:\n${issues}`,
      result.error,
    );
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge custom settings over defaults, section by section.
 *
 * @param base - Parsed default settings
 * @param override - Parsed custom settings
 * @returns Merged raw settings
 */
export function mergeSettings(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override ?? base;
  }

  const merged: Record<string, unknown> = { ...base };
  for (const [section, value] of Object.entries(override)) {
    const current = merged[section];
    merged[section] =
      isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return merged;
}

/**
 * Read `default.yaml` and the optional `custom.yaml` of a directory.
 *
 * @param directory - Configuration directory
 * @returns Validated settings
 */
export function readSettings(directory: string): Settings {
  const defaults = loadYamlFile(path.join(directory, "default.yaml"));
  const customPath = path.join(directory, "custom.yaml");
  const raw = existsSync(customPath)
    ? mergeSettings(defaults, loadYamlFile(customPath))
    : defaults;
  return validateSettings(raw);
}

/**
 * Resolve the configuration directory from the environment.
 *
 * @returns `BUGBASE_CONFIG` when set, the bundled `conf/` otherwise
 */
export function resolveConfigDirectory(): string {
  const fromEnv = process.env["BUGBASE_CONFIG"];
  return fromEnv !== undefined && fromEnv !== "" ? fromEnv : CONF_PATH;
}

/**
 * Global configuration, loaded explicitly and passed by reference.
 */
export class Configuration {
  #settings: Settings;

  private constructor(
    readonly directory: string,
    settings: Settings,
  ) {
    this.#settings = settings;
  }

  /**
   * Load configuration from a directory.
   *
   * @param directory - Directory holding `default.yaml`
   * @returns Loaded configuration
   */
  static load(directory: string = resolveConfigDirectory()): Configuration {
    return new Configuration(directory, readSettings(directory));
  }

  /**
   * Wrap already validated settings (tests, embedding).
   *
   * @param settings - Settings to hold
   * @param directory - Directory a later reload reads from
   * @returns Configuration holding the settings
   */
  static fromSettings(
    settings: Settings,
    directory: string = CONF_PATH,
  ): Configuration {
    return new Configuration(directory, settings);
  }

  get settings(): Settings {
    return this.#settings;
  }

  /**
   * Re-read the configuration files, replacing the held settings.
   *
   * @returns The new settings
   */
  reload(): Settings {
    this.#settings = readSettings(this.directory);
    return this.#settings;
  }
}
