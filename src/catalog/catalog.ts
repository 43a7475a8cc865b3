/**
 * The bug catalog: every reproducible bug and how to trigger it.
 */

import path from "node:path";

import { ConfigValidationError, loadYamlFile } from "../config/loader.js";
import { CatalogSchema } from "../config/schema.js";
import { UnknownBugError } from "../errors.js";
import { expandPath, fileExists } from "../utils/file-io.js";

import { ProgramConfig } from "./program-config.js";

import type { BugEntry, Settings } from "../types/index.js";

/**
 * Validate a raw catalog.
 *
 * @param raw - Parsed catalog file
 * @returns Bug name to entry
 * @throws ConfigValidationError if validation fails
 */
export function validateCatalog(raw: unknown): Record<string, BugEntry> {
  const result = CatalogSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigValidationError(
      `Bug catalog validation failed:\n${issues}`,
      result.error,
    );
  }

  return result.data;
}

/**
 * Catalogued bugs, resolved against the global settings.
 */
export class ProgramCatalog {
  readonly #entries: ReadonlyMap<string, BugEntry>;

  constructor(
    entries: Record<string, BugEntry>,
    private readonly settings: Settings,
  ) {
    this.#entries = new Map(Object.entries(entries));
  }

  /**
   * Load the catalog from a YAML file.
   *
   * @param filePath - Catalog file
   * @param settings - Global settings
   * @returns Loaded catalog
   */
  static load(filePath: string, settings: Settings): ProgramCatalog {
    return new ProgramCatalog(validateCatalog(loadYamlFile(filePath)), settings);
  }

  /**
   * Every bug name, sorted.
   *
   * @returns Bug names
   */
  names(): string[] {
    return [...this.#entries.keys()].sort();
  }

  has(bug: string): boolean {
    return this.#entries.has(bug);
  }

  /**
   * Catalog entry of a bug.
   *
   * @param bug - Bug name
   * @returns Entry
   * @throws UnknownBugError for names not in the catalog
   */
  entry(bug: string): BugEntry {
    const entry = this.#entries.get(bug);
    if (entry === undefined) {
      throw new UnknownBugError(bug);
    }
    return entry;
  }

  /**
   * Install directory of a bug's program.
   *
   * @param bug - Bug name
   * @returns Absolute install directory
   */
  installDirectory(bug: string): string {
    const entry = this.entry(bug);
    const { install_directory, utilities_directory } = this.settings.install;

    switch (entry.location) {
      case "system":
        return expandPath(entry.install_directory);
      case "utility":
        return path.join(
          expandPath(utilities_directory),
          entry.install_directory.replace(/^\/+/, ""),
        );
      case "install":
        return path.join(
          expandPath(install_directory),
          entry.install_directory.replace(/^\/+/, ""),
        );
    }
  }

  /**
   * Fresh program configuration for a bug.
   *
   * @param bug - Bug name
   * @returns Program configuration
   */
  program(bug: string): ProgramConfig {
    const entry = this.entry(bug);
    const { core_dump_location, core_dump_pattern } = this.settings.trigger;
    return new ProgramConfig(
      bug,
      this.installDirectory(bug),
      entry.executable_directory,
      entry.executable,
      entry.listening_port,
      entry.options,
      { location: expandPath(core_dump_location), pattern: core_dump_pattern },
    );
  }

  /**
   * Check whether a bug's program is installed.
   *
   * @param bug - Bug name
   * @returns True when its install directory exists
   */
  isInstalled(bug: string): boolean {
    return fileExists(this.installDirectory(bug));
  }

  /**
   * Bugs whose program is installed.
   *
   * @returns Installed bug names, sorted
   */
  installed(): string[] {
    return this.names().filter((bug) => this.isInstalled(bug));
  }
}
