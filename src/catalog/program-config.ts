/**
 * Per-program configuration.
 */

import path from "node:path";

import type { ParamValue } from "../types/index.js";

/**
 * Where a program's core dumps land.
 */
export interface CoreDumpSettings {
  location: string;
  pattern: string;
}

/**
 * Install location and identity of one program.
 */
export class ProgramConfig {
  /** Executable name; main plugins switch it to a variant binary */
  executable: string;

  constructor(
    readonly name: string,
    readonly installDirectory: string,
    readonly executableDirectory: string,
    executable: string,
    readonly listeningPort: number | undefined,
    readonly options: Readonly<Record<string, ParamValue>>,
    private readonly coreDump: CoreDumpSettings,
  ) {
    this.executable = executable;
  }

  /**
   * Absolute path of the executable.
   *
   * @returns Install directory / executable directory / executable
   */
  executablePath(): string {
    return path.join(
      this.installDirectory,
      this.executableDirectory,
      this.executable.replace(/^\/+/, ""),
    );
  }

  /**
   * Where the kernel writes the core dump of the executable.
   *
   * @returns Core dump path following the configured pattern
   */
  corePath(): string {
    const file = this.coreDump.pattern
      .replaceAll("%E", this.executablePath().replaceAll("/", "!"))
      .replaceAll("%e", this.executable);
    return path.join(this.coreDump.location, file);
  }
}
