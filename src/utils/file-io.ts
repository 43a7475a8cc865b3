/**
 * File I/O utilities.
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
  writeSync,
} from "node:fs";
import { homedir } from "node:os";
import path from "node:path";

import { parse as parseYaml } from "yaml";

/**
 * Ensure a directory exists, creating it if necessary.
 *
 * @param dirPath - Path to directory
 */
export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Read a YAML file.
 *
 * @param filePath - Path to file
 * @returns Parsed YAML content
 * @throws Error if file doesn't exist or isn't valid YAML
 */
export function readYaml(filePath: string): unknown {
  const content = readFileSync(filePath, "utf-8");
  return parseYaml(content) as unknown;
}

/**
 * Read a text file.
 *
 * @param filePath - Path to file
 * @returns File content
 */
export function readText(filePath: string): string {
  return readFileSync(filePath, "utf-8");
}

/**
 * Write a text file.
 *
 * @param filePath - Path to file
 * @param content - Content to write
 */
export function writeText(filePath: string, content: string): void {
  ensureDir(path.dirname(filePath));
  writeFileSync(filePath, content, "utf-8");
}

/**
 * Append to a text file, creating it and its directory if needed.
 *
 * @param filePath - Path to file
 * @param content - Content to append
 */
export function appendText(filePath: string, content: string): void {
  ensureDir(path.dirname(filePath));
  appendFileSync(filePath, content, "utf-8");
}

/**
 * Check if a file exists.
 *
 * @param filePath - Path to file
 * @returns True if file exists
 */
export function fileExists(filePath: string): boolean {
  return existsSync(filePath);
}

/**
 * Remove a file or directory tree. Missing paths are ignored.
 *
 * @param target - Path to remove
 */
export function removePath(target: string): void {
  rmSync(target, { recursive: true, force: true });
}

/**
 * Move a file, creating the destination directory.
 *
 * @param from - Source path
 * @param to - Destination path
 */
export function moveFile(from: string, to: string): void {
  ensureDir(path.dirname(to));
  renameSync(from, to);
}

/**
 * Expand `~` and `$VAR` / `${VAR}` references in a path.
 *
 * @param value - Path as written in configuration
 * @param env - Environment to read variables from
 * @returns Expanded path (unknown variables expand to nothing)
 */
export function expandPath(
  value: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const withHome =
    value === "~" || value.startsWith("~/")
      ? path.join(homedir(), value.slice(1))
      : value;
  return withHome.replace(
    /\$\{(\w+)\}|\$(\w+)/g,
    (_match, braced: string | undefined, bare: string | undefined) =>
      env[braced ?? bare ?? ""] ?? "",
  );
}

/**
 * Create (or reuse) a file of the given size for benchmark workloads.
 *
 * @param directory - Directory holding workload files
 * @param sizeMb - Size in mebibytes
 * @param chunkBytes - Bytes written per call
 * @returns Path of the workload file
 */
export function createWorkloadFile(
  directory: string,
  sizeMb: number,
  chunkBytes = 1024 * 1024,
): string {
  const filePath = path.join(directory, `workload-${String(sizeMb)}M`);
  const size = sizeMb * 1024 * 1024;

  if (existsSync(filePath) && statSync(filePath).size === size) {
    return filePath;
  }

  ensureDir(directory);
  const chunk = Buffer.alloc(Math.min(chunkBytes, size), "0");
  const fd = openSync(filePath, "w");
  try {
    let written = 0;
    while (written < size) {
      written += writeSync(fd, chunk, 0, Math.min(chunk.length, size - written));
    }
  } finally {
    closeSync(fd);
  }
  return filePath;
}
