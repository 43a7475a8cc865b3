/**
 * Logging utilities with color support.
 */

import { appendFileSync } from "node:fs";

import chalk from "chalk";

import { DEFAULT_TUNING } from "../config/defaults.js";

/**
 * Log levels.
 */
export type LogLevel = "debug" | "verbose" | "info" | "warn" | "error";

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
  /** Plain-text file receiving every emitted line */
  file?: string | undefined;
}

/**
 * Default logger configuration.
 */
const defaultConfig: LoggerConfig = {
  level: "info",
  timestamps: false,
  colors: true,
};

/**
 * Current logger configuration.
 */
let config: LoggerConfig = { ...defaultConfig };

/**
 * Log level priorities.
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  verbose: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Configure the logger.
 *
 * @param newConfig - Partial configuration to apply
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

/**
 * Check if a log level should be output.
 *
 * @param level - Level to check
 * @returns True if level should be logged
 */
function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level];
}

function timestamp(): string {
  return config.timestamps ? `[${new Date().toISOString()}] ` : "";
}

/**
 * Append a line to the log file, if one is configured.
 */
function writeToFile(line: string): void {
  if (config.file !== undefined) {
    appendFileSync(config.file, `${line}\n`, "utf-8");
  }
}

/**
 * Format a log message.
 *
 * @param level - Log level
 * @param message - Message to format
 * @returns Formatted message
 */
function formatMessage(level: LogLevel, message: string): string {
  let prefix = timestamp();

  if (config.colors) {
    switch (level) {
      case "debug":
        prefix += chalk.gray("[DEBUG]");
        break;
      case "verbose":
        prefix += chalk.magenta("[VERBOSE]");
        break;
      case "info":
        prefix += chalk.blue("[INFO]");
        break;
      case "warn":
        prefix += chalk.yellow("[WARN]");
        break;
      case "error":
        prefix += chalk.red("[ERROR]");
        break;
    }
  } else {
    prefix += `[${level.toUpperCase()}]`;
  }

  return `${prefix} ${message}`;
}

function emit(
  level: LogLevel,
  sink: (...data: unknown[]) => void,
  message: string,
  args: unknown[],
): void {
  if (!shouldLog(level)) {
    return;
  }
  sink(formatMessage(level, message), ...args);
  writeToFile(
    `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`,
  );
}

/**
 * Log a debug message.
 *
 * @param message - Message to log
 * @param args - Additional arguments
 */
export function debug(message: string, ...args: unknown[]): void {
  emit("debug", console.debug, message, args);
}

/**
 * Log a verbose message: commands being run, classifications.
 *
 * @param message - Message to log
 * @param args - Additional arguments
 */
export function verbose(message: string, ...args: unknown[]): void {
  emit("verbose", console.info, message, args);
}

/**
 * Log an info message.
 *
 * @param message - Message to log
 * @param args - Additional arguments
 */
export function info(message: string, ...args: unknown[]): void {
  emit("info", console.info, message, args);
}

/**
 * Log a warning message.
 *
 * @param message - Message to log
 * @param args - Additional arguments
 */
export function warn(message: string, ...args: unknown[]): void {
  emit("warn", console.warn, message, args);
}

/**
 * Log an error message.
 *
 * @param message - Message to log
 * @param args - Additional arguments
 */
export function error(message: string, ...args: unknown[]): void {
  emit("error", console.error, message, args);
}

/**
 * Log a success message.
 *
 * @param message - Message to log
 */
export function success(message: string): void {
  if (shouldLog("info")) {
    const formatted = config.colors
      ? chalk.green(`✅ ${message}`)
      : `[SUCCESS] ${message}`;
    console.log(formatted);
    writeToFile(`[SUCCESS] ${message}`);
  }
}

/**
 * Log a failure message.
 *
 * @param message - Message to log
 */
export function failure(message: string): void {
  if (shouldLog("info")) {
    const formatted = config.colors
      ? chalk.red(`❌ ${message}`)
      : `[FAILURE] ${message}`;
    console.log(formatted);
    writeToFile(`[FAILURE] ${message}`);
  }
}

/**
 * Log a section banner separating the output of one unit of work
 * from the next.
 *
 * @param name - Name of the section (bug, plugin)
 * @param type - What kind of work the section covers
 */
export function section(name: string, type: string): void {
  const separator = "=".repeat(60);
  const title = `${type.toUpperCase()}: ${name}`;

  if (config.colors) {
    console.log(chalk.cyan(separator));
    console.log(chalk.cyan.bold(title));
    console.log(chalk.cyan(separator));
  } else {
    console.log(separator);
    console.log(title);
    console.log(separator);
  }
  writeToFile(`${separator}\n${title}\n${separator}`);
}

/**
 * Log a progress update.
 *
 * @param current - Current item number
 * @param total - Total items
 * @param message - Progress message
 */
export function progress(
  current: number,
  total: number,
  message: string,
): void {
  if (shouldLog("info")) {
    const percentage = Math.round((current / total) * 100);
    const progressBar = createProgressBar(current, total);
    const line = `[${String(current)}/${String(total)}] ${progressBar} ${String(percentage)}% - ${message}`;

    console.log(config.colors ? chalk.gray(line) : line);
  }
}

/**
 * Create a text progress bar.
 *
 * @param current - Current value
 * @param total - Total value
 * @param width - Bar width (defaults to tuning config value)
 * @returns Progress bar string
 */
function createProgressBar(
  current: number,
  total: number,
  width = DEFAULT_TUNING.limits.progress_bar_width,
): string {
  const filled = Math.min(width, Math.round((current / total) * width));
  const empty = width - filled;
  return `[${"█".repeat(filled)}${"░".repeat(empty)}]`;
}

/**
 * Create a table for CLI output.
 *
 * @param headers - Column headers
 * @param rows - Table rows
 * @returns Formatted table string
 */
export function table(headers: string[], rows: string[][]): string {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const rowMax = Math.max(0, ...rows.map((r) => (r[i] ?? "").length));
    return Math.max(h.length, rowMax);
  });

  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(" | ");
  const separator = widths.map((w) => "-".repeat(w)).join("-+-");

  const dataRows = rows.map((row) =>
    row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(" | "),
  );

  return [headerRow, separator, ...dataRows].join("\n");
}

/**
 * Default logger instance.
 */
export const logger = {
  debug,
  verbose,
  info,
  warn,
  error,
  success,
  failure,
  section,
  progress,
  configure: configureLogger,
};
