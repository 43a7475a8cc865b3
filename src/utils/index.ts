/**
 * Utility module exports.
 */

export {
  withRetry,
  isTransientError,
  calculateDelay,
  sleep,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
} from "./retry.js";

export { KeyedMutex, waitFor } from "./concurrency.js";

export {
  logger,
  configureLogger,
  debug,
  verbose,
  info,
  warn,
  error,
  success,
  failure,
  section,
  progress,
  table,
  type LogLevel,
  type LoggerConfig,
} from "./logging.js";

export {
  ensureDir,
  readYaml,
  readText,
  writeText,
  appendText,
  fileExists,
  removePath,
  moveFile,
  expandPath,
  createWorkloadFile,
} from "./file-io.js";

export { withFileLock } from "./scoped.js";

export { formatTemplate, replaceLastArgument } from "./template.js";
