export { createHarnessContext } from "./context.js";
export type { HarnessContext, HarnessOverrides } from "./context.js";
export { renderSummary, runBugs } from "./run-bugs.js";
export type { BatchRequest, BatchResult } from "./run-bugs.js";
export { bugLockPath, triggerBug } from "./trigger-bug.js";
