// Shared utilities for treecheck

// Errors
export { TreecheckError, UsageError } from "./errors.ts";
export type { ErrorContext } from "./errors.ts";

// Logging
export { ResultLogger } from "./logger.ts";

// Types
export { LOG_LEVELS } from "./types.ts";
export type { LoggedError, LogLevel, RunTotals } from "./types.ts";
