// Shared types for logging

export type LogLevel = "summary" | "details" | "full";

export const LOG_LEVELS: readonly LogLevel[] = ["summary", "details", "full"];

/**
 * The part of a validation error the logger prints. Structural, so the
 * logger does not depend on the validator package.
 */
export interface LoggedError {
  instancePath: string;
  keyword: string;
  message: string;
  params?: Record<string, unknown>;
}

/** Totals printed after a run over several documents */
export interface RunTotals {
  valid: number;
  invalid: number;
  failed: number;
}
