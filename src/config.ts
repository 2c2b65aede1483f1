import type { DocumentFormat } from "@treecheck/parser";
import { LOG_LEVELS, type LogLevel, UsageError } from "@treecheck/shared";

export const DEFAULT_LOG_LEVEL: LogLevel = "summary";
export const DEFAULT_FORMAT: DocumentFormat = "auto";

/** All valid input format values */
export const VALID_FORMATS: readonly DocumentFormat[] = [
  "auto",
  "json",
  "yaml",
] as const;

/** Set for O(1) lookup in type guard */
const VALID_FORMATS_SET: ReadonlySet<string> = new Set(VALID_FORMATS);
const LOG_LEVELS_SET: ReadonlySet<string> = new Set(LOG_LEVELS);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS_SET.has(value);
}

export function isDocumentFormat(value: string): value is DocumentFormat {
  return VALID_FORMATS_SET.has(value);
}

/**
 * Settings shared by every command
 */
export interface CliConfig {
  logLevel: LogLevel;
  format: DocumentFormat;
  color: boolean;
}

/** The flags that take part in configuration, as given on the command line */
export interface ConfigFlags {
  logLevel?: string;
  format?: string;
  color?: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function pick<T extends string>(
  option: string,
  value: string | undefined,
  valid: readonly T[],
  guard: (value: string) => value is T,
  fallback: T,
): T {
  if (value === undefined || value === "") return fallback;
  if (guard(value)) return value;

  throw new UsageError(`Invalid ${option}: ${value}`, {
    reason: `"${value}" is not a valid ${option}.`,
    expected: valid,
    actual: value,
    suggestion: `Valid values: ${valid.join(", ")}`,
  });
}

/**
 * Merge command line flags, environment variables and defaults, in that
 * order of priority.
 *
 * Environment:
 *   TREECHECK_LOG_LEVEL  summary|details|full
 *   TREECHECK_FORMAT     auto|json|yaml
 *   NO_COLOR             any non-empty value disables colors
 */
export function resolveConfig(
  flags: ConfigFlags,
  env: Environment = {},
): CliConfig {
  const logLevel = pick(
    "log level",
    flags.logLevel ?? env.TREECHECK_LOG_LEVEL,
    LOG_LEVELS,
    isLogLevel,
    DEFAULT_LOG_LEVEL,
  );

  const format = pick(
    "format",
    flags.format ?? env.TREECHECK_FORMAT,
    VALID_FORMATS,
    isDocumentFormat,
    DEFAULT_FORMAT,
  );

  const noColor = env.NO_COLOR !== undefined && env.NO_COLOR !== "";
  const color = flags.color ?? !noColor;

  return { logLevel, format, color };
}
