import { type ErrorContext, TreecheckError } from "@treecheck/shared";
import type { Keyword, ValidationError } from "./types.ts";

type ConfigurationContext =
  & Omit<ErrorContext, "errorType" | "schemaPath" | "keyword">
  & {
    schemaPath: string;
    keyword?: Keyword;
  };

/**
 * The schema itself is malformed. Thrown, never collected: it points at a
 * schema-authoring defect, not at bad data.
 */
export class ConfigurationError extends TreecheckError {
  readonly schemaPath: string;
  readonly keyword?: Keyword;

  constructor(message: string, context: ConfigurationContext) {
    super(message, { ...context, errorType: "configuration" });
    this.schemaPath = context.schemaPath;
    this.keyword = context.keyword;
  }
}

/**
 * Plain data could not be turned into a Value (undefined, a function,
 * a non-finite number, a class instance, a cycle).
 */
export class ValueConversionError extends TreecheckError {
  readonly location: string;

  constructor(message: string, location: string) {
    super(message, {
      errorType: "parse",
      reason: `The value at "${location || "/"}" has no JSON representation.`,
      suggestion:
        "Only null, booleans, finite numbers, strings, arrays and plain objects can be validated.",
    });
    this.location = location;
  }
}

/**
 * Thrown by assertValid; carries the complete validation result.
 */
export class InstanceValidationError extends TreecheckError {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    const first = errors[0];
    const summary = first
      ? `${first.message} at ${first.instancePath || "root"}`
      : "Instance does not conform to the schema";
    super(
      `Validation failed: ${summary}${
        errors.length > 1 ? ` (+${errors.length - 1} more)` : ""
      }`,
      {
        errorType: "validate",
        reason: "The instance does not conform to the schema.",
      },
    );
    this.errors = errors;
  }

  override format(useColor = true): string {
    const base = super.format(useColor);
    if (this.errors.length === 0) return base;

    const details = this.errors
      .map((e, i) =>
        `  ${i + 1}. ${e.message}\n     Path: ${e.instancePath || "/"}\n     Keyword: ${e.keyword}`
      )
      .join("\n\n");

    return `${base}\n\nValidation errors:\n${details}`;
  }
}
