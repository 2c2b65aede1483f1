import { type ErrorContext, TreecheckError } from "@treecheck/shared";

/**
 * A document could not be read or turned into a value tree.
 */
export class ParseError extends TreecheckError {
  constructor(message: string, context: Omit<ErrorContext, "errorType">) {
    super(message, { ...context, errorType: "parse" });
  }
}
