import pc from "picocolors";

export interface ErrorContext {
  // Where
  file?: string;
  schemaPath?: string; // JSON pointer into the schema, like "#/properties/age"
  keyword?: string;

  // What
  errorType: "parse" | "configuration" | "validate" | "usage";
  expected?: unknown;
  actual?: unknown;

  // Why
  reason: string;

  // How to fix
  suggestion?: string;
  examples?: string[];
}

/**
 * Base class for every error the project throws. Carries enough context to
 * render a self-contained report with {@link TreecheckError.format}.
 */
export class TreecheckError extends Error {
  constructor(
    message: string,
    public context: ErrorContext,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  format(useColor = true): string {
    const c = pc.createColors(useColor);

    let output = c.bold(c.red(`ERROR: ${this.message}`)) + "\n";

    if (this.context.file) {
      output += `\n  ${c.dim("In file:")} ${this.context.file}`;
    }

    if (this.context.schemaPath) {
      output += `\n  ${c.dim("Schema path:")} ${this.context.schemaPath}`;
    }

    if (this.context.keyword) {
      output += `\n  ${c.dim("Keyword:")} ${this.context.keyword}`;
    }

    output += `\n\n  ${this.context.reason}`;

    if (this.context.expected !== undefined) {
      output += `\n\n  ${c.green("Expected:")} ${
        JSON.stringify(this.context.expected)
      }`;
      output += `\n  ${c.red("Actual:")} ${JSON.stringify(this.context.actual)}`;
    }

    if (this.context.suggestion) {
      output += `\n\n  ${c.bold(c.yellow("How to fix:"))}\n  ${
        this.context.suggestion
      }`;
    }

    if (this.context.examples && this.context.examples.length > 0) {
      output += `\n\n  ${c.dim("Example:")}\n`;
      this.context.examples.forEach((example) => {
        output += `    ${example}\n`;
      });
    }

    return output;
  }
}

/**
 * Bad command line input or configuration value
 */
export class UsageError extends TreecheckError {
  constructor(message: string, context: Omit<ErrorContext, "errorType">) {
    super(message, { ...context, errorType: "usage" });
  }
}
