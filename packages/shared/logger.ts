import pc from "picocolors";
import { TreecheckError } from "./errors.ts";
import type { LoggedError, LogLevel, RunTotals } from "./types.ts";

type Colors = ReturnType<typeof pc.createColors>;

/**
 * Prints validation outcomes, one document at a time.
 *
 * summary: one line per document with the first error
 * details: every error as a tree
 * full:    details plus each error's params
 */
export class ResultLogger {
  private readonly c: Colors;

  constructor(
    private logLevel: LogLevel,
    private useColor = true,
  ) {
    this.c = pc.createColors(useColor);
  }

  logResult(name: string, errors: readonly LoggedError[]): void {
    const { c } = this;

    if (errors.length === 0) {
      console.log(`${c.green("✓")} ${name}`);
      return;
    }

    if (this.logLevel === "summary") {
      const first = errors[0];
      let line = `${c.red("✗")} ${name}`;
      if (first) {
        line += ` ${c.yellow(`${this.location(first)}: ${first.message}`)}`;
      }
      if (errors.length > 1) {
        line += ` ${c.dim(`(+${errors.length - 1} more)`)}`;
      }
      console.log(line);
      return;
    }

    const count = errors.length === 1 ? "1 error" : `${errors.length} errors`;
    console.log(`${c.red("✗")} ${name} ${c.dim(`(${count})`)}`);

    errors.forEach((error, i) => {
      const isLast = i === errors.length - 1;
      const prefix = isLast ? "└─" : "├─";
      console.log(
        `${prefix} ${this.location(error)}: ${error.message} ${
          c.dim(`[${error.keyword}]`)
        }`,
      );

      if (this.logLevel === "full" && error.params) {
        const indent = isLast ? "   " : "│  ";
        console.log(
          `${indent}${c.gray("params:")} ${JSON.stringify(error.params)}`,
        );
      }
    });
  }

  /**
   * A document that could not be checked at all: unreadable, unparsable, or
   * checked against a malformed schema.
   */
  logFailure(name: string, error: unknown): void {
    console.error(`${this.c.red("✗")} ${name}`);
    if (error instanceof TreecheckError) {
      console.error(error.format(this.useColor));
    } else if (error instanceof Error) {
      console.error(this.c.red(error.message));
    } else {
      console.error(this.c.red(String(error)));
    }
  }

  logTotals(totals: RunTotals): void {
    const { c } = this;
    const parts = [c.green(`${totals.valid} valid`)];
    if (totals.invalid > 0) parts.push(c.red(`${totals.invalid} invalid`));
    if (totals.failed > 0) parts.push(c.yellow(`${totals.failed} failed`));
    console.log(c.dim("─".repeat(40)));
    console.log(parts.join(c.dim(", ")));
  }

  private location(error: LoggedError): string {
    return error.instancePath || "/";
  }
}
