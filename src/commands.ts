/**
 * The treecheck commands. Each one returns its exit code instead of
 * exiting, so tests can drive them in-process.
 */

import { parsePointer } from "@treecheck/json-pointer";
import {
  checkSchema,
  locate,
  SchemaValidator,
  type ValidationResult,
  type Value,
} from "@treecheck/json-schema";
import { parseDocumentFromFile } from "@treecheck/parser";
import { ResultLogger, UsageError } from "@treecheck/shared";
import minimist from "minimist";
import pc from "picocolors";
import {
  type CliConfig,
  DEFAULT_LOG_LEVEL,
  type Environment,
  resolveConfig,
  VALID_FORMATS,
} from "./config.ts";

export const EXIT_VALID = 0;
export const EXIT_INVALID = 1;
export const EXIT_ERROR = 2;

export interface ValidateOptions {
  schema: string;
  instances: string[];
  /** JSON Pointer selecting the part of each instance to validate */
  select?: string;
  /** Print the raw results as JSON instead of log lines */
  json?: boolean;
}

/** One entry of `validate --json` output */
export type ValidateReport =
  | { file: string; valid: boolean; errors: ValidationResult }
  | { file: string; error: string };

/**
 * Load the schema or report why it cannot be used. A schema with any
 * configuration problem is rejected before any instance is read.
 */
async function loadSchema(
  path: string,
  config: CliConfig,
  logger: ResultLogger,
): Promise<Value | undefined> {
  let schema: Value;
  try {
    schema = await parseDocumentFromFile(path, { format: config.format });
  } catch (error) {
    logger.logFailure(path, error);
    return undefined;
  }

  const problems = checkSchema(schema);
  for (const problem of problems) {
    problem.context.file = path;
    logger.logFailure(path, problem);
  }
  return problems.length === 0 ? schema : undefined;
}

export async function runValidate(
  options: ValidateOptions,
  config: CliConfig,
): Promise<number> {
  const logger = new ResultLogger(config.logLevel, config.color);

  const schema = await loadSchema(options.schema, config, logger);
  if (!schema) return EXIT_ERROR;

  const validator = new SchemaValidator();
  const reports: ValidateReport[] = [];
  const totals = { valid: 0, invalid: 0, failed: 0 };

  for (const file of options.instances) {
    let errors: ValidationResult;
    try {
      const document = await parseDocumentFromFile(file, {
        format: config.format,
      });
      if (options.select) {
        // Reported paths start at the selection, with typed array indices
        const selection = locate(document, options.select);
        errors = new SchemaValidator({ basePath: selection.path })
          .validate(selection.value, schema);
      } else {
        errors = validator.validate(document, schema);
      }
    } catch (error) {
      totals.failed++;
      if (options.json) {
        reports.push({
          file,
          error: error instanceof Error ? error.message : String(error),
        });
      } else {
        logger.logFailure(file, error);
      }
      continue;
    }

    if (errors.length === 0) totals.valid++;
    else totals.invalid++;

    if (options.json) {
      reports.push({ file, valid: errors.length === 0, errors });
    } else {
      logger.logResult(file, errors);
    }
  }

  if (options.json) {
    console.log(JSON.stringify(reports, null, 2));
  } else if (options.instances.length > 1) {
    logger.logTotals(totals);
  }

  if (totals.failed > 0) return EXIT_ERROR;
  return totals.invalid > 0 ? EXIT_INVALID : EXIT_VALID;
}

export async function runCheck(
  schemaPath: string,
  config: CliConfig,
): Promise<number> {
  const logger = new ResultLogger(config.logLevel, config.color);
  const schema = await loadSchema(schemaPath, config, logger);
  if (!schema) return EXIT_ERROR;

  const c = pc.createColors(config.color);
  console.log(`${c.green("✓")} ${schemaPath}: no problems found`);
  return EXIT_VALID;
}

export function printHelp(color = true): void {
  const c = pc.createColors(color);
  console.log(`
${c.bold("treecheck")} - validate JSON and YAML documents against a schema

Usage:
  treecheck validate --schema <schema> <instance...>
  treecheck check <schema>

Commands:
  validate                 Validate each instance file against the schema
  check <schema>           Report every malformed keyword in a schema

Options:
  -s, --schema <file>      Schema file (validate)
  --select <pointer>       Validate only the part of each instance at a JSON Pointer
  --json                   Print results as JSON
  --log-level <level>      Set output detail: summary|details|full (default: ${DEFAULT_LOG_LEVEL})
  --format <format>        Input format: ${VALID_FORMATS.join("|")} (default: from file extension)
  --color, --no-color      Force colors on or off (default: on unless NO_COLOR)
  -h, --help               Show this help message

Environment:
  TREECHECK_LOG_LEVEL      Default for --log-level
  TREECHECK_FORMAT         Default for --format
  NO_COLOR                 Disable colors

Exit codes:
  0  every instance is valid
  1  at least one instance is invalid
  2  the schema or an instance could not be used, or bad usage

Examples:
  treecheck validate -s user.schema.json user.json
  treecheck validate -s item.yaml --select /items/0 order.yaml
  treecheck check user.schema.json
`);
}

/** Last string given for a flag; minimist collects repeats into an array */
function stringFlag(
  args: minimist.ParsedArgs,
  name: string,
): string | undefined {
  const value: unknown = args[name];
  const last: unknown = Array.isArray(value) ? value.at(-1) : value;
  return typeof last === "string" ? last : undefined;
}

function booleanFlag(
  args: minimist.ParsedArgs,
  name: string,
): boolean | undefined {
  const value: unknown = args[name];
  return typeof value === "boolean" ? value : undefined;
}

/**
 * minimist sets every boolean flag, false when absent. Only a flag that
 * was actually given overrides the environment.
 */
function givenBooleanFlag(
  args: minimist.ParsedArgs,
  argv: readonly string[],
  name: string,
): boolean | undefined {
  const given = argv.some((arg) =>
    arg === `--${name}` || arg === `--no-${name}` ||
    arg.startsWith(`--${name}=`)
  );
  return given ? booleanFlag(args, name) : undefined;
}

function usageError(
  message: string,
  reason: string,
  suggestion: string,
): UsageError {
  return new UsageError(message, { reason, suggestion });
}

/**
 * Parse the command line and run a command.
 */
export async function runCli(
  argv: readonly string[],
  env: Environment = {},
): Promise<number> {
  const args = minimist([...argv], {
    boolean: ["help", "json", "color"],
    string: ["schema", "select", "log-level", "format"],
    alias: { h: "help", s: "schema" },
  });
  const [command, ...rest] = args._.map(String);

  if (booleanFlag(args, "help") || command === undefined) {
    printHelp(!env.NO_COLOR);
    return command === undefined && !booleanFlag(args, "help")
      ? EXIT_ERROR
      : EXIT_VALID;
  }

  try {
    const config = resolveConfig({
      logLevel: stringFlag(args, "log-level"),
      format: stringFlag(args, "format"),
      color: givenBooleanFlag(args, argv, "color"),
    }, env);

    if (command === "validate") {
      const schema = stringFlag(args, "schema");
      if (!schema) {
        throw usageError(
          "No schema file provided",
          "validate needs a schema to check the instances against.",
          "Usage: treecheck validate --schema <schema> <instance...>",
        );
      }
      if (rest.length === 0) {
        throw usageError(
          "No instance files provided",
          "validate needs at least one document to check.",
          "Usage: treecheck validate --schema <schema> <instance...>",
        );
      }
      const select = stringFlag(args, "select");
      if (select) parsePointer(select);

      return await runValidate({
        schema,
        instances: rest,
        select,
        json: booleanFlag(args, "json") ?? false,
      }, config);
    }

    if (command === "check") {
      const [schema] = rest;
      if (!schema) {
        throw usageError(
          "No schema file provided",
          "check needs the schema file to inspect.",
          "Usage: treecheck check <schema>",
        );
      }
      return await runCheck(schema, config);
    }

    throw usageError(
      `Unknown command: ${command}`,
      `"${command}" is not a treecheck command.`,
      "Run treecheck --help to see the available commands",
    );
  } catch (error) {
    const logger = new ResultLogger(DEFAULT_LOG_LEVEL, !env.NO_COLOR);
    logger.logFailure("treecheck", error);
    return EXIT_ERROR;
  }
}
