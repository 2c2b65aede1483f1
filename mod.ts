/**
 * @module
 */

// Re-export key types and utilities for library usage
export {
  checkSchema,
  ConfigurationError,
  fromJson,
  InstanceValidationError,
  SchemaValidator,
  toJson,
  validate,
  validateJson,
} from "@treecheck/json-schema";
export type {
  ValidationError,
  ValidationResult,
  ValidatorOptions,
  Value,
} from "@treecheck/json-schema";
export { ParseError, parseDocument, parseDocumentFromFile } from "@treecheck/parser";
export { TreecheckError } from "@treecheck/shared";
export { resolveConfig } from "./src/config.ts";
export type { CliConfig } from "./src/config.ts";
export { runCheck, runCli, runValidate } from "./src/commands.ts";
