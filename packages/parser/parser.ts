import { readFile } from "node:fs/promises";
import {
  formatDecimal,
  fromJson,
  parseDecimal,
  ValueConversionError,
  type Value,
} from "@treecheck/json-schema";
import { LosslessNumber, parse as parseLosslessJSON } from "lossless-json";
import { parse as parseYAML, type ScalarTag } from "yaml";
import { ParseError } from "./errors.ts";

export type DocumentFormat = "json" | "yaml" | "auto";

/**
 * Options for parsing documents
 */
export interface ParseOptions {
  /** Format hint (default: 'auto') */
  format?: DocumentFormat;
}

/**
 * Plain decimal scalars ("12", "-0.5", "1e3", ".5") resolve to their exact
 * value instead of a double. Takes precedence over the core int and float
 * tags, which match the same strings.
 */
const exactNumber: ScalarTag = {
  tag: "tag:yaml.org,2002:float",
  default: true,
  test: /^[-+]?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)(?:[eE][-+]?[0-9]+)?$/,
  resolve(source, onError) {
    const decimal = parseDecimal(source);
    if (!decimal) {
      onError(`Number out of range: ${source}`);
      return source;
    }
    return new LosslessNumber(formatDecimal(decimal));
  },
};

function keyText(key: unknown): string {
  return key === null ? "" : String(key);
}

/** Map-shaped mappings to plain objects with string keys */
function withTextKeys(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(withTextKeys);
  if (data instanceof Map) {
    const entries: [unknown, unknown][] = [...data];
    return Object.fromEntries(
      entries.map(([key, item]) => [keyText(key), withTextKeys(item)]),
    );
  }
  return data;
}

function parseYAMLDocument(content: string): unknown {
  // The core schema keeps "2022-11-15" a string instead of a Date. Maps
  // come back as Map so numeric keys skip yaml's object-key stringifier.
  const data: unknown = parseYAML(content, {
    schema: "core",
    customTags: (tags) => [exactNumber, ...tags],
    mapAsMap: true,
  });
  return withTextKeys(data);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse a JSON or YAML document into a value tree. Pure: no file I/O.
 * Numbers keep the exact decimal written in the document.
 */
export function parseDocument(
  content: string,
  options: ParseOptions = {},
): Value {
  const format = options.format ?? "auto";

  let data: unknown;
  try {
    if (format === "json") {
      data = parseLosslessJSON(content);
    } else if (format === "yaml") {
      data = parseYAMLDocument(content);
    } else {
      // YAML first (a superset of JSON), then JSON for its error message
      try {
        data = parseYAMLDocument(content);
      } catch {
        data = parseLosslessJSON(content);
      }
    }
  } catch (error) {
    const isJSON = format === "json" || content.trimStart().startsWith("{");
    throw new ParseError(`Invalid ${isJSON ? "JSON" : "YAML"} syntax`, {
      reason: `Failed to parse content: ${messageOf(error)}`,
      suggestion: `Check that your content is valid ${isJSON ? "JSON" : "YAML"}`,
    });
  }

  try {
    return fromJson(data);
  } catch (error) {
    if (!(error instanceof ValueConversionError)) throw error;
    throw new ParseError("Document contains a value JSON cannot represent", {
      reason: `${error.message} at "${error.location || "/"}"`,
      suggestion:
        "Use only null, booleans, finite numbers, strings, lists and mappings",
    });
  }
}

function formatFromPath(path: string): DocumentFormat {
  const ext = path.toLowerCase();
  if (ext.endsWith(".json")) return "json";
  if (ext.endsWith(".yaml") || ext.endsWith(".yml")) return "yaml";
  return "auto";
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load and parse a document from a file. The format comes from the file
 * extension unless one is given.
 */
export async function parseDocumentFromFile(
  path: string,
  options: ParseOptions = {},
): Promise<Value> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      throw new ParseError("File not found", {
        file: path,
        reason: `The file "${path}" does not exist`,
        suggestion: "Check that the file path is correct and the file exists",
      });
    }
    throw new ParseError("Failed to read file", {
      file: path,
      reason: `Could not read file: ${messageOf(error)}`,
      suggestion: "Check that you have permission to read the file",
    });
  }

  const format = options.format && options.format !== "auto"
    ? options.format
    : formatFromPath(path);

  try {
    return parseDocument(content, { format });
  } catch (error) {
    // Add file context to errors
    if (error instanceof ParseError) {
      error.context.file = path;
    }
    throw error;
  }
}
