/**
 * Schema and validation result type definitions
 */

import type { PointerSegment } from "@treecheck/json-pointer";

/**
 * Every keyword the validator interprets. Any other key in a schema mapping
 * (title, description, default, $schema, ...) is an annotation and ignored.
 */
export const KEYWORDS = [
  // Identity
  "type",
  "required",
  "enum",
  "const",

  // String
  "pattern",
  "format",
  "minLength",
  "maxLength",

  // Number
  "minimum",
  "maximum",
  "divisibleBy",

  // Shared by every bound keyword
  "exclusiveMinimum",
  "exclusiveMaximum",

  // Object
  "properties",
  "patternProperties",
  "additionalProperties",
  "dependencies",
  "minProperties",
  "maxProperties",

  // Array
  "items",
  "additionalItems",
  "minItems",
  "maxItems",
  "uniqueItems",

  // Composition
  "allOf",
  "anyOf",
  "oneOf",
  "not",
] as const;

export type Keyword = typeof KEYWORDS[number];

export const SCHEMA_TYPES = [
  "string",
  "number",
  "integer",
  "boolean",
  "array",
  "object",
  "null",
  "any",
] as const;

export type SchemaType = typeof SCHEMA_TYPES[number];

/** A property name or an array index */
export type PathSegment = PointerSegment;

/** Location of a value inside the validated instance */
export type Path = PathSegment[];

/**
 * One failed keyword check.
 */
export interface ValidationError {
  // WHERE in the instance
  path: Path;
  instancePath: string; // same location as an RFC 6901 pointer

  // WHICH rule
  schemaPath: string; // "#/properties/age/minimum"
  keyword: Keyword;

  // WHAT went wrong
  message: string;
  params: Record<string, unknown>;
}

/** Ordered list of violations; empty when the instance conforms */
export type ValidationResult = ValidationError[];
