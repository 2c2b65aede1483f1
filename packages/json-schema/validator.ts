/**
 * Schema evaluation: the recursive walk over instance and schema.
 *
 * Each node runs the keyword families in a fixed order:
 *
 *   1. null / required short-circuit (may settle the node)
 *   2. type
 *   3. enum and const
 *   4. string or number keywords, by instance kind
 *   5. object or array keywords, by instance kind
 *   6. allOf, anyOf, oneOf, not
 *
 * Steps 2-6 never stop one another; every failure is collected.
 */

import { InstanceValidationError } from "./errors.ts";
import { readArrayKeywords, checkArray } from "./keywords/array.ts";
import {
  checkComposition,
  readCompositionKeywords,
} from "./keywords/composition.ts";
import { KeywordContext } from "./keywords/context.ts";
import {
  checkEnum,
  checkType,
  readIdentityKeywords,
  shortCircuitNull,
} from "./keywords/identity.ts";
import { checkNumber, readNumberKeywords } from "./keywords/number.ts";
import { checkObject, readObjectKeywords } from "./keywords/object.ts";
import { checkString, readStringKeywords } from "./keywords/string.ts";
import { SchemaNode } from "./schema-node.ts";
import type { Path, PathSegment, ValidationError, ValidationResult } from "./types.ts";
import { fromJson, type Value } from "./value.ts";

export interface ValidatorOptions {
  /**
   * Prefix for every reported path. Used when the instance was selected out
   * of a larger document and errors should point into that document.
   */
  basePath?: Path;
}

function walk(
  instance: Value,
  schema: SchemaNode,
  path: readonly PathSegment[],
  errors: ValidationError[],
): void {
  const ctx = new KeywordContext(schema, path, errors, walk);

  const identity = readIdentityKeywords(schema);
  if (shortCircuitNull(instance, identity, ctx)) return;

  checkType(instance, identity, ctx);
  checkEnum(instance, identity, ctx);

  switch (instance.kind) {
    case "string":
      checkString(instance, readStringKeywords(schema), ctx);
      break;
    case "number":
      checkNumber(instance, readNumberKeywords(schema), ctx);
      break;
    case "mapping":
      checkObject(instance, readObjectKeywords(schema), ctx);
      break;
    case "sequence":
      checkArray(instance, readArrayKeywords(schema), ctx);
      break;
  }

  checkComposition(instance, readCompositionKeywords(schema), ctx);
}

export class SchemaValidator {
  private readonly basePath: Path;

  constructor(options: ValidatorOptions = {}) {
    this.basePath = [...options.basePath ?? []];
  }

  /**
   * Every violation of `schema` by `instance`, in evaluation order. Throws
   * ConfigurationError when a keyword reached during the walk is malformed.
   */
  validate(instance: Value, schema: Value): ValidationResult {
    const errors: ValidationError[] = [];
    walk(instance, SchemaNode.from(schema), this.basePath, errors);
    return errors;
  }

  /** Same as validate, for plain parsed JSON */
  validateJson(instance: unknown, schema: unknown): ValidationResult {
    return this.validate(fromJson(instance), fromJson(schema));
  }

  isValid(instance: Value, schema: Value): boolean {
    return this.validate(instance, schema).length === 0;
  }

  assertValid(instance: Value, schema: Value): void {
    const errors = this.validate(instance, schema);
    if (errors.length > 0) {
      throw new InstanceValidationError(errors);
    }
  }
}

const defaultValidator = new SchemaValidator();

export function validate(instance: Value, schema: Value): ValidationResult {
  return defaultValidator.validate(instance, schema);
}

export function validateJson(
  instance: unknown,
  schema: unknown,
): ValidationResult {
  return defaultValidator.validateJson(instance, schema);
}
