/**
 * Keywords that apply to every kind of instance: the null/required
 * short-circuit, type, enum and const.
 */

import { isIntegerDecimal } from "../decimal.ts";
import type { SchemaNode } from "../schema-node.ts";
import type { SchemaType } from "../types.ts";
import { deepEqual, toJson, typeName, type Value } from "../value.ts";
import type { KeywordContext } from "./context.ts";

export interface IdentityKeywords {
  types?: SchemaType[];
  required: boolean;
  enumValues?: readonly Value[];
  constValue?: Value;
}

export function readIdentityKeywords(node: SchemaNode): IdentityKeywords {
  return {
    types: node.types(),
    required: node.boolean("required") ?? false,
    enumValues: node.list("enum"),
    constValue: node.raw("const"),
  };
}

/**
 * A null instance is accepted outright unless the schema asks for null
 * explicitly through `type`. `required: true` is the only way to reject it.
 *
 * Returns true when the node is settled and nothing else should run.
 */
export function shortCircuitNull(
  instance: Value,
  keywords: IdentityKeywords,
  ctx: KeywordContext,
): boolean {
  if (instance.kind !== "null") return false;
  if (keywords.types?.includes("null")) return false;

  if (keywords.required) {
    ctx.report("required", "is required", {});
  }
  return true;
}

export function matchesType(instance: Value, type: SchemaType): boolean {
  switch (type) {
    case "any":
      return true;
    case "string":
      return instance.kind === "string";
    case "number":
      return instance.kind === "number";
    case "integer":
      return instance.kind === "number" && isIntegerDecimal(instance.value);
    case "boolean":
      return instance.kind === "boolean";
    case "array":
      return instance.kind === "sequence";
    case "object":
      return instance.kind === "mapping";
    case "null":
      return instance.kind === "null";
  }
}

export function checkType(
  instance: Value,
  keywords: IdentityKeywords,
  ctx: KeywordContext,
): void {
  const types = keywords.types;
  if (!types || types.some((type) => matchesType(instance, type))) return;

  const actual = typeName(instance);
  ctx.report("type", `must be ${types.join(" or ")}, got ${actual}`, {
    expected: types,
    actual,
  });
}

export function checkEnum(
  instance: Value,
  keywords: IdentityKeywords,
  ctx: KeywordContext,
): void {
  const { enumValues, constValue } = keywords;

  if (
    enumValues !== undefined &&
    !enumValues.some((allowed) => deepEqual(instance, allowed))
  ) {
    ctx.report("enum", "must be equal to one of the allowed values", {
      allowedValues: enumValues.map(toJson),
    });
  }

  if (constValue !== undefined && !deepEqual(instance, constValue)) {
    ctx.report("const", "must be equal to constant", {
      allowedValue: toJson(constValue),
    });
  }
}
