/**
 * allOf, anyOf, oneOf and not.
 *
 * Branches are evaluated in isolation through KeywordContext.evaluate, so
 * only allOf lets sub-errors into the result. The others report one
 * aggregate error of their own.
 */

import type { SchemaNode } from "../schema-node.ts";
import type { Value } from "../value.ts";
import type { KeywordContext } from "./context.ts";

export interface CompositionKeywords {
  allOf?: SchemaNode[];
  anyOf?: SchemaNode[];
  oneOf?: SchemaNode[];
  not?: SchemaNode[];
}

function readNot(node: SchemaNode): SchemaNode[] | undefined {
  const value = node.raw("not");
  if (value === undefined) return undefined;

  switch (value.kind) {
    case "mapping":
      return [node.child(value, "not")];
    case "sequence":
      return node.schemaList("not");
    default:
      throw node.malformed("not", "a schema or a list of schemas", value);
  }
}

export function readCompositionKeywords(
  node: SchemaNode,
): CompositionKeywords {
  return {
    allOf: node.schemaList("allOf"),
    anyOf: node.schemaList("anyOf"),
    oneOf: node.schemaList("oneOf"),
    not: readNot(node),
  };
}

export function compositionSubschemas(
  keywords: CompositionKeywords,
): SchemaNode[] {
  return [
    ...keywords.allOf ?? [],
    ...keywords.anyOf ?? [],
    ...keywords.oneOf ?? [],
    ...keywords.not ?? [],
  ];
}

export function checkComposition(
  instance: Value,
  keywords: CompositionKeywords,
  ctx: KeywordContext,
): void {
  const { allOf, anyOf, oneOf, not } = keywords;

  for (const schema of allOf ?? []) {
    ctx.descend(instance, schema);
  }

  if (anyOf) {
    // Every branch runs, even after a match.
    const passing = anyOf.filter((schema) =>
      ctx.evaluate(instance, schema).length === 0
    );
    if (passing.length === 0) {
      ctx.report("anyOf", "must match at least one schema in anyOf", {
        schemaCount: anyOf.length,
      });
    }
  }

  if (oneOf) {
    const passingSchemas: number[] = [];
    oneOf.forEach((schema, index) => {
      if (ctx.evaluate(instance, schema).length === 0) {
        passingSchemas.push(index);
      }
    });
    if (passingSchemas.length !== 1) {
      ctx.report(
        "oneOf",
        passingSchemas.length === 0
          ? "must match exactly one schema in oneOf, matched none"
          : `must match exactly one schema in oneOf, matched ${passingSchemas.length}`,
        { passingSchemas },
      );
    }
  }

  if (not) {
    const errors = not.flatMap((schema) => ctx.evaluate(instance, schema));
    if (errors.length === 0) {
      ctx.report("not", "must NOT be valid", {});
    }
  }
}
