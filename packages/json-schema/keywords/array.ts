import type { AdditionalPolicy, SchemaNode } from "../schema-node.ts";
import { deepEqual, type SequenceValue } from "../value.ts";
import { type BoundKeywords, type Bounds, checkCount, readBounds } from "./bounds.ts";
import type { KeywordContext } from "./context.ts";

const ITEM_COUNT: BoundKeywords = {
  lower: "minItems",
  upper: "maxItems",
  unit: "items",
};

/**
 * `items` is either one schema for every element or a positional tuple.
 */
export type ItemsKeyword =
  | { kind: "none" }
  | { kind: "all"; schema: SchemaNode }
  | { kind: "tuple"; schemas: SchemaNode[]; additional: AdditionalPolicy };

export interface ArrayKeywords {
  items: ItemsKeyword;
  count: Bounds;
  uniqueItems: boolean;
}

function readItems(node: SchemaNode): ItemsKeyword {
  const value = node.raw("items");
  if (value === undefined) return { kind: "none" };

  switch (value.kind) {
    case "mapping":
      return { kind: "all", schema: node.child(value, "items") };
    case "sequence":
      return {
        kind: "tuple",
        schemas: value.items.map((item, index) =>
          node.child(item, "items", index)
        ),
        additional: node.additional("additionalItems", false),
      };
    default:
      throw node.malformed("items", "a schema or a list of schemas", value);
  }
}

export function readArrayKeywords(node: SchemaNode): ArrayKeywords {
  return {
    items: readItems(node),
    count: readBounds(node, ITEM_COUNT),
    uniqueItems: node.boolean("uniqueItems") ?? false,
  };
}

export function arraySubschemas(keywords: ArrayKeywords): SchemaNode[] {
  const { items } = keywords;
  switch (items.kind) {
    case "none":
      return [];
    case "all":
      return [items.schema];
    case "tuple":
      return items.additional.kind === "schema"
        ? [...items.schemas, items.additional.schema]
        : items.schemas;
  }
}

export function checkArray(
  instance: SequenceValue,
  keywords: ArrayKeywords,
  ctx: KeywordContext,
): void {
  const elements = instance.items;

  if (keywords.uniqueItems) {
    for (let i = 0; i < elements.length; i++) {
      for (let j = i + 1; j < elements.length; j++) {
        const first = elements[i];
        const second = elements[j];
        if (first && second && deepEqual(first, second)) {
          ctx.report(
            "uniqueItems",
            `must NOT have duplicate items (items ## ${i} and ${j} are identical)`,
            { i, j },
            j,
          );
        }
      }
    }
  }

  checkItems(elements, keywords.items, ctx);
  checkCount(elements.length, keywords.count, ITEM_COUNT, ctx);
}

function checkItems(
  elements: SequenceValue["items"],
  items: ItemsKeyword,
  ctx: KeywordContext,
): void {
  switch (items.kind) {
    case "none":
      return;
    case "all":
      elements.forEach((element, index) =>
        ctx.descend(element, items.schema, index)
      );
      return;
    case "tuple": {
      const { schemas, additional } = items;
      elements.forEach((element, index) => {
        const schema = schemas[index];
        if (schema) {
          ctx.descend(element, schema, index);
          return;
        }
        switch (additional.kind) {
          case "deny":
            ctx.report(
              "additionalItems",
              `must NOT have more than ${schemas.length} items`,
              { limit: schemas.length },
              index,
            );
            break;
          case "schema":
            ctx.descend(element, additional.schema, index);
            break;
        }
      });
      return;
    }
  }
}
