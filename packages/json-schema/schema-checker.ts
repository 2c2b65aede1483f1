/**
 * Static schema check: reads every keyword family of every sub-schema
 * without an instance, so malformed keywords that a particular instance
 * would never reach are still found.
 */

import { ConfigurationError } from "./errors.ts";
import { arraySubschemas, readArrayKeywords } from "./keywords/array.ts";
import {
  compositionSubschemas,
  readCompositionKeywords,
} from "./keywords/composition.ts";
import { readIdentityKeywords } from "./keywords/identity.ts";
import { readNumberKeywords } from "./keywords/number.ts";
import { objectSubschemas, readObjectKeywords } from "./keywords/object.ts";
import { readStringKeywords } from "./keywords/string.ts";
import { SchemaNode } from "./schema-node.ts";
import type { Value } from "./value.ts";

/**
 * A family reader plus the sub-schemas it exposes once it reads cleanly.
 */
type FamilyCheck = (node: SchemaNode) => SchemaNode[];

const FAMILIES: FamilyCheck[] = [
  (node) => {
    readIdentityKeywords(node);
    return [];
  },
  (node) => {
    readStringKeywords(node);
    return [];
  },
  (node) => {
    readNumberKeywords(node);
    return [];
  },
  (node) => objectSubschemas(readObjectKeywords(node)),
  (node) => arraySubschemas(readArrayKeywords(node)),
  (node) => compositionSubschemas(readCompositionKeywords(node)),
];

/**
 * Every ConfigurationError in the schema, at most one per keyword family
 * per node and none repeated. A family that fails to read is not descended
 * into. An empty result means validate will never throw for this schema.
 */
export function checkSchema(schema: Value): ConfigurationError[] {
  const problems = new Map<string, ConfigurationError>();

  let root: SchemaNode;
  try {
    root = SchemaNode.from(schema);
  } catch (error) {
    if (error instanceof ConfigurationError) return [error];
    throw error;
  }

  const pending: SchemaNode[] = [root];
  let node: SchemaNode | undefined;
  while ((node = pending.shift()) !== undefined) {
    for (const family of FAMILIES) {
      try {
        pending.push(...family(node));
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        // exclusiveMinimum/exclusiveMaximum are read by several families
        const key = `${error.schemaPath}\u0000${error.message}`;
        if (!problems.has(key)) problems.set(key, error);
      }
    }
  }

  return [...problems.values()];
}
