/**
 * properties, patternProperties, additionalProperties, dependencies and
 * the property-count bounds.
 */

import type {
  AdditionalPolicy,
  CompiledPattern,
  SchemaNode,
} from "../schema-node.ts";
import { type MappingValue, nullValue } from "../value.ts";
import { type BoundKeywords, type Bounds, checkCount, readBounds } from "./bounds.ts";
import type { KeywordContext } from "./context.ts";

const PROPERTY_COUNT: BoundKeywords = {
  lower: "minProperties",
  upper: "maxProperties",
  unit: "properties",
};

export interface PatternProperty extends CompiledPattern {
  schema: SchemaNode;
}

/**
 * What a present key demands: other keys, or the whole object to match a
 * schema.
 */
export type Dependency =
  | { property: string; kind: "properties"; requires: string[] }
  | { property: string; kind: "schema"; schema: SchemaNode };

export interface ObjectKeywords {
  properties: [string, SchemaNode][];
  patternProperties: PatternProperty[];
  additional: AdditionalPolicy;
  dependencies: Dependency[];
  count: Bounds;
}

function readDependencies(node: SchemaNode): Dependency[] {
  const mapping = node.mapping("dependencies");
  if (!mapping) return [];

  return [...mapping.entries].map(([property, value]): Dependency => {
    switch (value.kind) {
      case "string":
        return { property, kind: "properties", requires: [value.value] };
      case "sequence":
        return {
          property,
          kind: "properties",
          requires: value.items.map((item, index) => {
            if (item.kind !== "string") {
              throw node.malformed(
                "dependencies",
                "a property name",
                item,
                property,
                index,
              );
            }
            return item.value;
          }),
        };
      case "mapping":
        return {
          property,
          kind: "schema",
          schema: node.child(value, "dependencies", property),
        };
      default:
        throw node.malformed(
          "dependencies",
          "a property name, a list of property names or a schema",
          value,
          property,
        );
    }
  });
}

export function readObjectKeywords(node: SchemaNode): ObjectKeywords {
  return {
    properties: node.schemaMap("properties"),
    patternProperties: node.schemaMap("patternProperties").map((
      [source, schema],
    ) => ({ ...node.regex("patternProperties", source, source), schema })),
    additional: node.additional("additionalProperties", true),
    dependencies: readDependencies(node),
    count: readBounds(node, PROPERTY_COUNT),
  };
}

/** Every sub-schema the object keywords can recurse into */
export function objectSubschemas(keywords: ObjectKeywords): SchemaNode[] {
  const nested: SchemaNode[] = [
    ...keywords.properties.map(([, schema]) => schema),
    ...keywords.patternProperties.map((entry) => entry.schema),
  ];
  if (keywords.additional.kind === "schema") {
    nested.push(keywords.additional.schema);
  }
  for (const dependency of keywords.dependencies) {
    if (dependency.kind === "schema") nested.push(dependency.schema);
  }
  return nested;
}

export function checkObject(
  instance: MappingValue,
  keywords: ObjectKeywords,
  ctx: KeywordContext,
): void {
  const { entries } = instance;

  // Absent properties are validated as null, so `required` on the property
  // schema is what rejects a missing key.
  for (const [name, schema] of keywords.properties) {
    ctx.descend(entries.get(name) ?? nullValue, schema, name);
  }

  for (const { regex, schema } of keywords.patternProperties) {
    for (const [key, value] of entries) {
      if (regex.test(key)) {
        ctx.descend(value, schema, key);
      }
    }
  }

  checkAdditionalProperties(instance, keywords, ctx);

  for (const dependency of keywords.dependencies) {
    if (!entries.has(dependency.property)) continue;

    if (dependency.kind === "schema") {
      ctx.descend(instance, dependency.schema);
      continue;
    }

    for (const missing of dependency.requires) {
      if (!entries.has(missing)) {
        ctx.report(
          "dependencies",
          `must have property '${missing}' when property '${dependency.property}' is present`,
          { property: dependency.property, missingProperty: missing },
        );
      }
    }
  }

  checkCount(entries.size, keywords.count, PROPERTY_COUNT, ctx);
}

function checkAdditionalProperties(
  instance: MappingValue,
  keywords: ObjectKeywords,
  ctx: KeywordContext,
): void {
  const policy = keywords.additional;
  if (policy.kind === "allow") return;

  const declared = new Set(keywords.properties.map(([name]) => name));
  const residual = [...instance.entries].filter(([key]) =>
    !declared.has(key) &&
    !keywords.patternProperties.some(({ regex }) => regex.test(key))
  );

  for (const [key, value] of residual) {
    switch (policy.kind) {
      case "deny":
        ctx.report(
          "additionalProperties",
          `must NOT have additional property '${key}'`,
          { additionalProperty: key },
          key,
        );
        break;
      case "allowList":
        if (!policy.names.has(key)) {
          ctx.report(
            "additionalProperties",
            `property '${key}' is not in the list of allowed additional properties`,
            { additionalProperty: key, allowed: [...policy.names] },
            key,
          );
        }
        break;
      case "schema":
        ctx.descend(value, policy.schema, key);
        break;
    }
  }
}
