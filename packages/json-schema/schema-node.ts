/**
 * Typed access to the keywords of one schema mapping.
 *
 * Every reader checks the shape of the keyword's value and throws a
 * ConfigurationError pointing at it when the schema is malformed. Nothing
 * is cached: a SchemaNode is a view over the caller's tree.
 */

import { appendPointer, type PointerSegment } from "@treecheck/json-pointer";
import { type Decimal, isIntegerDecimal } from "./decimal.ts";
import { ConfigurationError } from "./errors.ts";
import { lookupFormat, knownFormats } from "./formats.ts";
import { type Keyword, SCHEMA_TYPES, type SchemaType } from "./types.ts";
import {
  type MappingValue,
  toJson,
  typeName,
  type Value,
} from "./value.ts";

/** A compiled `pattern` or `patternProperties` key */
export interface CompiledPattern {
  source: string;
  regex: RegExp;
}

/**
 * How residual object keys or array elements are treated.
 */
export type AdditionalPolicy =
  | { kind: "allow" }
  | { kind: "deny" }
  | { kind: "allowList"; names: ReadonlySet<string> }
  | { kind: "schema"; schema: SchemaNode };

function isSchemaType(name: string): name is SchemaType {
  return SCHEMA_TYPES.some((type) => type === name);
}

export class SchemaNode {
  private constructor(
    readonly value: MappingValue,
    readonly pointer: string,
  ) {}

  /**
   * Wrap a schema value. Only mappings are schemas.
   */
  static from(value: Value, pointer = "#"): SchemaNode {
    if (value.kind !== "mapping") {
      throw new ConfigurationError("Schema must be an object", {
        schemaPath: pointer,
        reason: `Expected a mapping of keywords, found ${typeName(value)}.`,
        expected: "object",
        actual: toJson(value),
        suggestion: 'Write the schema as an object, e.g. { "type": "string" }',
      });
    }
    return new SchemaNode(value, pointer);
  }

  has(keyword: Keyword): boolean {
    return this.value.entries.has(keyword);
  }

  raw(keyword: Keyword): Value | undefined {
    return this.value.entries.get(keyword);
  }

  pointerTo(keyword: Keyword, ...segments: PointerSegment[]): string {
    return appendPointer(this.pointer, keyword, ...segments);
  }

  /** Reject a keyword value of the wrong shape */
  malformed(
    keyword: Keyword,
    expected: string,
    value: Value,
    ...segments: PointerSegment[]
  ): ConfigurationError {
    return new ConfigurationError(
      `Invalid value for "${keyword}": expected ${expected}`,
      {
        schemaPath: this.pointerTo(keyword, ...segments),
        keyword,
        reason: `"${keyword}" must be ${expected}, found ${typeName(value)}.`,
        expected,
        actual: toJson(value),
      },
    );
  }

  boolean(keyword: Keyword): boolean | undefined {
    const value = this.raw(keyword);
    if (value === undefined) return undefined;
    if (value.kind !== "boolean") {
      throw this.malformed(keyword, "a boolean", value);
    }
    return value.value;
  }

  number(keyword: Keyword): Decimal | undefined {
    const value = this.raw(keyword);
    if (value === undefined) return undefined;
    if (value.kind !== "number") {
      throw this.malformed(keyword, "a number", value);
    }
    return value.value;
  }

  /** Counts: lengths, item and property limits */
  count(keyword: Keyword): Decimal | undefined {
    const value = this.raw(keyword);
    if (value === undefined) return undefined;
    if (
      value.kind !== "number" || !isIntegerDecimal(value.value) ||
      value.value.coefficient < 0n
    ) {
      throw this.malformed(keyword, "a non-negative integer", value);
    }
    return value.value;
  }

  string(keyword: Keyword): string | undefined {
    const value = this.raw(keyword);
    if (value === undefined) return undefined;
    if (value.kind !== "string") {
      throw this.malformed(keyword, "a string", value);
    }
    return value.value;
  }

  list(keyword: Keyword): readonly Value[] | undefined {
    const value = this.raw(keyword);
    if (value === undefined) return undefined;
    if (value.kind !== "sequence") {
      throw this.malformed(keyword, "a list", value);
    }
    return value.items;
  }

  mapping(keyword: Keyword): MappingValue | undefined {
    const value = this.raw(keyword);
    if (value === undefined) return undefined;
    if (value.kind !== "mapping") {
      throw this.malformed(keyword, "an object", value);
    }
    return value;
  }

  /**
   * `type` as a list of names. A single name becomes a one-element list.
   */
  types(): SchemaType[] | undefined {
    const value = this.raw("type");
    if (value === undefined) return undefined;

    const names = value.kind === "sequence" ? value.items : [value];
    return names.map((name, index) => {
      const at: PointerSegment[] = value.kind === "sequence" ? [index] : [];
      if (name.kind !== "string") {
        throw this.malformed("type", "a type name or a list of type names", name, ...at);
      }
      if (!isSchemaType(name.value)) {
        throw new ConfigurationError(`Unknown type "${name.value}"`, {
          schemaPath: this.pointerTo("type", ...at),
          keyword: "type",
          reason: `"${name.value}" is not a type this validator understands.`,
          suggestion: `Use one of: ${SCHEMA_TYPES.join(", ")}`,
        });
      }
      return name.value;
    });
  }

  regex(
    keyword: Keyword,
    source: string,
    ...segments: PointerSegment[]
  ): CompiledPattern {
    try {
      return { source, regex: new RegExp(source) };
    } catch (error) {
      throw new ConfigurationError(`Invalid regular expression in "${keyword}"`, {
        schemaPath: this.pointerTo(keyword, ...segments),
        keyword,
        reason: error instanceof Error ? error.message : String(error),
        actual: source,
      });
    }
  }

  pattern(): CompiledPattern | undefined {
    const source = this.string("pattern");
    return source === undefined ? undefined : this.regex("pattern", source);
  }

  format(): CompiledPattern | undefined {
    const name = this.string("format");
    if (name === undefined) return undefined;

    const regex = lookupFormat(name);
    if (!regex) {
      throw new ConfigurationError(`Unknown format "${name}"`, {
        schemaPath: this.pointerTo("format"),
        keyword: "format",
        reason: `No pattern is registered for the format "${name}".`,
        suggestion: `Use one of: ${knownFormats().join(", ")}`,
      });
    }
    return { source: name, regex };
  }

  /** A sub-schema found somewhere below one of this node's keywords */
  child(
    value: Value,
    keyword: Keyword,
    ...segments: PointerSegment[]
  ): SchemaNode {
    return SchemaNode.from(value, this.pointerTo(keyword, ...segments));
  }

  /**
   * A non-empty list of sub-schemas (allOf, anyOf, oneOf)
   */
  schemaList(keyword: Keyword): SchemaNode[] | undefined {
    const value = this.raw(keyword);
    if (value === undefined) return undefined;
    if (value.kind !== "sequence" || value.items.length === 0) {
      throw this.malformed(keyword, "a non-empty list of schemas", value);
    }
    return value.items.map((item, index) => this.child(item, keyword, index));
  }

  /**
   * Name to sub-schema entries (properties, patternProperties)
   */
  schemaMap(keyword: Keyword): [string, SchemaNode][] {
    const mapping = this.mapping(keyword);
    if (!mapping) return [];
    return [...mapping.entries].map(([name, item]): [string, SchemaNode] => [
      name,
      this.child(item, keyword, name),
    ]);
  }

  /**
   * additionalProperties / additionalItems. A list of names is only
   * meaningful for properties.
   */
  additional(
    keyword: "additionalProperties" | "additionalItems",
    fallback: boolean,
  ): AdditionalPolicy {
    const value = this.raw(keyword);
    if (value === undefined) {
      return { kind: fallback ? "allow" : "deny" };
    }

    switch (value.kind) {
      case "boolean":
        return { kind: value.value ? "allow" : "deny" };
      case "mapping":
        return { kind: "schema", schema: this.child(value, keyword) };
      case "sequence":
        if (keyword === "additionalProperties") {
          const names = value.items.map((item, index) => {
            if (item.kind !== "string") {
              throw this.malformed(keyword, "a property name", item, index);
            }
            return item.value;
          });
          return { kind: "allowList", names: new Set(names) };
        }
    }

    throw this.malformed(
      keyword,
      keyword === "additionalProperties"
        ? "a boolean, a list of property names or a schema"
        : "a boolean or a schema",
      value,
    );
  }
}
