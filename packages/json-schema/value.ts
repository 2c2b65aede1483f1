/**
 * Value model shared by instances and schemas.
 *
 * A closed tagged union: every consumer switches on `kind`, so adding a
 * variant is a compile error everywhere it is not handled.
 */

import {
  formatPointer,
  isValidArrayIndex,
  JsonPointerError,
  parsePointer,
} from "@treecheck/json-pointer";
import { isLosslessNumber } from "lossless-json";
import {
  compareDecimals,
  type Decimal,
  decimalToNumber,
  integerDecimal,
  isIntegerDecimal,
  parseDecimal,
  toDecimal,
} from "./decimal.ts";
import { ValueConversionError } from "./errors.ts";
import type { PathSegment, SchemaType } from "./types.ts";

export interface NullValue {
  readonly kind: "null";
}

export interface BooleanValue {
  readonly kind: "boolean";
  readonly value: boolean;
}

/** Numbers keep their exact decimal value, never a rounded double */
export interface NumberValue {
  readonly kind: "number";
  readonly value: Decimal;
}

export interface StringValue {
  readonly kind: "string";
  readonly value: string;
}

export interface SequenceValue {
  readonly kind: "sequence";
  readonly items: readonly Value[];
}

export interface MappingValue {
  readonly kind: "mapping";
  readonly entries: ReadonlyMap<string, Value>;
}

export type Value =
  | NullValue
  | BooleanValue
  | NumberValue
  | StringValue
  | SequenceValue
  | MappingValue;

export type ValueKind = Value["kind"];

/** Plain JSON data as produced by JSON.parse */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export const nullValue: NullValue = { kind: "null" };

export function booleanValue(value: boolean): BooleanValue {
  return { kind: "boolean", value };
}

/**
 * A number from a double, a BigInt, a literal such as "9007199254740993"
 * or an already exact decimal.
 */
export function numberValue(
  value: number | bigint | string | Decimal,
): NumberValue {
  switch (typeof value) {
    case "number":
      if (!Number.isFinite(value)) {
        throw new RangeError(`${value} is not a finite number`);
      }
      return { kind: "number", value: toDecimal(value) };
    case "bigint":
      return { kind: "number", value: integerDecimal(value) };
    case "string": {
      const decimal = parseDecimal(value);
      if (!decimal) {
        throw new RangeError(`"${value}" is not a decimal number`);
      }
      return { kind: "number", value: decimal };
    }
    default:
      return { kind: "number", value };
  }
}

export function stringValue(value: string): StringValue {
  return { kind: "string", value };
}

export function sequenceValue(items: readonly Value[]): SequenceValue {
  return { kind: "sequence", items };
}

export function mappingValue(
  entries: Iterable<readonly [string, Value]>,
): MappingValue {
  return { kind: "mapping", entries: new Map(entries) };
}

function isPlainObject(input: object): boolean {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert parsed JSON-like data into a Value tree. Besides plain numbers,
 * a BigInt or a lossless-json `LosslessNumber` keeps its exact value.
 */
export function fromJson(input: unknown): Value {
  const ancestors = new Set<object>();

  function convert(data: unknown, path: (string | number)[]): Value {
    if (data === null) return nullValue;

    switch (typeof data) {
      case "boolean":
        return booleanValue(data);
      case "string":
        return stringValue(data);
      case "number":
        if (!Number.isFinite(data)) {
          throw new ValueConversionError(
            `${data} is not a valid JSON number`,
            formatPointer(path),
          );
        }
        return numberValue(data);
      case "bigint":
        return numberValue(data);
      case "object":
        break;
      default:
        throw new ValueConversionError(
          `${typeof data} is not a valid JSON value`,
          formatPointer(path),
        );
    }

    if (isLosslessNumber(data)) {
      const decimal = parseDecimal(data.value);
      if (!decimal) {
        throw new ValueConversionError(
          `${data.value} is out of range`,
          formatPointer(path),
        );
      }
      return numberValue(decimal);
    }

    if (ancestors.has(data)) {
      throw new ValueConversionError(
        "circular structure cannot be validated",
        formatPointer(path),
      );
    }

    ancestors.add(data);
    try {
      if (Array.isArray(data)) {
        const items: Value[] = [];
        for (let i = 0; i < data.length; i++) {
          items.push(convert(data[i], [...path, i]));
        }
        return sequenceValue(items);
      }

      if (!isPlainObject(data)) {
        throw new ValueConversionError(
          `${data.constructor.name} instances are not valid JSON values`,
          formatPointer(path),
        );
      }

      const entries = new Map<string, Value>();
      for (const [key, child] of Object.entries(data)) {
        entries.set(key, convert(child, [...path, key]));
      }
      return { kind: "mapping", entries };
    } finally {
      ancestors.delete(data);
    }
  }

  return convert(input, []);
}

/**
 * Convert a Value tree back into plain JSON data. Numbers become the
 * nearest double.
 */
export function toJson(value: Value): JsonValue {
  switch (value.kind) {
    case "null":
      return null;
    case "boolean":
    case "string":
      return value.value;
    case "number":
      return decimalToNumber(value.value);
    case "sequence":
      return value.items.map(toJson);
    case "mapping":
      // fromEntries defines own properties, so a "__proto__" key stays data
      return Object.fromEntries(
        [...value.entries].map(([key, child]) => [key, toJson(child)]),
      );
  }
}

/**
 * Name of the value's kind in schema `type` vocabulary. Numbers without a
 * fractional part report as "integer".
 */
export function typeName(value: Value): Exclude<SchemaType, "any"> {
  switch (value.kind) {
    case "null":
      return "null";
    case "boolean":
      return "boolean";
    case "number":
      return isIntegerDecimal(value.value) ? "integer" : "number";
    case "string":
      return "string";
    case "sequence":
      return "array";
    case "mapping":
      return "object";
  }
}

/**
 * Structural equality. Sequences compare element-wise in order, mappings
 * compare by key set regardless of insertion order, numbers by numeric value
 * (so 1 and 1.0 are equal), strings case-sensitively.
 */
export function deepEqual(a: Value, b: Value): boolean {
  if (a === b) return true;

  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "boolean":
      return b.kind === "boolean" && b.value === a.value;
    case "number":
      return b.kind === "number" && compareDecimals(a.value, b.value) === 0;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "sequence":
      return b.kind === "sequence" &&
        a.items.length === b.items.length &&
        a.items.every((item, index) => {
          const other = b.items[index];
          return other !== undefined && deepEqual(item, other);
        });
    case "mapping": {
      if (b.kind !== "mapping" || a.entries.size !== b.entries.size) {
        return false;
      }
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !deepEqual(item, other)) return false;
      }
      return true;
    }
  }
}

/** A value found by a pointer, with the path that leads to it */
export interface Selection {
  value: Value;
  /** Array indices as numbers, property names as strings */
  path: PathSegment[];
}

/**
 * Resolve a JSON Pointer against a Value tree
 */
export function selectValue(document: Value, pointer: string): Value {
  return locate(document, pointer).value;
}

/**
 * Resolve a JSON Pointer and report the typed path it followed.
 */
export function locate(document: Value, pointer: string): Selection {
  const segments = parsePointer(pointer);
  const path: PathSegment[] = [];
  let current = document;

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i] ?? "";
    const at = formatPointer(segments.slice(0, i + 1));

    if (current.kind === "sequence") {
      if (!isValidArrayIndex(segment)) {
        throw new JsonPointerError(
          `Invalid array index '${segment}': must be non-negative integer without leading zeros`,
          at,
        );
      }
      const index = parseInt(segment, 10);
      const item = current.items[index];
      if (item === undefined) {
        throw new JsonPointerError(
          `Array index ${index} out of bounds (array length: ${current.items.length})`,
          at,
        );
      }
      current = item;
      path.push(index);
    } else if (current.kind === "mapping") {
      const child = current.entries.get(segment);
      if (child === undefined) {
        throw new JsonPointerError(
          `Property '${segment}' not found in object`,
          at,
        );
      }
      current = child;
      path.push(segment);
    } else {
      throw new JsonPointerError(
        `Cannot resolve pointer at segment '${segment}': current value is not an object or array`,
        at,
      );
    }
  }

  return { value: current, path };
}
