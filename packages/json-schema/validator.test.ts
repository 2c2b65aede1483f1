import { describe, expect, test } from "vitest";
import { ConfigurationError, InstanceValidationError } from "./errors.ts";
import type { ValidationResult } from "./types.ts";
import { SchemaValidator, validate, validateJson } from "./validator.ts";
import { fromJson, nullValue, numberValue, sequenceValue } from "./value.ts";

function check(schema: unknown, instance: unknown): ValidationResult {
  return validateJson(instance, schema);
}

/** [keyword, instancePath] per error, in order */
function summary(result: ValidationResult): [string, string][] {
  return result.map((error) => [error.keyword, error.instancePath]);
}

function configurationError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("null and required", () => {
  test("null is accepted when required is absent", () => {
    expect(check({ type: "string" }, null)).toEqual([]);
    expect(check({}, null)).toEqual([]);
    expect(check({ type: "any" }, null)).toEqual([]);
  });

  test("required rejects null with exactly one error", () => {
    const result = check({ required: true }, null);
    expect(result).toEqual([{
      path: [],
      instancePath: "",
      schemaPath: "#/required",
      keyword: "required",
      message: "is required",
      params: {},
    }]);
  });

  test("the short-circuit stops every other keyword", () => {
    const result = check(
      { type: "string", required: true, minLength: 3, enum: ["abc"] },
      null,
    );
    expect(summary(result)).toEqual([["required", ""]]);
  });

  test("required is ignored for present values", () => {
    expect(check({ type: "string", required: true }, "x")).toEqual([]);
  });

  test("type naming null disables the short-circuit", () => {
    expect(check({ type: "null" }, null)).toEqual([]);
    expect(check({ type: ["string", "null"], minLength: 3 }, null))
      .toEqual([]);
    expect(summary(check({ type: "null" }, "a"))).toEqual([["type", ""]]);
  });

  test("a missing property is validated as null", () => {
    const schema = {
      type: "object",
      properties: { a: { required: true }, b: { type: "string" } },
    };
    const result = check(schema, {});
    expect(result).toHaveLength(1);
    expect(result[0]?.path).toEqual(["a"]);
    expect(result[0]?.instancePath).toBe("/a");
    expect(result[0]?.schemaPath).toBe("#/properties/a/required");
    expect(result[0]?.keyword).toBe("required");
  });
});

describe("type", () => {
  test("maps each type name to a value kind", () => {
    expect(check({ type: "string" }, "x")).toEqual([]);
    expect(check({ type: "number" }, 1.5)).toEqual([]);
    expect(check({ type: "integer" }, 2)).toEqual([]);
    expect(check({ type: "boolean" }, false)).toEqual([]);
    expect(check({ type: "array" }, [])).toEqual([]);
    expect(check({ type: "object" }, {})).toEqual([]);
    expect(check({ type: "any" }, [1])).toEqual([]);
  });

  test("reports expected and actual kind", () => {
    const [error] = check({ type: "string" }, 5);
    expect(error?.message).toBe("must be string, got integer");
    expect(error?.params).toEqual({ expected: ["string"], actual: "integer" });
  });

  test("integer rejects fractional numbers", () => {
    const [error] = check({ type: "integer" }, 2.5);
    expect(error?.message).toBe("must be integer, got number");
  });

  test("a list of types is a union", () => {
    const schema = { type: ["string", "boolean"] };
    expect(check(schema, true)).toEqual([]);
    const [error] = check(schema, {});
    expect(error?.message).toBe("must be string or boolean, got object");
  });

  test("an unknown type name is a configuration error", () => {
    const error = configurationError(() => check({ type: "text" }, "x"));
    expect(error.schemaPath).toBe("#/type");
    expect(error.message).toBe('Unknown type "text"');
  });
});

describe("enum and const", () => {
  test("enum membership", () => {
    expect(check({ enum: ["a", "b"] }, "b")).toEqual([]);
    const result = check({ enum: ["a", "b"] }, "c");
    expect(summary(result)).toEqual([["enum", ""]]);
    expect(result[0]?.params).toEqual({ allowedValues: ["a", "b"] });
  });

  test("enum compares structures deeply", () => {
    const schema = { enum: [{ a: [1, 2], b: "x" }] };
    expect(check(schema, { b: "x", a: [1, 2] })).toEqual([]);
    expect(summary(check(schema, { a: [2, 1], b: "x" })))
      .toEqual([["enum", ""]]);
  });

  test("enum is case-sensitive", () => {
    expect(summary(check({ enum: ["Yes"] }, "yes"))).toEqual([["enum", ""]]);
  });

  test("const", () => {
    expect(check({ const: 3 }, 3)).toEqual([]);
    const [error] = check({ const: 3 }, 4);
    expect(error?.message).toBe("must be equal to constant");
    expect(error?.params).toEqual({ allowedValue: 3 });
  });

  test("enum tells apart numbers that share a double", () => {
    const schema = fromJson({ enum: [9007199254740992] });
    expect(summary(validate(numberValue("9007199254740993"), schema)))
      .toEqual([["enum", ""]]);
    expect(validate(numberValue("9007199254740992.0"), schema)).toEqual([]);
  });

  test("enum must be a list", () => {
    const error = configurationError(() => check({ enum: "a" }, "a"));
    expect(error.schemaPath).toBe("#/enum");
  });
});

describe("string keywords", () => {
  test("pattern matches anywhere unless anchored", () => {
    expect(check({ pattern: "^fo+$" }, "foo")).toEqual([]);
    const [error] = check({ pattern: "^fo+$" }, "bar");
    expect(error?.keyword).toBe("pattern");
    expect(error?.message).toBe('must match pattern "^fo+$"');
    expect(check({ pattern: "o+" }, "foo bar")).toEqual([]);
  });

  test("format", () => {
    expect(check({ format: "email" }, "someone@example.com")).toEqual([]);
    const [error] = check({ format: "email" }, "nope");
    expect(error?.message).toBe('must match format "email"');
    expect(error?.params).toEqual({ format: "email" });
  });

  test("length counts code points", () => {
    expect(check({ maxLength: 1 }, "😀")).toEqual([]);
    const [error] = check({ minLength: 3 }, "ab");
    expect(error?.keyword).toBe("minLength");
    expect(error?.message).toBe("must NOT have fewer than 3 characters");
  });

  test("exclusive length bounds", () => {
    const schema = { maxLength: 2, exclusiveMaximum: true };
    expect(check(schema, "a")).toEqual([]);
    const [error] = check(schema, "ab");
    expect(error?.keyword).toBe("maxLength");
    expect(error?.message).toBe("must have fewer than 2 characters");
  });

  test("string keywords ignore other kinds", () => {
    expect(check({ minLength: 3, pattern: "^a" }, 12)).toEqual([]);
  });

  test("invalid patterns and unknown formats are configuration errors", () => {
    expect(configurationError(() => check({ pattern: "(" }, "x")).schemaPath)
      .toBe("#/pattern");
    const error = configurationError(() => check({ format: "color" }, "red"));
    expect(error.schemaPath).toBe("#/format");
    expect(error.message).toBe('Unknown format "color"');
  });
});

describe("number keywords", () => {
  test("inclusive bounds", () => {
    expect(check({ minimum: 0, maximum: 100 }, 100)).toEqual([]);
    expect(check({ minimum: 0, maximum: 100 }, 0)).toEqual([]);
    const [error] = check({ minimum: 0 }, -1);
    expect(error?.message).toBe("must be >= 0");
    expect(error?.params).toEqual({
      comparison: ">=",
      limit: 0,
      exclusive: false,
    });
  });

  test("exclusive minimum rejects the limit itself", () => {
    const schema = { type: "number", minimum: 0, exclusiveMinimum: true };
    const result = check(schema, 0);
    expect(summary(result)).toEqual([["minimum", ""]]);
    expect(result[0]?.message).toBe("must be > 0");
    expect(result[0]?.schemaPath).toBe("#/minimum");
  });

  test("exclusive maximum", () => {
    const [error] = check({ maximum: 10, exclusiveMaximum: true }, 10);
    expect(error?.message).toBe("must be < 10");
  });

  test("divisibleBy uses exact decimals", () => {
    expect(check({ divisibleBy: 0.1 }, 0.3)).toEqual([]);
    expect(check({ divisibleBy: 2.5 }, 10)).toEqual([]);
    const [error] = check({ divisibleBy: 0.1 }, 0.35);
    expect(error?.keyword).toBe("divisibleBy");
    expect(error?.message).toBe("must be divisible by 0.1");
  });

  test("bounds compare beyond double precision", () => {
    const above = numberValue("9007199254740993");
    const [error] = validate(above, fromJson({ maximum: 9007199254740992 }));
    expect(error?.keyword).toBe("maximum");
    expect(error?.message).toBe("must be <= 9007199254740992");

    expect(validate(above, fromJson({ minimum: 9007199254740992 }))).toEqual([]);
    expect(
      validate(
        numberValue("9007199254740992"),
        fromJson({ minimum: 9007199254740992, exclusiveMinimum: true }),
      ),
    ).toHaveLength(1);
  });

  test("fractions with more digits than a double holds", () => {
    const tight = numberValue("0.10000000000000000001");
    const [error] = validate(tight, fromJson({ maximum: 0.1 }));
    expect(error?.message).toBe("must be <= 0.1");
    expect(validate(tight, fromJson({ minimum: 0.1 }))).toEqual([]);
  });

  test("divisibleBy beyond double precision", () => {
    const [error] = validate(
      numberValue("9007199254740993"),
      fromJson({ divisibleBy: 2 }),
    );
    expect(error?.keyword).toBe("divisibleBy");
    expect(error?.message).toBe("must be divisible by 2");
    expect(
      validate(numberValue("9007199254740994"), fromJson({ divisibleBy: 2 })),
    ).toEqual([]);
  });

  test("a non-positive divisor is a configuration error", () => {
    expect(configurationError(() => check({ divisibleBy: 0 }, 3)).schemaPath)
      .toBe("#/divisibleBy");
  });

  test("non-numeric bounds are configuration errors", () => {
    const error = configurationError(() => check({ minimum: "1" }, 3));
    expect(error.keyword).toBe("minimum");
  });

  test("malformed keywords of another family are not read", () => {
    expect(check({ type: "string", divisibleBy: "x" }, "a")).toEqual([]);
  });
});

describe("object keywords", () => {
  test("additionalProperties false rejects each residual key", () => {
    const schema = { properties: { a: {} }, additionalProperties: false };
    const result = check(schema, { a: 1, b: 2 });
    expect(result).toEqual([{
      path: ["b"],
      instancePath: "/b",
      schemaPath: "#/additionalProperties",
      keyword: "additionalProperties",
      message: "must NOT have additional property 'b'",
      params: { additionalProperty: "b" },
    }]);
  });

  test("patternProperties cover keys before additionalProperties", () => {
    const schema = {
      patternProperties: { "^x-": { type: "string" } },
      additionalProperties: false,
    };
    const result = check(schema, { "x-a": "ok", "x-b": 1, y: true });
    expect(summary(result)).toEqual([
      ["type", "/x-b"],
      ["additionalProperties", "/y"],
    ]);
  });

  test("a key matching several patterns must satisfy all of them", () => {
    const schema = {
      patternProperties: { "^a": { type: "string" }, "b$": { minLength: 3 } },
    };
    expect(summary(check(schema, { ab: "x" }))).toEqual([["minLength", "/ab"]]);
  });

  test("additionalProperties as an allow-list", () => {
    const schema = { properties: { a: {} }, additionalProperties: ["c"] };
    expect(summary(check(schema, { a: 1, c: 2, d: 3 })))
      .toEqual([["additionalProperties", "/d"]]);
  });

  test("additionalProperties as a schema", () => {
    const schema = { additionalProperties: { type: "number" } };
    expect(summary(check(schema, { a: 1, b: "x" }))).toEqual([["type", "/b"]]);
  });

  test("property dependencies report each missing name", () => {
    const schema = { dependencies: { a: ["b", "c"] } };
    const result = check(schema, { a: 1 });
    expect(summary(result)).toEqual([["dependencies", ""], [
      "dependencies",
      "",
    ]]);
    expect(result.map((error) => error.params)).toEqual([
      { property: "a", missingProperty: "b" },
      { property: "a", missingProperty: "c" },
    ]);
    expect(check(schema, { c: 3 })).toEqual([]);
  });

  test("a single dependency name", () => {
    const [error] = check({ dependencies: { a: "b" } }, { a: null });
    expect(error?.message).toBe(
      "must have property 'b' when property 'a' is present",
    );
  });

  test("schema dependencies apply to the whole object", () => {
    const schema = {
      dependencies: { a: { properties: { b: { required: true } } } },
    };
    expect(summary(check(schema, { a: 1 }))).toEqual([["required", "/b"]]);
    expect(check(schema, { a: 1, b: 2 })).toEqual([]);
  });

  test("property count bounds", () => {
    const [error] = check({ minProperties: 2 }, { a: 1 });
    expect(error?.keyword).toBe("minProperties");
    expect(error?.message).toBe("must NOT have fewer than 2 properties");
    expect(check({ maxProperties: 1 }, { a: 1 })).toEqual([]);
  });

  test("errors carry nested paths", () => {
    const schema = {
      properties: {
        user: { properties: { tags: { items: { type: "string" } } } },
      },
    };
    const [error] = check(schema, { user: { tags: ["a", 2] } });
    expect(error?.path).toEqual(["user", "tags", 1]);
    expect(error?.instancePath).toBe("/user/tags/1");
    expect(error?.schemaPath).toBe(
      "#/properties/user/properties/tags/items/type",
    );
  });

  test("a property schema that is not a mapping is a configuration error", () => {
    const error = configurationError(() =>
      check({ properties: { a: "string" } }, { a: 1 })
    );
    expect(error.schemaPath).toBe("#/properties/a");
  });
});

describe("array keywords", () => {
  test("items as a single schema", () => {
    expect(summary(check({ items: { type: "integer" } }, [1, "x", 2.5])))
      .toEqual([["type", "/1"], ["type", "/2"]]);
  });

  test("positional items reject extra elements by default", () => {
    const schema = {
      type: "array",
      items: [{ type: "string" }],
      additionalItems: false,
    };
    const result = check(schema, ["x", "y"]);
    expect(summary(result)).toEqual([["additionalItems", "/1"]]);
    expect(result[0]?.message).toBe("must NOT have more than 1 items");
    expect(summary(check({ items: [{}] }, [1, 2])))
      .toEqual([["additionalItems", "/1"]]);
  });

  test("additionalItems as a schema", () => {
    const schema = {
      items: [{ type: "string" }],
      additionalItems: { type: "number" },
    };
    expect(summary(check(schema, ["a", 1, "b"]))).toEqual([["type", "/2"]]);
  });

  test("additionalItems is ignored for a single item schema", () => {
    expect(check({ items: {}, additionalItems: false }, [1, 2])).toEqual([]);
  });

  test("item count bounds", () => {
    const schema = { maxItems: 2, exclusiveMaximum: true };
    const [error] = check(schema, [1, 2]);
    expect(error?.keyword).toBe("maxItems");
    expect(error?.message).toBe("must have fewer than 2 items");
    expect(check({ minItems: 1 }, [1])).toEqual([]);
  });

  test("uniqueItems keeps numbers that share a double apart", () => {
    const items = sequenceValue([
      numberValue("9007199254740993"),
      numberValue(9007199254740992),
    ]);
    expect(validate(items, fromJson({ uniqueItems: true }))).toEqual([]);
  });

  test("uniqueItems", () => {
    const result = check({ type: "array", uniqueItems: true }, [1, 1]);
    expect(summary(result)).toEqual([["uniqueItems", "/1"]]);
    expect(result[0]?.params).toEqual({ i: 0, j: 1 });
    expect(check({ type: "array", uniqueItems: true }, [1, 2])).toEqual([]);
  });

  test("uniqueItems reports every duplicate pair", () => {
    expect(summary(check({ uniqueItems: true }, [1, 1, 1]))).toEqual([
      ["uniqueItems", "/1"],
      ["uniqueItems", "/2"],
      ["uniqueItems", "/2"],
    ]);
  });

  test("uniqueItems ignores key order", () => {
    expect(check({ uniqueItems: true }, [{ a: 1, b: 2 }, { b: 2, a: 1 }]))
      .toHaveLength(1);
  });
});

describe("composition", () => {
  const isString = { type: "string" };
  const isLong = { minLength: 3 };

  test("allOf merges only the failing branch's errors", () => {
    const result = check({ allOf: [isString, isLong] }, "ab");
    const direct = check(isLong, "ab");
    expect(result.map(({ keyword, path, message }) => ({
      keyword,
      path,
      message,
    }))).toEqual(direct.map(({ keyword, path, message }) => ({
      keyword,
      path,
      message,
    })));
    expect(result[0]?.schemaPath).toBe("#/allOf/1/minLength");
  });

  test("anyOf", () => {
    expect(check({ anyOf: [isString, { type: "number" }] }, 5)).toEqual([]);
    const [error] = check({ anyOf: [isString, { type: "boolean" }] }, 5);
    expect(error?.keyword).toBe("anyOf");
    expect(error?.message).toBe("must match at least one schema in anyOf");
  });

  test("oneOf with two matches", () => {
    const result = check({ oneOf: [{ type: "number" }, { minimum: 0 }] }, 5);
    expect(summary(result)).toEqual([["oneOf", ""]]);
    expect(result[0]?.params).toEqual({ passingSchemas: [0, 1] });
  });

  test("oneOf with no match", () => {
    const [error] = check({ oneOf: [isString, { type: "boolean" }] }, 5);
    expect(error?.message).toBe(
      "must match exactly one schema in oneOf, matched none",
    );
    expect(error?.params).toEqual({ passingSchemas: [] });
  });

  test("oneOf with exactly one match", () => {
    expect(check({ oneOf: [isString, { type: "number" }] }, 5)).toEqual([]);
  });

  test("not", () => {
    expect(summary(check({ not: isString }, "x"))).toEqual([["not", ""]]);
    expect(check({ not: isString }, 1)).toEqual([]);
  });

  test("not with a list combines the schemas as allOf", () => {
    const schema = { not: [{ type: "number" }, { minimum: 10 }] };
    expect(check(schema, 5)).toEqual([]);
    expect(summary(check(schema, 15))).toEqual([["not", ""]]);
  });

  test("composition lists must be non-empty lists", () => {
    expect(configurationError(() => check({ allOf: {} }, 1)).schemaPath)
      .toBe("#/allOf");
    expect(configurationError(() => check({ anyOf: [] }, 1)).schemaPath)
      .toBe("#/anyOf");
  });
});

describe("evaluation order", () => {
  test("type, enum and family errors are all collected in order", () => {
    const schema = { type: "string", enum: ["abcdef"], minLength: 5 };
    expect(summary(check(schema, 5))).toEqual([["type", ""], ["enum", ""]]);
    expect(summary(check(schema, "abc"))).toEqual([
      ["enum", ""],
      ["minLength", ""],
    ]);
  });

  test("composition runs after the structural keywords", () => {
    const schema = {
      properties: { a: { type: "string" } },
      allOf: [{ required: true, minProperties: 2 }],
    };
    expect(summary(check(schema, { a: 1 }))).toEqual([
      ["type", "/a"],
      ["minProperties", ""],
    ]);
  });
});

describe("SchemaValidator", () => {
  const schema = fromJson({ type: "number" });

  test("validate takes Value trees", () => {
    expect(validate(fromJson(3), schema)).toEqual([]);
    expect(validate(nullValue, fromJson({ required: true }))).toHaveLength(1);
  });

  test("isValid", () => {
    const validator = new SchemaValidator();
    expect(validator.isValid(fromJson(1), schema)).toBe(true);
    expect(validator.isValid(fromJson("1"), schema)).toBe(false);
  });

  test("assertValid throws with the full result", () => {
    const validator = new SchemaValidator();
    expect(() => validator.assertValid(fromJson(1), schema)).not.toThrow();

    let thrown: unknown;
    try {
      validator.assertValid(fromJson("1"), schema);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(InstanceValidationError);
    if (thrown instanceof InstanceValidationError) {
      expect(thrown.errors).toHaveLength(1);
      expect(thrown.message).toBe(
        "Validation failed: must be number, got string at root",
      );
    }
  });

  test("basePath prefixes every reported path", () => {
    const validator = new SchemaValidator({ basePath: ["data", 0] });
    const [error] = validator.validateJson("x", { type: "number" });
    expect(error?.path).toEqual(["data", 0]);
    expect(error?.instancePath).toBe("/data/0");
  });

  test("a schema that is not a mapping is a configuration error", () => {
    expect(configurationError(() => check("string", 1)).schemaPath).toBe("#");
  });

  test("unknown keywords are ignored", () => {
    expect(check({ title: "Name", description: "x", type: "string" }, "a"))
      .toEqual([]);
  });
});
