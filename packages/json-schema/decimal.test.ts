import { describe, expect, test } from "vitest";
import {
  compareDecimals,
  type Decimal,
  formatDecimal,
  isMultipleOf,
  parseDecimal,
  toDecimal,
} from "./decimal.ts";

function decimal(text: string): Decimal {
  const value = parseDecimal(text);
  if (!value) throw new Error(`not a decimal: ${text}`);
  return value;
}

describe("parseDecimal", () => {
  test("reads JSON and YAML notations", () => {
    expect(parseDecimal("12.50")).toEqual({ coefficient: 125n, exponent: -1 });
    expect(parseDecimal("-0.001")).toEqual({ coefficient: -1n, exponent: -3 });
    expect(parseDecimal("+1E3")).toEqual({ coefficient: 1n, exponent: 3 });
    expect(parseDecimal(".5")).toEqual({ coefficient: 5n, exponent: -1 });
    expect(parseDecimal("7.")).toEqual({ coefficient: 7n, exponent: 0 });
    expect(parseDecimal("-0.0")).toEqual({ coefficient: 0n, exponent: 0 });
  });

  test("keeps every digit", () => {
    expect(parseDecimal("9007199254740993")).toEqual({
      coefficient: 9007199254740993n,
      exponent: 0,
    });
  });

  test("rejects anything else", () => {
    expect(parseDecimal("")).toBeUndefined();
    expect(parseDecimal(".")).toBeUndefined();
    expect(parseDecimal(".inf")).toBeUndefined();
    expect(parseDecimal("0x1F")).toBeUndefined();
    expect(parseDecimal("1e")).toBeUndefined();
  });
});

describe("toDecimal", () => {
  test("expands the shortest text of a double", () => {
    expect(toDecimal(0.1)).toEqual({ coefficient: 1n, exponent: -1 });
    expect(toDecimal(-12.5)).toEqual({ coefficient: -125n, exponent: -1 });
    expect(toDecimal(300)).toEqual({ coefficient: 3n, exponent: 2 });
    expect(toDecimal(1e-7)).toEqual({ coefficient: 1n, exponent: -7 });
    expect(toDecimal(1.5e21)).toEqual({ coefficient: 15n, exponent: 20 });
  });

  test("rejects non-finite numbers", () => {
    expect(() => toDecimal(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });
});

describe("compareDecimals", () => {
  test("orders values a double cannot tell apart", () => {
    expect(compareDecimals(decimal("9007199254740993"), decimal("9007199254740992")))
      .toBe(1);
    expect(compareDecimals(decimal("0.10000000000000000001"), decimal("0.1")))
      .toBe(1);
  });

  test("handles signs and scale", () => {
    expect(compareDecimals(decimal("-2"), decimal("1"))).toBe(-1);
    expect(compareDecimals(decimal("-2"), decimal("-10"))).toBe(1);
    expect(compareDecimals(decimal("1.0"), decimal("1"))).toBe(0);
    expect(compareDecimals(decimal("0"), decimal("-0.5"))).toBe(1);
    expect(compareDecimals(decimal("1e400"), decimal("99"))).toBe(1);
    expect(compareDecimals(decimal("123"), decimal("1.23e2"))).toBe(0);
  });
});

describe("isMultipleOf", () => {
  test("is exact for decimal fractions", () => {
    expect(isMultipleOf(toDecimal(0.3), toDecimal(0.1))).toBe(true);
    expect(isMultipleOf(toDecimal(4.35), toDecimal(0.05))).toBe(true);
    expect(isMultipleOf(toDecimal(0.35), toDecimal(0.1))).toBe(false);
    expect(isMultipleOf(toDecimal(-9), toDecimal(3))).toBe(true);
    expect(isMultipleOf(toDecimal(10), toDecimal(2.5))).toBe(true);
    expect(isMultipleOf(toDecimal(7), toDecimal(2))).toBe(false);
    expect(isMultipleOf(toDecimal(0), toDecimal(0.01))).toBe(true);
  });

  test("is exact beyond double precision", () => {
    expect(isMultipleOf(decimal("9007199254740993"), decimal("2"))).toBe(false);
    expect(isMultipleOf(decimal("9007199254740994"), decimal("2"))).toBe(true);
    expect(isMultipleOf(decimal("1e400"), decimal("3"))).toBe(false);
    expect(isMultipleOf(decimal("1e400"), decimal("0.0025"))).toBe(true);
  });

  test("a divisor larger than the value", () => {
    expect(isMultipleOf(decimal("5"), decimal("10"))).toBe(false);
    expect(isMultipleOf(decimal("-5"), decimal("10"))).toBe(false);
  });

  test("rejects a zero divisor", () => {
    expect(() => isMultipleOf(toDecimal(1), toDecimal(0))).toThrow(RangeError);
  });
});

describe("formatDecimal", () => {
  test("prints like a JavaScript number", () => {
    for (const value of [0, 1, -12.5, 0.01, 1e-7, 1.5e21, 123456789, 0.000001]) {
      expect(formatDecimal(toDecimal(value))).toBe(String(value));
    }
  });

  test("prints digits a double would drop", () => {
    expect(formatDecimal(decimal("9007199254740993"))).toBe("9007199254740993");
    expect(formatDecimal(decimal("0.10000000000000000001")))
      .toBe("0.10000000000000000001");
  });
});
