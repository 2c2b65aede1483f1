/**
 * Lower/upper limits shared by minimum/maximum, minLength/maxLength,
 * minItems/maxItems and minProperties/maxProperties. All of them are
 * inclusive unless exclusiveMinimum / exclusiveMaximum is true.
 */

import {
  compareDecimals,
  type Decimal,
  decimalToNumber,
  formatDecimal,
  integerDecimal,
} from "../decimal.ts";
import type { SchemaNode } from "../schema-node.ts";
import type { Keyword } from "../types.ts";
import type { KeywordContext } from "./context.ts";

export interface Bounds {
  lower?: Decimal;
  upper?: Decimal;
  exclusiveLower: boolean;
  exclusiveUpper: boolean;
}

export interface BoundKeywords {
  lower: Keyword;
  upper: Keyword;
  /** "characters", "items", ...; absent for plain numeric ranges */
  unit?: string;
}

export function readBounds(node: SchemaNode, keywords: BoundKeywords): Bounds {
  const read = (keyword: Keyword) =>
    keywords.unit === undefined ? node.number(keyword) : node.count(keyword);

  return {
    lower: read(keywords.lower),
    upper: read(keywords.upper),
    exclusiveLower: node.boolean("exclusiveMinimum") ?? false,
    exclusiveUpper: node.boolean("exclusiveMaximum") ?? false,
  };
}

function describeLower(bound: Decimal, exclusive: boolean, unit?: string) {
  const limit = formatDecimal(bound);
  if (unit === undefined) return `must be ${exclusive ? ">" : ">="} ${limit}`;
  return exclusive
    ? `must have more than ${limit} ${unit}`
    : `must NOT have fewer than ${limit} ${unit}`;
}

function describeUpper(bound: Decimal, exclusive: boolean, unit?: string) {
  const limit = formatDecimal(bound);
  if (unit === undefined) return `must be ${exclusive ? "<" : "<="} ${limit}`;
  return exclusive
    ? `must have fewer than ${limit} ${unit}`
    : `must NOT have more than ${limit} ${unit}`;
}

export function checkBounds(
  actual: Decimal,
  bounds: Bounds,
  keywords: BoundKeywords,
  ctx: KeywordContext,
): void {
  const { lower, upper, exclusiveLower, exclusiveUpper } = bounds;

  if (
    lower !== undefined &&
    compareDecimals(actual, lower) < (exclusiveLower ? 1 : 0)
  ) {
    ctx.report(
      keywords.lower,
      describeLower(lower, exclusiveLower, keywords.unit),
      {
        comparison: exclusiveLower ? ">" : ">=",
        limit: decimalToNumber(lower),
        exclusive: exclusiveLower,
      },
    );
  }

  if (
    upper !== undefined &&
    compareDecimals(actual, upper) > (exclusiveUpper ? -1 : 0)
  ) {
    ctx.report(
      keywords.upper,
      describeUpper(upper, exclusiveUpper, keywords.unit),
      {
        comparison: exclusiveUpper ? "<" : "<=",
        limit: decimalToNumber(upper),
        exclusive: exclusiveUpper,
      },
    );
  }
}

/** Bounds on a length or a number of items or properties */
export function checkCount(
  actual: number,
  bounds: Bounds,
  keywords: BoundKeywords,
  ctx: KeywordContext,
): void {
  checkBounds(integerDecimal(BigInt(actual)), bounds, keywords, ctx);
}
