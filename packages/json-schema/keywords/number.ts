import {
  type Decimal,
  decimalToNumber,
  formatDecimal,
  isMultipleOf,
} from "../decimal.ts";
import type { SchemaNode } from "../schema-node.ts";
import { type NumberValue, numberValue } from "../value.ts";
import { type BoundKeywords, type Bounds, checkBounds, readBounds } from "./bounds.ts";
import type { KeywordContext } from "./context.ts";

const RANGE: BoundKeywords = { lower: "minimum", upper: "maximum" };

export interface NumberKeywords {
  range: Bounds;
  divisibleBy?: Decimal;
}

export function readNumberKeywords(node: SchemaNode): NumberKeywords {
  const divisibleBy = node.number("divisibleBy");
  if (divisibleBy !== undefined && divisibleBy.coefficient <= 0n) {
    throw node.malformed(
      "divisibleBy",
      "a number greater than 0",
      numberValue(divisibleBy),
    );
  }

  return { range: readBounds(node, RANGE), divisibleBy };
}

export function checkNumber(
  instance: NumberValue,
  keywords: NumberKeywords,
  ctx: KeywordContext,
): void {
  checkBounds(instance.value, keywords.range, RANGE, ctx);

  const { divisibleBy } = keywords;
  if (divisibleBy !== undefined && !isMultipleOf(instance.value, divisibleBy)) {
    ctx.report("divisibleBy", `must be divisible by ${formatDecimal(divisibleBy)}`, {
      divisibleBy: decimalToNumber(divisibleBy),
    });
  }
}
