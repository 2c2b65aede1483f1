import type { CompiledPattern, SchemaNode } from "../schema-node.ts";
import type { StringValue } from "../value.ts";
import { type BoundKeywords, type Bounds, checkCount, readBounds } from "./bounds.ts";
import type { KeywordContext } from "./context.ts";

const LENGTH: BoundKeywords = {
  lower: "minLength",
  upper: "maxLength",
  unit: "characters",
};

export interface StringKeywords {
  length: Bounds;
  pattern?: CompiledPattern;
  format?: CompiledPattern;
}

export function readStringKeywords(node: SchemaNode): StringKeywords {
  return {
    length: readBounds(node, LENGTH),
    pattern: node.pattern(),
    format: node.format(),
  };
}

/**
 * Length is counted in code points, so an emoji outside the BMP is one
 * character, not two UTF-16 units.
 */
export function codePointLength(value: string): number {
  return [...value].length;
}

export function checkString(
  instance: StringValue,
  keywords: StringKeywords,
  ctx: KeywordContext,
): void {
  checkCount(codePointLength(instance.value), keywords.length, LENGTH, ctx);

  // Unanchored: a match anywhere in the string is enough
  const { pattern, format } = keywords;
  if (pattern && !pattern.regex.test(instance.value)) {
    ctx.report("pattern", `must match pattern "${pattern.source}"`, {
      pattern: pattern.source,
    });
  }

  if (format && !format.regex.test(instance.value)) {
    ctx.report("format", `must match format "${format.source}"`, {
      format: format.source,
    });
  }
}
