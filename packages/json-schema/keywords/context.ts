import { appendPointer, formatPointer } from "@treecheck/json-pointer";
import type { SchemaNode } from "../schema-node.ts";
import type { Keyword, PathSegment, ValidationError } from "../types.ts";
import type { Value } from "../value.ts";

/**
 * Evaluates one instance node against one schema node, appending to errors.
 */
export type NodeWalker = (
  instance: Value,
  schema: SchemaNode,
  path: readonly PathSegment[],
  errors: ValidationError[],
) => void;

/**
 * What a keyword validator sees of the walk: the schema node it belongs to,
 * where the instance sits, and how to report or recurse.
 */
export class KeywordContext {
  constructor(
    readonly node: SchemaNode,
    readonly path: readonly PathSegment[],
    private readonly errors: ValidationError[],
    private readonly walk: NodeWalker,
  ) {}

  report(
    keyword: Keyword,
    message: string,
    params: Record<string, unknown> = {},
    segment?: PathSegment,
  ): void {
    const path = segment === undefined
      ? [...this.path]
      : [...this.path, segment];
    this.errors.push({
      path,
      instancePath: formatPointer(path),
      schemaPath: appendPointer(this.node.pointer, keyword),
      keyword,
      message,
      params,
    });
  }

  /**
   * Recurse into a sub-schema; its errors join this node's result.
   */
  descend(instance: Value, schema: SchemaNode, segment?: PathSegment): void {
    const path = segment === undefined ? this.path : [...this.path, segment];
    this.walk(instance, schema, path, this.errors);
  }

  /**
   * Evaluate a sub-schema in isolation, at the current path, and hand back
   * its errors without recording them.
   */
  evaluate(instance: Value, schema: SchemaNode): ValidationError[] {
    const errors: ValidationError[] = [];
    this.walk(instance, schema, this.path, errors);
    return errors;
  }
}
