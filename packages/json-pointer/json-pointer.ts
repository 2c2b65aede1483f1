/**
 * JSON Pointer implementation following RFC 6901
 * https://tools.ietf.org/html/rfc6901
 */

export class JsonPointerError extends Error {
  constructor(message: string, public pointer: string) {
    super(message);
    this.name = "JsonPointerError";
  }
}

/** A pointer segment before escaping: a property name or an array index */
export type PointerSegment = string | number;

/**
 * Validate that a string is a valid RFC 6901 array index.
 * Valid indices: "0", "1", "12", "123", etc.
 * Invalid: "01" (leading zero), "1.5" (decimal), "-1" (negative), " 1" (spaces)
 */
export function isValidArrayIndex(segment: string): boolean {
  return /^(0|[1-9][0-9]*)$/.test(segment);
}

/**
 * Parse a JSON Pointer string into an array of path segments
 */
export function parsePointer(pointer: string): string[] {
  if (pointer === "") {
    return [];
  }

  if (!pointer.startsWith("/")) {
    throw new JsonPointerError(
      "JSON Pointer must start with '/' or be empty string",
      pointer,
    );
  }

  return pointer
    .slice(1)
    .split("/")
    .map(unescapeSegment);
}

/**
 * Escape a path segment according to RFC 6901
 */
export function escapeSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Unescape a path segment according to RFC 6901.
 * Only ~0 and ~1 are escapes; percent sequences stay literal.
 */
export function unescapeSegment(segment: string): string {
  // ~1 must be replaced before ~0
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Convert path segments to a JSON Pointer string. Numeric segments are
 * written as array indices.
 */
export function formatPointer(segments: readonly PointerSegment[]): string {
  if (segments.length === 0) {
    return "";
  }
  return "/" +
    segments.map((segment) => escapeSegment(String(segment))).join("/");
}

/**
 * Append segments to an existing pointer, e.g. a "#" prefixed schema pointer.
 */
export function appendPointer(
  base: string,
  ...segments: PointerSegment[]
): string {
  return base + formatPointer(segments);
}
