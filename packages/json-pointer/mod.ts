/**
 * JSON Pointer utilities for instance and schema locations
 */

export {
  appendPointer,
  escapeSegment,
  formatPointer,
  isValidArrayIndex,
  JsonPointerError,
  parsePointer,
  type PointerSegment,
  unescapeSegment,
} from "./json-pointer.ts";
