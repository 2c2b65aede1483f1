export { parseDocument, parseDocumentFromFile } from "./parser.ts";
export type { DocumentFormat, ParseOptions } from "./parser.ts";
export { ParseError } from "./errors.ts";
