// Validation
export {
  SchemaValidator,
  validate,
  validateJson,
} from "./validator.ts";
export type { ValidatorOptions } from "./validator.ts";
export { checkSchema } from "./schema-checker.ts";

// Value model
export {
  booleanValue,
  deepEqual,
  fromJson,
  locate,
  mappingValue,
  nullValue,
  numberValue,
  selectValue,
  sequenceValue,
  stringValue,
  toJson,
  typeName,
} from "./value.ts";
export type {
  BooleanValue,
  JsonValue,
  MappingValue,
  NullValue,
  NumberValue,
  Selection,
  SequenceValue,
  StringValue,
  Value,
  ValueKind,
} from "./value.ts";

// Formats
export { knownFormats, lookupFormat } from "./formats.ts";

// Exact decimals
export {
  compareDecimals,
  decimalToNumber,
  formatDecimal,
  isMultipleOf,
  parseDecimal,
  toDecimal,
} from "./decimal.ts";
export type { Decimal } from "./decimal.ts";

// Errors
export {
  ConfigurationError,
  InstanceValidationError,
  ValueConversionError,
} from "./errors.ts";

// Types
export { KEYWORDS, SCHEMA_TYPES } from "./types.ts";
export type {
  Keyword,
  Path,
  PathSegment,
  SchemaType,
  ValidationError,
  ValidationResult,
} from "./types.ts";
