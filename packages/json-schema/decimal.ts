/**
 * Exact decimal numbers.
 *
 * Every number in a value tree is kept as the decimal the document author
 * wrote: a BigInt coefficient and a power of ten. Comparison, equality and
 * divisibility never go through a double, so 9007199254740993 stays distinct
 * from 9007199254740992 and 0.3 is divisible by 0.1.
 */

/** value = coefficient * 10^exponent, with no trailing zeros in coefficient */
export interface Decimal {
  readonly coefficient: bigint;
  readonly exponent: number;
}

// JSON and YAML notations: "+1", ".5", "1.", "1E3" are all accepted
const DECIMAL_TEXT = /^([-+]?)(\d*)(?:\.(\d*))?(?:[eE]([-+]?\d+))?$/;

const ZERO: Decimal = { coefficient: 0n, exponent: 0 };

function normalize(coefficient: bigint, exponent: number): Decimal {
  if (coefficient === 0n) return ZERO;
  while (coefficient % 10n === 0n) {
    coefficient /= 10n;
    exponent++;
  }
  return { coefficient, exponent };
}

/**
 * Read a number literal. Returns undefined for anything that is not a
 * finite decimal (".inf", "0x1F", "").
 */
export function parseDecimal(text: string): Decimal | undefined {
  const match = DECIMAL_TEXT.exec(text);
  if (!match) return undefined;

  const integerDigits = match[2] ?? "";
  const fractionDigits = match[3] ?? "";
  const digits = integerDigits + fractionDigits;
  if (digits === "") return undefined;

  const exponent = Number(match[4] ?? "0") - fractionDigits.length;
  if (!Number.isSafeInteger(exponent)) return undefined;

  const magnitude = BigInt(digits);
  return normalize(match[1] === "-" ? -magnitude : magnitude, exponent);
}

/**
 * The decimal a double prints as, which is the literal that produced it.
 */
export function toDecimal(value: number): Decimal {
  if (!Number.isFinite(value)) {
    throw new RangeError(`${value} has no decimal expansion`);
  }
  const decimal = parseDecimal(String(value));
  if (!decimal) {
    throw new RangeError(`Unexpected number text: ${String(value)}`);
  }
  return decimal;
}

export function integerDecimal(value: bigint): Decimal {
  return normalize(value, 0);
}

export function isIntegerDecimal(decimal: Decimal): boolean {
  return decimal.exponent >= 0;
}

function digitCount(coefficient: bigint): number {
  return (coefficient < 0n ? -coefficient : coefficient).toString().length;
}

function signOf(coefficient: bigint): -1 | 0 | 1 {
  if (coefficient === 0n) return 0;
  return coefficient < 0n ? -1 : 1;
}

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

function compareMagnitudes(a: Decimal, b: Decimal): -1 | 0 | 1 {
  // Position of the leading digit decides unless both start at the same one
  const leadA = digitCount(a.coefficient) + a.exponent;
  const leadB = digitCount(b.coefficient) + b.exponent;
  if (leadA !== leadB) return leadA < leadB ? -1 : 1;

  const exponent = Math.min(a.exponent, b.exponent);
  const scaledA = abs(a.coefficient) * 10n ** BigInt(a.exponent - exponent);
  const scaledB = abs(b.coefficient) * 10n ** BigInt(b.exponent - exponent);
  if (scaledA === scaledB) return 0;
  return scaledA < scaledB ? -1 : 1;
}

export function compareDecimals(a: Decimal, b: Decimal): -1 | 0 | 1 {
  const signA = signOf(a.coefficient);
  const signB = signOf(b.coefficient);
  if (signA !== signB) return signA < signB ? -1 : 1;
  if (signA === 0) return 0;

  return signA > 0 ? compareMagnitudes(a, b) : compareMagnitudes(b, a);
}

function powerOfTenModulo(exponent: number, modulus: bigint): bigint {
  let result = 1n % modulus;
  let base = 10n % modulus;
  let remaining = BigInt(exponent);
  while (remaining > 0n) {
    if (remaining & 1n) result = (result * base) % modulus;
    base = (base * base) % modulus;
    remaining >>= 1n;
  }
  return result;
}

/**
 * True when value / divisor is an integer, computed without rounding.
 */
export function isMultipleOf(value: Decimal, divisor: Decimal): boolean {
  if (divisor.coefficient === 0n) {
    throw new RangeError("Divisor must not be zero");
  }
  if (value.coefficient === 0n) return true;
  if (compareMagnitudes(value, divisor) < 0) return false;

  // Both scaled to the smaller exponent; the divisor's shift is bounded by
  // the value's digit count since |value| >= |divisor|
  const exponent = Math.min(value.exponent, divisor.exponent);
  const modulus = abs(divisor.coefficient) *
    10n ** BigInt(divisor.exponent - exponent);
  const remainder = (abs(value.coefficient) % modulus) *
    powerOfTenModulo(value.exponent - exponent, modulus);
  return remainder % modulus === 0n;
}

/**
 * Decimal text laid out the way JavaScript prints numbers: plain notation
 * from 1e-7 up to 1e21, exponent notation outside.
 */
export function formatDecimal(decimal: Decimal): string {
  if (decimal.coefficient === 0n) return "0";

  const sign = decimal.coefficient < 0n ? "-" : "";
  const digits = abs(decimal.coefficient).toString();
  const point = digits.length + decimal.exponent;

  if (decimal.exponent >= 0 && point <= 21) {
    return sign + digits + "0".repeat(decimal.exponent);
  }
  if (point > 0 && point <= 21) {
    return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  if (point > -6 && point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }

  const mantissa = digits.length === 1
    ? digits
    : `${digits[0] ?? ""}.${digits.slice(1)}`;
  const power = point - 1;
  return `${sign}${mantissa}e${power < 0 ? "-" : "+"}${Math.abs(power)}`;
}

/** Nearest double, for output that must be a plain JSON number */
export function decimalToNumber(decimal: Decimal): number {
  return Number(formatDecimal(decimal));
}
