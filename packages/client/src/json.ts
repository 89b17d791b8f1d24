import { Decimal } from "decimal.js";
import { isInteger, isSafeNumber, parse, stringify } from "lossless-json";
import { DECIMAL_PLACES } from "./constants.js";

/**
 * Number literals with a fraction or exponent become Decimal so amounts
 * never pass through a binary float. Integers stay numbers while they fit
 * a double exactly, and become bigint beyond that.
 */
export function parseNumber(value: string): number | bigint | Decimal {
  if (!isInteger(value)) {
    return new Decimal(value);
  }
  return isSafeNumber(value) ? Number(value) : BigInt(value);
}

/**
 * Format a decimal as a plain JSON number literal, rounded half-even
 */
export function formatDecimal(value: Decimal): string {
  return value.toDecimalPlaces(DECIMAL_PLACES, Decimal.ROUND_HALF_EVEN).toFixed();
}

const numberStringifiers = [
  {
    test: (value: unknown) => Decimal.isDecimal(value),
    stringify: (value: unknown) =>
      Decimal.isDecimal(value) ? formatDecimal(value) : String(value),
  },
];

/**
 * Parse JSON text with the decimal-preserving number parser.
 * Throws on malformed input.
 */
export function decodeJson(text: string): unknown {
  return parse(text, null, parseNumber);
}

/**
 * Serialize a value to JSON, writing Decimal and bigint as number literals.
 * Anything JSON cannot represent exactly is rejected with a TypeError.
 */
export function encodeJson(value: unknown, space?: number): string {
  assertEncodable(value);
  const text = stringify(value, undefined, space, numberStringifiers);
  if (text === undefined) {
    throw new TypeError(`${describeValue(value)} is not JSON serializable`);
  }
  return text;
}

function assertEncodable(value: unknown): void {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new TypeError(`${describeValue(value)} is not JSON serializable`);
    }
    return;
  }

  if (Decimal.isDecimal(value)) {
    if (!value.isFinite()) {
      throw new TypeError(`${describeValue(value)} is not JSON serializable`);
    }
    return;
  }

  if (Array.isArray(value)) {
    for (const item of value) {
      assertEncodable(item);
    }
    return;
  }

  if (isPlainObject(value)) {
    for (const item of Object.values(value)) {
      // Undefined members are dropped, as JSON.stringify does
      if (item !== undefined) {
        assertEncodable(item);
      }
    }
    return;
  }

  throw new TypeError(`${describeValue(value)} is not JSON serializable`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeValue(value: unknown): string {
  if (Decimal.isDecimal(value)) {
    return `Decimal(${value.toString()})`;
  }
  if (typeof value === "object" || typeof value === "function") {
    return Object.prototype.toString.call(value);
  }
  return String(value);
}
