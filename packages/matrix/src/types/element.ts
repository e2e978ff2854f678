/**
 * Element - Arbitrary Precision Matrix Entries
 *
 * Decimal arithmetic using bigint storage with explicit scale.
 * Value = unscaled * 10^(-scale)
 *
 * Results are rounded (half-even) to a number of significant digits, 28 by
 * default, so that long elimination chains keep a bounded size. Native numbers
 * are converted through their shortest decimal string, never through their
 * binary expansion, so `element(0.1)` is exactly one tenth.
 *
 * @example
 * ```typescript
 * const a = element(0.1);            // unscaled=1, scale=1
 * const b = parseElement("0.2");     // unscaled=2, scale=1
 * toString(add(a, b));               // "0.3"
 * toString(div(element(1), element(3))); // "0.3333333333333333333333333333"
 * ```
 */

import type { Fractional, Numeric, Ord, Ordering, Show } from "@decimatrix/core";
import { makeOrd } from "@decimatrix/core";
import { TypeMismatch } from "../errors.js";
import type { Tolerance } from "../tolerance.js";

/**
 * Arbitrary precision decimal number.
 * value = unscaled * 10^(-scale)
 *
 * @example
 * - { unscaled: 123n, scale: 0 } = 123
 * - { unscaled: 123n, scale: 2 } = 1.23
 * - { unscaled: -456n, scale: 3 } = -0.456
 */
export interface Element {
  readonly unscaled: bigint;
  readonly scale: number;
}

/** Values accepted wherever a matrix entry is expected. */
export type Real = number | bigint | Element;

/** Significant digits kept by arithmetic unless told otherwise. */
export const DEFAULT_PRECISION = 28;

export const ZERO: Element = { unscaled: 0n, scale: 0 };
export const ONE: Element = { unscaled: 1n, scale: 0 };

// ============================================================================
// Construction
// ============================================================================

export function isElement(value: unknown): value is Element {
  return (
    typeof value === "object" &&
    value !== null &&
    "unscaled" in value &&
    typeof value.unscaled === "bigint" &&
    "scale" in value &&
    typeof value.scale === "number"
  );
}

/**
 * Check that a value is a real number usable as a matrix entry.
 * NaN and the infinities are not.
 */
export function isReal(value: unknown): value is Real {
  return (
    (typeof value === "number" && Number.isFinite(value)) ||
    typeof value === "bigint" ||
    isElement(value)
  );
}

/**
 * Convert a real number to an Element.
 *
 * @throws TypeMismatch for anything that is not a finite real number
 */
export function element(value: Real): Element {
  if (!isReal(value)) {
    throw new TypeMismatch("Matrix elements can only be real numbers.");
  }
  if (typeof value === "bigint") {
    return { unscaled: value, scale: 0 };
  }
  if (typeof value === "number") {
    return fromNumber(value);
  }
  return value;
}

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse an Element from a string like "123.456", "-0.001" or "1e-5".
 *
 * @throws TypeMismatch if the string is not a decimal literal
 */
export function parseElement(text: string): Element {
  let s = text.trim();
  if (!DECIMAL_LITERAL.test(s)) {
    throw new TypeMismatch(`'${text}' is not a decimal number.`);
  }

  // Handle scientific notation
  const eIndex = s.toLowerCase().indexOf("e");
  if (eIndex !== -1) {
    const exponent = parseInt(s.slice(eIndex + 1), 10);
    const base = parseElement(s.slice(0, eIndex));
    return normalize({ unscaled: base.unscaled, scale: base.scale - exponent });
  }

  const negative = s.startsWith("-");
  if (negative || s.startsWith("+")) {
    s = s.slice(1);
  }

  const dotIndex = s.indexOf(".");
  let unscaled: bigint;
  let scale: number;

  if (dotIndex === -1) {
    unscaled = BigInt(s);
    scale = 0;
  } else {
    const intPart = s.slice(0, dotIndex);
    const fracPart = s.slice(dotIndex + 1);
    unscaled = BigInt(intPart + fracPart);
    scale = fracPart.length;
  }

  return normalize({ unscaled: negative ? -unscaled : unscaled, scale });
}

/**
 * Integral numbers convert exactly; fractional ones go through their
 * shortest round-trip decimal string.
 */
function fromNumber(n: number): Element {
  if (Number.isInteger(n)) {
    return { unscaled: BigInt(n), scale: 0 };
  }
  return parseElement(n.toString());
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert an Element to a JavaScript number.
 * May lose precision.
 */
export function toNumber(e: Element): number {
  return Number(toString(e));
}

/**
 * Plain decimal notation without trailing fractional zeros.
 */
export function toString(e: Element): string {
  return formatWithScale(normalize(e));
}

function formatWithScale(e: Element): string {
  if (e.scale <= 0) {
    if (e.unscaled === 0n) return "0";
    return e.unscaled.toString() + "0".repeat(-e.scale);
  }

  const negative = e.unscaled < 0n;
  const absStr = (negative ? -e.unscaled : e.unscaled).toString();

  if (absStr.length <= e.scale) {
    const leadingZeros = "0".repeat(e.scale - absStr.length);
    return (negative ? "-" : "") + "0." + leadingZeros + absStr;
  }

  const intPart = absStr.slice(0, absStr.length - e.scale);
  const fracPart = absStr.slice(absStr.length - e.scale);
  return (negative ? "-" : "") + intPart + "." + fracPart;
}

// ============================================================================
// Scale Handling
// ============================================================================

/**
 * Remove trailing zeros from the fractional part.
 */
function normalize(e: Element): Element {
  if (e.unscaled === 0n) {
    return ZERO;
  }

  let unscaled = e.unscaled;
  let scale = e.scale;

  while (scale > 0 && unscaled % 10n === 0n) {
    unscaled /= 10n;
    scale--;
  }

  return { unscaled, scale };
}

function setScale(e: Element, newScale: number): Element {
  if (newScale === e.scale) {
    return e;
  }

  if (newScale > e.scale) {
    const factor = 10n ** BigInt(newScale - e.scale);
    return { unscaled: e.unscaled * factor, scale: newScale };
  }

  return round(e, newScale);
}

/**
 * Align two Elements to the same scale (the larger of the two).
 */
function alignScales(a: Element, b: Element): [Element, Element] {
  const maxScale = Math.max(a.scale, b.scale);
  return [setScale(a, maxScale), setScale(b, maxScale)];
}

function digitCount(n: bigint): number {
  return (n < 0n ? -n : n).toString().length;
}

/**
 * Round to a number of decimal places, half to even.
 * Negative places round to tens, hundreds, …
 */
export function round(e: Element, places: number): Element {
  if (places >= e.scale) {
    return e;
  }

  const divisor = 10n ** BigInt(e.scale - places);
  let quotient = e.unscaled / divisor;
  const remainder = e.unscaled % divisor;

  if (remainder !== 0n) {
    const negative = e.unscaled < 0n;
    const absRemainder = remainder < 0n ? -remainder : remainder;
    const halfDivisor = divisor / 2n;

    if (absRemainder > halfDivisor || (absRemainder === halfDivisor && quotient % 2n !== 0n)) {
      quotient += negative ? -1n : 1n;
    }
  }

  return { unscaled: quotient, scale: places };
}

/**
 * Round to a number of significant digits, half to even.
 */
export function roundToPrecision(e: Element, precision: number): Element {
  const digits = digitCount(e.unscaled);
  if (digits <= precision) {
    return e;
  }
  return normalize(round(e, e.scale - (digits - precision)));
}

// ============================================================================
// Arithmetic
// ============================================================================

export function add(a: Element, b: Element, precision = DEFAULT_PRECISION): Element {
  const [aa, bb] = alignScales(a, b);
  return roundToPrecision(
    normalize({ unscaled: aa.unscaled + bb.unscaled, scale: aa.scale }),
    precision
  );
}

export function sub(a: Element, b: Element, precision = DEFAULT_PRECISION): Element {
  const [aa, bb] = alignScales(a, b);
  return roundToPrecision(
    normalize({ unscaled: aa.unscaled - bb.unscaled, scale: aa.scale }),
    precision
  );
}

export function mul(a: Element, b: Element, precision = DEFAULT_PRECISION): Element {
  return roundToPrecision(
    normalize({ unscaled: a.unscaled * b.unscaled, scale: a.scale + b.scale }),
    precision
  );
}

/**
 * Divide two Elements, keeping `precision` significant digits.
 *
 * @throws RangeError on division by zero
 */
export function div(a: Element, b: Element, precision = DEFAULT_PRECISION): Element {
  if (b.unscaled === 0n) {
    throw new RangeError("Element division by zero");
  }
  if (a.unscaled === 0n) {
    return ZERO;
  }

  // Two guard digits beyond the requested precision.
  const shift = precision + 2 + digitCount(b.unscaled) - digitCount(a.unscaled);
  const scale = shift + a.scale - b.scale;

  let dividend = a.unscaled;
  let divisor = b.unscaled;
  if (shift >= 0) {
    dividend *= 10n ** BigInt(shift);
  } else {
    divisor *= 10n ** BigInt(-shift);
  }

  let quotient = dividend / divisor;
  let resultScale = scale;

  // A non-zero remainder becomes a trailing 1 so that rounding never
  // mistakes an inexact quotient for an exact half.
  if (dividend % divisor !== 0n) {
    const negative = dividend < 0n !== divisor < 0n;
    quotient = quotient * 10n + (negative ? -1n : 1n);
    resultScale += 1;
  }

  return roundToPrecision(normalize({ unscaled: quotient, scale: resultScale }), precision);
}

export function negate(e: Element): Element {
  return { unscaled: -e.unscaled, scale: e.scale };
}

export function abs(e: Element): Element {
  return e.unscaled < 0n ? negate(e) : e;
}

// ============================================================================
// Comparison
// ============================================================================

export function compare(a: Element, b: Element): Ordering {
  const [aa, bb] = alignScales(a, b);
  return aa.unscaled < bb.unscaled ? -1 : aa.unscaled > bb.unscaled ? 1 : 0;
}

/**
 * Check if two Elements are equal in value.
 */
export function equals(a: Element, b: Element): boolean {
  return compare(a, b) === 0;
}

export function isZero(e: Element): boolean {
  return e.unscaled === 0n;
}

export function isNegative(e: Element): boolean {
  return e.unscaled < 0n;
}

/**
 * Check if an Element represents an integer.
 */
export function isInteger(e: Element): boolean {
  return normalize(e).scale <= 0;
}

// ============================================================================
// Tolerance
// ============================================================================

/**
 * Whether the magnitude of a value is below the tolerance, i.e. treated as zero.
 */
export function isNegligible(e: Element, tol: Tolerance): boolean {
  return compare(abs(e), tol.epsilon) < 0;
}

/**
 * Snap a value to its nearest integer when it lies within the tolerance of it.
 * Values close to zero become exactly zero.
 */
export function snap(e: Element, tol: Tolerance): Element {
  if (e.scale <= 0) {
    return e;
  }
  const nearest = round(e, 0);
  return isNegligible(sub(e, nearest, tol.precision), tol) ? normalize(nearest) : e;
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Numeric instance for Element, at the default precision.
 */
export const numericElement: Numeric<Element> = {
  add: (a, b) => add(a, b),
  sub: (a, b) => sub(a, b),
  mul: (a, b) => mul(a, b),
  negate,
  abs,
  signum: (a) => ({ unscaled: a.unscaled < 0n ? -1n : a.unscaled > 0n ? 1n : 0n, scale: 0 }),
  fromNumber: (n) => element(n),
  toNumber,
  zero: () => ZERO,
  one: () => ONE,
};

/**
 * Fractional instance for Element, at the default precision.
 */
export const fractionalElement: Fractional<Element> = {
  div: (a, b) => div(a, b),
  recip: (a) => div(ONE, a),
  fromRational: (num, den) => div(element(num), element(den)),
};

export const ordElement: Ord<Element> = makeOrd(compare);

export const showElement: Show<Element> = {
  show: toString,
};
