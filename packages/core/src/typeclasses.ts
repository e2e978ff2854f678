/**
 * Typeclass interfaces shared by the decimatrix packages.
 *
 * Instances are plain objects; pass them explicitly to generic helpers.
 */

// ============================================================================
// Eq / Ord
// ============================================================================

export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export type Ordering = -1 | 0 | 1;

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

/**
 * Build a full Ord instance from a compare function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    compare,
    equals: (a, b) => compare(a, b) === EQ,
    notEquals: (a, b) => compare(a, b) !== EQ,
    lessThan: (a, b) => compare(a, b) === LT,
    lessThanOrEqual: (a, b) => compare(a, b) !== GT,
    greaterThan: (a, b) => compare(a, b) === GT,
    greaterThanOrEqual: (a, b) => compare(a, b) !== LT,
  };
}

// ============================================================================
// Ring / Numeric / Fractional
// ============================================================================

/**
 * Addition and multiplication with identities. Multiplication need not commute.
 */
export interface Ring<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  negate(a: A): A;
  zero(): A;
  one(): A;
}

export interface Numeric<A> extends Ring<A> {
  abs(a: A): A;
  signum(a: A): A;
  fromNumber(n: number): A;
  toNumber(a: A): number;
}

export interface Fractional<A> {
  div(a: A, b: A): A;
  recip(a: A): A;
  fromRational(num: number, den: number): A;
}

/**
 * Sum a sequence with a Ring instance.
 */
export function sumWith<A>(values: Iterable<A>, N: Ring<A>): A {
  let total = N.zero();
  for (const value of values) {
    total = N.add(total, value);
  }
  return total;
}

/**
 * Multiply a sequence, left to right, with a Ring instance.
 */
export function productWith<A>(values: Iterable<A>, N: Ring<A>): A {
  let total = N.one();
  for (const value of values) {
    total = N.mul(total, value);
  }
  return total;
}

// ============================================================================
// Show
// ============================================================================

export interface Show<A> {
  show(a: A): string;
}
