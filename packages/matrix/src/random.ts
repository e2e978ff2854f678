/**
 * Matrices of random elements.
 *
 * Both generators draw from `Math.random` unless given another source, which
 * must return numbers in [0, 1).
 */

import { TypeMismatch } from "./errors.js";
import { Matrix } from "./matrix.js";
import { checkDimension } from "./store.js";
import { add, element } from "./types/element.js";
import type { Element } from "./types/element.js";

export type RandomSource = () => number;

/** Integers from `min` (inclusive) to `max` (exclusive) */
export interface IntRange {
  min: number;
  max: number;
}

function checkRange(min: number, max: number): void {
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new TypeMismatch("The bounds of the range must be integers.");
  }
  if (max <= min) {
    throw new RangeError("The given range is empty.");
  }
}

function randint(min: number, max: number, random: RandomSource): number {
  return min + Math.floor(random() * (max - min));
}

function generate(nrow: number, ncol: number, next: () => Element): Matrix {
  checkDimension(nrow, "nrow");
  checkDimension(ncol, "ncol");
  return new Matrix(
    Array.from({ length: nrow }, () => Array.from({ length: ncol }, next))
  );
}

/**
 * A matrix of random integers.
 *
 * @throws InvalidDimension for dimensions below 1
 * @throws RangeError if the range is empty
 */
export function randintMatrix(
  nrow: number,
  ncol: number,
  range: IntRange,
  random: RandomSource = Math.random
): Matrix {
  checkRange(range.min, range.max);
  return generate(nrow, ncol, () => element(randint(range.min, range.max, random)));
}

/**
 * A matrix of random decimals, each a random integer from [start, stop)
 * plus a random fraction.
 *
 * @throws InvalidDimension for dimensions below 1
 * @throws RangeError if the range is empty
 */
export function randomMatrix(
  nrow: number,
  ncol: number,
  start: number,
  stop: number,
  random: RandomSource = Math.random
): Matrix {
  checkRange(start, stop);
  return generate(nrow, ncol, () =>
    add(element(randint(start, stop, random)), element(random()))
  );
}
