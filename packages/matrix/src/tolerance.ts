/**
 * Rounding tolerance.
 *
 * A round limit L (decimal places) defines negligibility: any magnitude below
 * 10^-L is zero, and any value within 10^-L of an integer is that integer.
 * Operations take the limit as an explicit option and thread one Tolerance
 * value through every step, so computations with different limits cannot
 * interfere. Missing options fall back to the configured defaults.
 */

import { config } from "@decimatrix/core";
import type { Element } from "./types/element.js";

export interface Tolerance {
  /** Decimal places after which figures are insignificant */
  readonly roundLimit: number;
  /** Significant digits kept by arithmetic */
  readonly precision: number;
  /** 10^-roundLimit */
  readonly epsilon: Element;
}

/**
 * Per-call overrides accepted by every operation that rounds.
 */
export interface ToleranceOptions {
  roundLimit?: number;
  precision?: number;
}

export function tolerance(roundLimit: number, precision: number): Tolerance {
  if (!Number.isInteger(roundLimit) || roundLimit < 0) {
    throw new RangeError(`roundLimit must be a non-negative integer, got ${roundLimit}`);
  }
  if (!Number.isInteger(precision) || precision < 1) {
    throw new RangeError(`precision must be a positive integer, got ${precision}`);
  }
  return { roundLimit, precision, epsilon: { unscaled: 1n, scale: roundLimit } };
}

/**
 * Resolve the tolerance for one operation.
 */
export function resolveTolerance(options: ToleranceOptions = {}): Tolerance {
  return tolerance(
    options.roundLimit ?? config.get("roundLimit"),
    options.precision ?? config.get("precision")
  );
}
