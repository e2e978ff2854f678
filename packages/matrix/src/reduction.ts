/**
 * Gaussian elimination over rows of Elements.
 *
 * These functions work on plain `Element[][]` arrays (0-based) and take the
 * tolerance explicitly. Matrix methods copy or lock their store and call in
 * here; nothing in this module reads configuration.
 */

import { createLogger } from "@decimatrix/core";
import { NotTriangular, ZeroDeterminant } from "./errors.js";
import type { Tolerance } from "./tolerance.js";
import { add, div, equals, isNegligible, mul, ONE, snap, sub, ZERO } from "./types/element.js";
import type { Element } from "./types/element.js";

const log = createLogger("reduction");

type Rows = readonly (readonly Element[])[];

function isNegligibleRow(row: readonly Element[], tol: Tolerance): boolean {
  return row.every((e) => isNegligible(e, tol));
}

/**
 * `target -= factor * source`, snapping every entry, with `target[exact]`
 * set to exactly zero.
 */
function subtractMultiple(
  target: Element[],
  source: readonly Element[],
  factor: Element,
  exact: number,
  tol: Tolerance
): void {
  for (let c = 0; c < target.length; c++) {
    target[c] =
      c === exact
        ? ZERO
        : snap(sub(target[c], mul(factor, source[c], tol.precision), tol.precision), tol);
  }
}

// ============================================================================
// Elimination
// ============================================================================

/**
 * Reduce `array` to row echelon form in place.
 *
 * A negligible pivot is replaced by swapping in a lower row with a usable
 * entry; an entirely negligible pivot row is moved to the bottom instead.
 * With `asSquare`, only the leading square block's columns are used as pivots,
 * which is what inverting `[A | I]` needs.
 */
export function forwardElimination(array: Element[][], tol: Tolerance, asSquare = false): void {
  const nrow = array.length;
  const ncol = array[0].length;
  const colLimit = asSquare ? Math.min(nrow, ncol) : ncol;

  let j = 0;
  let k = 0;
  while (j < nrow - 1 && k < colLimit) {
    if (isNegligible(array[j][k], tol)) {
      let i = j + 1;
      while (i < nrow && isNegligible(array[i][k], tol)) {
        i++;
      }

      if (i === nrow) {
        log.debug(`no pivot in column ${k + 1} from row ${j + 1}`);
        k++;
        continue;
      }

      if (isNegligibleRow(array[j], tol)) {
        array.push(...array.splice(j, 1));
        log.debug(`moved zero row ${j + 1} to the bottom`);
        continue;
      }

      [array[i], array[j]] = [array[j], array[i]];
      log.debug(`swapped rows ${j + 1} and ${i + 1}`);
    }

    const pivotRow = array[j];
    for (let i = j + 1; i < nrow; i++) {
      if (!isNegligible(array[i][k], tol)) {
        const factor = div(array[i][k], pivotRow[k], tol.precision);
        subtractMultiple(array[i], pivotRow, factor, k, tol);
      }
    }

    j++;
    k++;
  }
}

/**
 * Reduce a row echelon `array` to reduced row echelon form in place.
 *
 * @throws NotTriangular if the leading block isn't upper triangular
 * @throws ZeroDeterminant if a leading diagonal entry is negligible
 */
export function backSubstitution(array: Element[][], tol: Tolerance): void {
  const nrow = array.length;
  const ncol = array[0].length;
  const n = Math.min(nrow, ncol);

  for (let i = 1; i < nrow; i++) {
    for (let j = 0; j < Math.min(i, ncol); j++) {
      if (!isNegligible(array[i][j], tol)) {
        throw new NotTriangular();
      }
    }
  }
  for (let j = 0; j < n; j++) {
    if (isNegligible(array[j][j], tol)) {
      throw new ZeroDeterminant();
    }
  }

  for (let j = n - 1; j > 0; j--) {
    const pivotRow = array[j];
    for (let i = j - 1; i >= 0; i--) {
      if (!isNegligible(array[i][j], tol)) {
        const factor = div(array[i][j], pivotRow[j], tol.precision);
        subtractMultiple(array[i], pivotRow, factor, j, tol);
      }
    }
  }

  for (let j = 0; j < n; j++) {
    const pivot = array[j][j];
    if (!equals(pivot, ONE)) {
      array[j] = array[j].map((e) => snap(div(e, pivot, tol.precision), tol));
    }
  }
}

// ============================================================================
// Determinant
// ============================================================================

export function isDiagonalArray(array: Rows, tol: Tolerance): boolean {
  return array.every((row, i) => row.every((e, j) => i === j || isNegligible(e, tol)));
}

/**
 * The square array without row `i` and column `j`.
 */
export function minorArray(array: Rows, i: number, j: number): Element[][] {
  return array.filter((_, r) => r !== i).map((row) => row.filter((_, c) => c !== j));
}

function negligibleCount(values: Iterable<Element>, tol: Tolerance): number {
  let count = 0;
  for (const e of values) {
    if (isNegligible(e, tol)) count++;
  }
  return count;
}

/**
 * Laplace expansion along the row, or column, with the most negligible entries.
 * A column is used only when it has strictly more than every row.
 */
export function determinant(array: Rows, tol: Tolerance): Element {
  const n = array.length;
  const p = tol.precision;

  if (n === 1) {
    return snap(array[0][0], tol);
  }
  if (n === 2) {
    return snap(sub(mul(array[0][0], array[1][1], p), mul(array[0][1], array[1][0], p), p), tol);
  }
  if (isDiagonalArray(array, tol)) {
    return snap(
      array.reduce((product, row, i) => mul(product, row[i], p), ONE),
      tol
    );
  }

  let bestRow = 0;
  let rowZeros = -1;
  let bestCol = 0;
  let colZeros = -1;
  for (let t = 0; t < n; t++) {
    const inRow = negligibleCount(array[t], tol);
    if (inRow > rowZeros) {
      bestRow = t;
      rowZeros = inRow;
    }
    const inCol = negligibleCount(
      array.map((row) => row[t]),
      tol
    );
    if (inCol > colZeros) {
      bestCol = t;
      colZeros = inCol;
    }
  }
  const alongColumn = colZeros > rowZeros;

  let result = ZERO;
  for (let t = 0; t < n; t++) {
    const i = alongColumn ? t : bestRow;
    const j = alongColumn ? bestCol : t;
    const coefficient = array[i][j];
    if (isNegligible(coefficient, tol)) continue;

    const term = mul(coefficient, determinant(minorArray(array, i, j), tol), p);
    result = (i + j) % 2 === 0 ? add(result, term, p) : sub(result, term, p);
  }

  return snap(result, tol);
}

// ============================================================================
// Inverse & Rank
// ============================================================================

/**
 * Invert a square array by reducing `[A | I]`.
 *
 * @throws ZeroDeterminant if the array is singular
 */
export function inverseArray(array: Rows, tol: Tolerance): Element[][] {
  const n = array.length;
  const augmented = array.map((row, i) => [
    ...row,
    ...Array.from({ length: n }, (_, j) => (i === j ? ONE : ZERO)),
  ]);

  forwardElimination(augmented, tol, true);
  for (let j = 0; j < n; j++) {
    if (isNegligible(augmented[j][j], tol)) {
      throw new ZeroDeterminant();
    }
  }
  backSubstitution(augmented, tol);

  return augmented.map((row) => row.slice(n));
}

/**
 * Number of rows left with a non-negligible entry after forward elimination.
 */
export function rankArray(array: Rows, tol: Tolerance): number {
  const copy = array.map((row) => row.slice());
  forwardElimination(copy, tol);
  return copy.filter((row) => !isNegligibleRow(row, tol)).length;
}
