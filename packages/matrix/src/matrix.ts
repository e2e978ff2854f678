/**
 * Matrix - Dense matrices of arbitrary precision decimals
 *
 * A Matrix owns a row-major array of Elements. Row and column views read and
 * write through to it; they are created fresh on every access and become
 * invalid once the matrix is resized. Subscripts are 1-based and slice stops
 * are inclusive.
 *
 * Every operation that rounds accepts `{ roundLimit }` and falls back to the
 * configured default.
 *
 * @example
 * ```typescript
 * const a = new Matrix([[2, 1], [1, 3]]);
 * a.determinant();                         // 5
 * a.matmul(a.inverse()).equals(identity(2)); // true
 * a.getBlock({ start: 1, stop: 2 }, 2);    // 2x1 matrix [[1], [3]]
 * ```
 */

import type { Eq, Ring, Show } from "@decimatrix/core";
import { InvalidDimension, TypeMismatch, ZeroDeterminant } from "./errors.js";
import {
  backSubstitution,
  determinant,
  forwardElimination,
  inverseArray,
  isDiagonalArray,
  minorArray,
  rankArray,
} from "./reduction.js";
import { renderArray } from "./render.js";
import { adjustSlice, sliceIndices } from "./slices.js";
import type { Index } from "./slices.js";
import {
  checkDimension,
  checkIndex,
  copyArray,
  identityArray,
  replaceArray,
  resizeStore,
  validArray,
  validContainer,
  zeroArray,
} from "./store.js";
import type { MatrixStore } from "./store.js";
import { MatrixCursor } from "./cursor.js";
import { resolveTolerance } from "./tolerance.js";
import type { Tolerance, ToleranceOptions } from "./tolerance.js";
import * as E from "./types/element.js";
import type { Element, Real } from "./types/element.js";
import { Columns, Rows } from "./views/collections.js";

type ElementOp = (a: Element, b: Element, precision: number) => Element;

export class Matrix implements Iterable<Element> {
  private readonly store: MatrixStore;

  /**
   * A zero matrix of the given dimensions.
   *
   * @throws TypeMismatch for non-integer dimensions
   * @throws InvalidDimension for dimensions below 1
   */
  constructor(nrow: number, ncol: number);
  /**
   * A matrix from rows of real numbers. With `zfill`, short rows are padded
   * on the right with zeros.
   *
   * @throws TypeMismatch if an element is not a real number
   * @throws InvalidDimension if the source is empty, or rows differ in length without `zfill`
   */
  constructor(source: Iterable<Iterable<Real>>, zfill?: boolean);
  constructor(first: number | Iterable<Iterable<Real>>, second?: number | boolean) {
    if (typeof first === "number") {
      if (typeof second !== "number") {
        throw new TypeMismatch(
          "Constructor arguments must either be two integers " +
            "OR an iterable of rows of real numbers and an optional boolean."
        );
      }
      checkDimension(first, "nrow");
      checkDimension(second, "ncol");
      this.store = { array: zeroArray(first, second), nrow: first, ncol: second };
      return;
    }

    if (typeof second === "number") {
      throw new TypeMismatch("'zfill' must be a boolean.");
    }

    const array = validArray(first);
    const ncol = array.reduce((max, row) => Math.max(max, row.length), 0);
    if (ncol === 0) {
      throw new InvalidDimension("The given array is empty.");
    }

    this.store = { array, nrow: array.length, ncol };
    if (array.some((row) => row.length !== ncol)) {
      if (second !== true) {
        throw new InvalidDimension(
          "The rows of the array have different lengths; pass 'zfill = true' to pad short rows with zeros."
        );
      }
      resizeStore(this.store, array.length, ncol);
    }
  }

  // ==========================================================================
  // Dimensions & Views
  // ==========================================================================

  get nrow(): number {
    return this.store.nrow;
  }

  get ncol(): number {
    return this.store.ncol;
  }

  /** `[nrow, ncol]` */
  get size(): [number, number] {
    return [this.store.nrow, this.store.ncol];
  }

  /** A fresh view over the rows */
  get rows(): Rows {
    return new Rows(this.store);
  }

  /** A fresh view over the columns */
  get columns(): Columns {
    return new Columns(this.store);
  }

  /** Whether `a · b` is defined */
  static conformable(a: Matrix, b: Matrix): boolean {
    return a.ncol === b.nrow;
  }

  // ==========================================================================
  // Element & Block Access
  // ==========================================================================

  /**
   * @throws IndexOutOfRange outside the matrix
   */
  get(row: number, col: number): Element {
    return this.store.array[checkIndex(row, this.nrow)][checkIndex(col, this.ncol)];
  }

  /**
   * @throws IndexOutOfRange outside the matrix
   * @throws TypeMismatch if `value` isn't a real number
   */
  set(row: number, col: number, value: Real): void {
    const i = checkIndex(row, this.nrow);
    const j = checkIndex(col, this.ncol);
    this.store.array[i][j] = E.element(value);
  }

  private selection(index: Index, length: number): number[] {
    return typeof index === "number"
      ? [checkIndex(index, length)]
      : sliceIndices(adjustSlice(index, length));
  }

  /**
   * A copy of the block selected by a row and a column subscript, each an
   * index or a slice.
   *
   * @throws InvalidDimension if the selection is empty
   */
  getBlock(rows: Index, cols: Index): Matrix {
    const rowIndices = this.selection(rows, this.nrow);
    const colIndices = this.selection(cols, this.ncol);
    if (rowIndices.length === 0 || colIndices.length === 0) {
      throw new InvalidDimension("The selected block is empty.", [this]);
    }
    return new Matrix(rowIndices.map((i) => colIndices.map((j) => this.store.array[i][j])));
  }

  /**
   * Overwrite the selected block. The new values must have exactly the
   * block's shape; nothing is written otherwise.
   *
   * @throws InvalidDimension if the shapes differ
   */
  setBlock(rows: Index, cols: Index, value: Matrix | Iterable<Iterable<Real>>): void {
    const rowIndices = this.selection(rows, this.nrow);
    const colIndices = this.selection(cols, this.ncol);
    if (rowIndices.length === 0 || colIndices.length === 0) {
      throw new InvalidDimension("The selected block is empty.", [this]);
    }

    const block = value instanceof Matrix ? value.toArray() : validArray(value);
    if (
      block.length !== rowIndices.length ||
      block.some((row) => row.length !== colIndices.length)
    ) {
      throw new InvalidDimension(
        `The block is ${rowIndices.length}x${colIndices.length}; the values don't match that shape.`,
        value instanceof Matrix ? [this, value] : [this]
      );
    }

    rowIndices.forEach((i, r) => {
      colIndices.forEach((j, c) => {
        this.store.array[i][j] = block[r][c];
      });
    });
  }

  /**
   * Grow with zeros or truncate. Views created before a change of size
   * become invalid.
   *
   * @throws TypeMismatch if neither dimension is given
   */
  resize(nrow?: number, ncol?: number): void {
    if (nrow === undefined && ncol === undefined) {
      throw new TypeMismatch("At least one of 'nrow' and 'ncol' must be given.");
    }
    if (nrow !== undefined) checkDimension(nrow, "nrow");
    if (ncol !== undefined) checkDimension(ncol, "ncol");

    resizeStore(this.store, nrow ?? this.nrow, ncol ?? this.ncol);
  }

  // ==========================================================================
  // Iteration & Conversion
  // ==========================================================================

  /** A seekable row-major cursor */
  cursor(): MatrixCursor {
    return new MatrixCursor(this.store);
  }

  [Symbol.iterator](): MatrixCursor {
    return this.cursor();
  }

  copy(): Matrix {
    return new Matrix(this.store.array);
  }

  toArray(): Element[][] {
    return copyArray(this.store.array);
  }

  toNumbers(): number[][] {
    return this.store.array.map((row) => row.map(E.toNumber));
  }

  toString(): string {
    return renderArray(this.store.array);
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  private elementwise(other: Matrix, op: ElementOp, options?: ToleranceOptions): Element[][] {
    if (this.nrow !== other.nrow || this.ncol !== other.ncol) {
      throw new InvalidDimension("The matrices must be of the same dimensions.", [this, other]);
    }
    const { precision } = resolveTolerance(options);
    return this.store.array.map((row, i) =>
      row.map((e, j) => op(e, other.store.array[i][j], precision))
    );
  }

  private scalar(value: Real, op: ElementOp, options?: ToleranceOptions): Element[][] {
    const tol = resolveTolerance(options);
    const k = E.element(value);
    return this.store.array.map((row) => row.map((e) => E.snap(op(e, k, tol.precision), tol)));
  }

  private product(other: Matrix, options?: ToleranceOptions): Element[][] {
    if (!Matrix.conformable(this, other)) {
      throw new InvalidDimension(
        `A ${this.nrow}x${this.ncol} matrix can't be multiplied by a ${other.nrow}x${other.ncol} matrix.`,
        [this, other]
      );
    }
    const tol = resolveTolerance(options);
    const p = tol.precision;
    const b = other.store.array;

    return this.store.array.map((row) =>
      Array.from({ length: other.ncol }, (_, j) =>
        E.snap(
          row.reduce((sum, e, k) => E.add(sum, E.mul(e, b[k][j], p), p), E.ZERO),
          tol
        )
      )
    );
  }

  private quotient(value: Real, options?: ToleranceOptions): Element[][] {
    if (E.isZero(E.element(value))) {
      throw new RangeError("Matrix division by zero.");
    }
    return this.scalar(value, E.div, options);
  }

  private augmented(other: Matrix): Element[][] {
    if (this.nrow !== other.nrow) {
      throw new InvalidDimension("The matrices must have the same number of rows.", [this, other]);
    }
    return this.store.array.map((row, i) => [...row, ...other.store.array[i]]);
  }

  add(other: Matrix, options?: ToleranceOptions): Matrix {
    return new Matrix(this.elementwise(other, E.add, options));
  }

  sub(other: Matrix, options?: ToleranceOptions): Matrix {
    return new Matrix(this.elementwise(other, E.sub, options));
  }

  negate(): Matrix {
    return new Matrix(this.store.array.map((row) => row.map(E.negate)));
  }

  /** Multiply every element by a scalar */
  mul(value: Real, options?: ToleranceOptions): Matrix {
    return new Matrix(this.scalar(value, E.mul, options));
  }

  /** Matrix product `this · other` */
  matmul(other: Matrix, options?: ToleranceOptions): Matrix {
    return new Matrix(this.product(other, options));
  }

  /**
   * @throws RangeError if `value` is zero
   */
  div(value: Real, options?: ToleranceOptions): Matrix {
    return new Matrix(this.quotient(value, options));
  }

  /** The columns of `other` appended to those of this matrix */
  augment(other: Matrix): Matrix {
    return new Matrix(this.augmented(other));
  }

  addInPlace(other: Matrix, options?: ToleranceOptions): this {
    replaceArray(this.store, this.elementwise(other, E.add, options));
    return this;
  }

  subInPlace(other: Matrix, options?: ToleranceOptions): this {
    replaceArray(this.store, this.elementwise(other, E.sub, options));
    return this;
  }

  mulInPlace(value: Real, options?: ToleranceOptions): this {
    replaceArray(this.store, this.scalar(value, E.mul, options));
    return this;
  }

  divInPlace(value: Real, options?: ToleranceOptions): this {
    replaceArray(this.store, this.quotient(value, options));
    return this;
  }

  /** Replace this matrix with `this · other`, resizing it when `other` isn't square */
  matmulInPlace(other: Matrix, options?: ToleranceOptions): this {
    replaceArray(this.store, this.product(other, options));
    return this;
  }

  augmentInPlace(other: Matrix): this {
    replaceArray(this.store, this.augmented(other));
    return this;
  }

  /**
   * Repeated multiplication for `k >= 1`; the inverse for `k = -1`.
   *
   * @throws InvalidDimension if the matrix isn't square
   * @throws RangeError for any other exponent
   */
  pow(k: number, options?: ToleranceOptions): Matrix {
    this.requireSquare("raised to a power");
    if (k === -1) {
      return this.inverse(options);
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new RangeError(`Matrices can only be raised to integers >= 1 or to -1, got ${k}.`);
    }

    let result = this.copy();
    for (let n = 1; n < k; n++) {
      result = result.matmul(this, options);
    }
    return result;
  }

  /** Same shape and equal elements */
  equals(other: Matrix): boolean {
    return (
      this.nrow === other.nrow &&
      this.ncol === other.ncol &&
      this.store.array.every((row, i) => row.every((e, j) => E.equals(e, other.store.array[i][j])))
    );
  }

  // ==========================================================================
  // Structure
  // ==========================================================================

  private transposedArray(): Element[][] {
    return Array.from({ length: this.ncol }, (_, j) => this.store.array.map((row) => row[j]));
  }

  transpose(): this {
    replaceArray(this.store, this.transposedArray());
    return this;
  }

  transposed(): Matrix {
    return new Matrix(this.transposedArray());
  }

  /** Reverse the order of the columns */
  flipHorizontal(): this {
    for (const row of this.store.array) {
      row.reverse();
    }
    return this;
  }

  /** Reverse the order of the rows */
  flipVertical(): this {
    this.store.array.reverse();
    return this;
  }

  /** Rotate 90° clockwise */
  rotateRight(): this {
    return this.transpose().flipHorizontal();
  }

  /** Rotate 90° counter-clockwise */
  rotateLeft(): this {
    return this.transpose().flipVertical();
  }

  // ==========================================================================
  // Predicates
  // ==========================================================================

  isSquare(): boolean {
    return this.nrow === this.ncol;
  }

  private close(a: Element, b: Element, tol: Tolerance): boolean {
    return E.isNegligible(E.sub(a, b, tol.precision), tol);
  }

  private every(test: (e: Element, i: number, j: number) => boolean): boolean {
    return this.store.array.every((row, i) => row.every((e, j) => test(e, i, j)));
  }

  isNull(options?: ToleranceOptions): boolean {
    const tol = resolveTolerance(options);
    return this.every((e) => E.isNegligible(e, tol));
  }

  isDiagonal(options?: ToleranceOptions): boolean {
    return this.isSquare() && isDiagonalArray(this.store.array, resolveTolerance(options));
  }

  isSymmetric(options?: ToleranceOptions): boolean {
    const tol = resolveTolerance(options);
    const a = this.store.array;
    return this.isSquare() && this.every((e, i, j) => this.close(e, a[j][i], tol));
  }

  isSkewSymmetric(options?: ToleranceOptions): boolean {
    const tol = resolveTolerance(options);
    const a = this.store.array;
    return this.isSquare() && this.every((e, i, j) => this.close(e, E.negate(a[j][i]), tol));
  }

  isUpperTriangular(options?: ToleranceOptions): boolean {
    const tol = resolveTolerance(options);
    return this.isSquare() && this.every((e, i, j) => j >= i || E.isNegligible(e, tol));
  }

  isLowerTriangular(options?: ToleranceOptions): boolean {
    const tol = resolveTolerance(options);
    return this.isSquare() && this.every((e, i, j) => j <= i || E.isNegligible(e, tol));
  }

  isTriangular(options?: ToleranceOptions): boolean {
    return this.isUpperTriangular(options) || this.isLowerTriangular(options);
  }

  /** The identity matrix of its order */
  isUnit(options?: ToleranceOptions): boolean {
    const tol = resolveTolerance(options);
    return (
      this.isSquare() &&
      this.every((e, i, j) => (i === j ? this.close(e, E.ONE, tol) : E.isNegligible(e, tol)))
    );
  }

  /** `A · Aᵀ` is the identity, within the tolerance */
  isOrthogonal(options?: ToleranceOptions): boolean {
    return this.isSquare() && this.matmul(this.transposed(), options).isUnit(options);
  }

  // ==========================================================================
  // Properties
  // ==========================================================================

  private requireSquare(action: string): void {
    if (!this.isSquare()) {
      throw new InvalidDimension(`Only a square matrix can be ${action}.`, [this]);
    }
  }

  /** Sum of the diagonal */
  trace(options?: ToleranceOptions): Element {
    this.requireSquare("traced");
    const { precision } = resolveTolerance(options);
    return this.store.array.reduce((sum, row, i) => E.add(sum, row[i], precision), E.ZERO);
  }

  diagonal(): Element[] {
    this.requireSquare("asked for its diagonal");
    return this.store.array.map((row, i) => row[i]);
  }

  /**
   * @throws InvalidDimension if the matrix isn't square, or `values` has the wrong length
   */
  setDiagonal(values: Iterable<Real>): void {
    this.requireSquare("given a diagonal");
    const diagonal = validContainer(values, this.nrow);
    diagonal.forEach((e, i) => {
      this.store.array[i][i] = e;
    });
  }

  determinant(options?: ToleranceOptions): Element {
    this.requireSquare("asked for its determinant");
    return determinant(this.store.array, resolveTolerance(options));
  }

  rank(options?: ToleranceOptions): number {
    return rankArray(this.store.array, resolveTolerance(options));
  }

  /**
   * Determinant of the matrix without row `row` and column `col` (1-based).
   */
  minor(row: number, col: number, options?: ToleranceOptions): Element {
    this.requireSquare("asked for a minor");
    if (this.nrow === 1) {
      throw new InvalidDimension("A 1x1 matrix has no minors.", [this]);
    }
    const i = checkIndex(row, this.nrow);
    const j = checkIndex(col, this.ncol);
    return determinant(minorArray(this.store.array, i, j), resolveTolerance(options));
  }

  cofactor(row: number, col: number, options?: ToleranceOptions): Element {
    const minor = this.minor(row, col, options);
    return (row + col) % 2 === 0 ? minor : E.negate(minor);
  }

  // ==========================================================================
  // Row Reduction
  // ==========================================================================

  /**
   * @throws InvalidDimension if the matrix isn't square
   * @throws ZeroDeterminant if the matrix is singular
   */
  inverse(options?: ToleranceOptions): Matrix {
    this.requireSquare("inverted");
    const tol = resolveTolerance(options);
    return new Matrix(this.naming(() => inverseArray(this.store.array, tol)));
  }

  /** A row echelon copy */
  toRowEchelon(options?: ToleranceOptions): Matrix {
    const array = this.toArray();
    forwardElimination(array, resolveTolerance(options));
    return new Matrix(array);
  }

  /**
   * A reduced row echelon copy.
   *
   * @throws ZeroDeterminant if a pivot of the leading block is negligible
   */
  toReducedRowEchelon(options?: ToleranceOptions): Matrix {
    const tol = resolveTolerance(options);
    const array = this.toArray();
    forwardElimination(array, tol, this.ncol > this.nrow);
    this.naming(() => backSubstitution(array, tol));
    return new Matrix(array);
  }

  private requireWide(action: string): void {
    if (this.ncol <= this.nrow) {
      throw new InvalidDimension(
        `Only a matrix with more columns than rows can be ${action} in place.`,
        [this]
      );
    }
  }

  /**
   * Forward elimination in place, pivoting on the leading square block.
   *
   * @throws InvalidDimension unless the matrix has more columns than rows
   */
  forwardEliminate(options?: ToleranceOptions): this {
    this.requireWide("forward eliminated");
    forwardElimination(this.store.array, resolveTolerance(options), true);
    return this;
  }

  /**
   * Back substitution in place.
   *
   * @throws InvalidDimension unless the matrix has more columns than rows
   * @throws NotTriangular if the leading block isn't upper triangular
   * @throws ZeroDeterminant if a leading diagonal entry is negligible
   */
  backSubstitute(options?: ToleranceOptions): this {
    this.requireWide("back substituted");
    const tol = resolveTolerance(options);
    this.naming(() => backSubstitution(this.store.array, tol));
    return this;
  }

  /** Attach this matrix to a ZeroDeterminant raised by an array-level reduction */
  private naming<T>(reduce: () => T): T {
    try {
      return reduce();
    } catch (error) {
      if (error instanceof ZeroDeterminant && error.matrix === undefined) {
        throw new ZeroDeterminant(this, error.message);
      }
      throw error;
    }
  }
}

// ============================================================================
// Constructors & Instances
// ============================================================================

/**
 * The n x n identity matrix.
 */
export function identity(n: number): Matrix {
  checkDimension(n, "n");
  return new Matrix(identityArray(n));
}

/**
 * Scalar multiplication with the scalar first, `k · m`.
 */
export function scale(k: Real, m: Matrix, options?: ToleranceOptions): Matrix {
  return m.mul(k, options);
}

/**
 * Ring of n x n matrices under addition and matrix multiplication.
 */
export function numericMatrix(n: number, options?: ToleranceOptions): Ring<Matrix> {
  checkDimension(n, "n");
  return {
    add: (a, b) => a.add(b, options),
    sub: (a, b) => a.sub(b, options),
    mul: (a, b) => a.matmul(b, options),
    negate: (a) => a.negate(),
    zero: () => new Matrix(n, n),
    one: () => identity(n),
  };
}

export const eqMatrix: Eq<Matrix> = {
  equals: (a, b) => a.equals(b),
  notEquals: (a, b) => !a.equals(b),
};

export const showMatrix: Show<Matrix> = {
  show: (m) => m.toString(),
};
