/**
 * Matrix Error Types
 *
 * Every failure raised by the engine is a synchronous MatrixError with a
 * stable `kind`. All of them are checked before any state is mutated.
 */

import type { Matrix } from "./matrix.js";

export type MatrixErrorKind =
  | "invalid-dimension"
  | "index-out-of-range"
  | "type-mismatch"
  | "slice-range"
  | "view-invalidated"
  | "zero-determinant"
  | "empty-matrix"
  | "not-triangular"
  | "no-unique-solution";

/**
 * Base class for all matrix errors.
 */
export class MatrixError extends Error {
  constructor(
    message: string,
    readonly kind: MatrixErrorKind,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "MatrixError";
  }
}

/**
 * Thrown for non-positive or incompatible dimensions.
 */
export class InvalidDimension extends MatrixError {
  constructor(
    message: string,
    readonly matrices: readonly Matrix[] = []
  ) {
    super(message, "invalid-dimension");
    this.name = "InvalidDimension";
  }
}

/**
 * Thrown when a 1-based index falls outside a matrix or view.
 */
export class IndexOutOfRange extends MatrixError {
  constructor(message = "Index out of range.") {
    super(message, "index-out-of-range");
    this.name = "IndexOutOfRange";
  }
}

/**
 * Thrown for non-real elements and subscripts of the wrong shape.
 */
export class TypeMismatch extends MatrixError {
  constructor(message: string) {
    super(message, "type-mismatch");
    this.name = "TypeMismatch";
  }
}

/**
 * Thrown for malformed 1-based slices.
 */
export class SliceRangeError extends MatrixError {
  constructor(message: string) {
    super(message, "slice-range");
    this.name = "SliceRangeError";
  }
}

/**
 * Thrown when a view is used after its matrix was resized.
 */
export class ViewInvalidated extends MatrixError {
  constructor(
    message: string,
    readonly view: object
  ) {
    super(message, "view-invalidated");
    this.name = "ViewInvalidated";
  }
}

/**
 * Thrown when an operation requires a non-singular matrix. Operations on a
 * Matrix record it; the array-level reduction functions leave `matrix` unset.
 */
export class ZeroDeterminant extends MatrixError {
  constructor(
    readonly matrix?: Matrix,
    message = "The matrix has a zero determinant."
  ) {
    super(message, "zero-determinant");
    this.name = "ZeroDeterminant";
  }
}

/**
 * Thrown when a deletion would leave a matrix without rows or columns.
 */
export class EmptyMatrixError extends MatrixError {
  constructor(message = "Emptying the matrix isn't allowed.") {
    super(message, "empty-matrix");
    this.name = "EmptyMatrixError";
  }
}

/**
 * Thrown when back substitution is attempted on a matrix that is not
 * in row echelon form.
 */
export class NotTriangular extends MatrixError {
  constructor(message = "The matrix is not upper triangular.") {
    super(message, "not-triangular");
    this.name = "NotTriangular";
  }
}

/**
 * Thrown when a system of linear equations has no unique solution.
 */
export class NoUniqueSolution extends MatrixError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "no-unique-solution", options);
    this.name = "NoUniqueSolution";
  }
}

export function isMatrixError(value: unknown): value is MatrixError {
  return value instanceof MatrixError;
}
