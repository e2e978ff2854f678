/**
 * @decimatrix/matrix - Dense Decimal Matrices
 *
 * This package provides:
 * - **Matrix**: construction, 1-based element and block access, resizing
 * - **Views**: live rows and columns, slices of them, and value snapshots
 * - **Reduction**: row echelon forms, determinant, rank, inverse
 * - **Element**: arbitrary precision decimals with half-even rounding
 * - **Collaborators**: linear system solver and random matrix generators
 *
 * Operations that round take `{ roundLimit, precision }` and otherwise use the
 * defaults configured through `@decimatrix/core`.
 *
 * @example
 * ```typescript
 * import { Matrix, identity, solveLinearSystem } from "@decimatrix/matrix";
 *
 * const m = new Matrix([[4, 7], [2, 6]]);
 * m.determinant();                  // 10
 * m.matmul(m.inverse()).isUnit();   // true
 *
 * solveLinearSystem(new Matrix([[2, 1], [1, 3]]), new Matrix([[5], [10]])); // [1, 3]
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Matrix
// ============================================================================

export { Matrix, identity, scale, numericMatrix, eqMatrix, showMatrix } from "./matrix.js";
export { MatrixCursor, type CursorStop } from "./cursor.js";

// ============================================================================
// Views
// ============================================================================

export {
  Row,
  Column,
  LiveLine,
  LineValue,
  isLine,
  type Line,
  type LineKind,
  type LineOperand,
} from "./views/lines.js";
export {
  Rows,
  Columns,
  RowsSlice,
  ColumnsSlice,
  LineCollection,
  LineRange,
} from "./views/collections.js";

// ============================================================================
// Slices
// ============================================================================

export {
  adjustSlice,
  sliceLength,
  sliceIndex,
  composeSlice,
  sliceIndices,
  formatSlice,
  formatAdjustedSlice,
  type Slice,
  type AdjustedSlice,
  type Index,
} from "./slices.js";

// ============================================================================
// Elements & Tolerance
// ============================================================================

export {
  // Type
  type Element,
  type Real,
  // Constants
  DEFAULT_PRECISION,
  ZERO,
  ONE,
  // Constructors
  element,
  parseElement,
  isElement,
  isReal,
  // Conversion
  toNumber,
  toString as elementToString,
  round,
  roundToPrecision,
  // Arithmetic
  add,
  sub,
  mul,
  div,
  negate,
  abs,
  // Comparison
  compare,
  equals,
  isZero,
  isNegative,
  isInteger,
  isNegligible,
  snap,
  // Instances
  numericElement,
  fractionalElement,
  ordElement,
  showElement,
} from "./types/element.js";

export {
  tolerance,
  resolveTolerance,
  type Tolerance,
  type ToleranceOptions,
} from "./tolerance.js";

// ============================================================================
// Reduction Engine
// ============================================================================

export {
  forwardElimination,
  backSubstitution,
  determinant,
  minorArray,
  inverseArray,
  rankArray,
  isDiagonalArray,
} from "./reduction.js";

export { renderArray } from "./render.js";

// ============================================================================
// Collaborators
// ============================================================================

export { solveLinearSystem } from "./solve.js";
export {
  randintMatrix,
  randomMatrix,
  type IntRange,
  type RandomSource,
} from "./random.js";

// ============================================================================
// Errors
// ============================================================================

export {
  MatrixError,
  InvalidDimension,
  IndexOutOfRange,
  TypeMismatch,
  SliceRangeError,
  ViewInvalidated,
  ZeroDeterminant,
  EmptyMatrixError,
  NotTriangular,
  NoUniqueSolution,
  isMatrixError,
  type MatrixErrorKind,
} from "./errors.js";
