/**
 * Matrix storage shared between a Matrix and its views.
 *
 * The store is the single owner of the data. A Matrix hands its store to the
 * views it creates; nothing outside this package can reach it. Views record
 * the store's dimensions when created (their stamp) and refuse to work once
 * the store has been resized.
 */

import { IndexOutOfRange, InvalidDimension, TypeMismatch, ViewInvalidated } from "./errors.js";
import { element, isReal, ZERO } from "./types/element.js";
import type { Element, Real } from "./types/element.js";

export interface MatrixStore {
  array: Element[][];
  nrow: number;
  ncol: number;
}

/** The (nrow, ncol) pair captured by a view at creation. */
export type Stamp = readonly [nrow: number, ncol: number];

export type Axis = "row" | "column";

export function stampOf(store: MatrixStore): Stamp {
  return [store.nrow, store.ncol];
}

export function describeStore(store: MatrixStore): string {
  return `${store.nrow}x${store.ncol} matrix`;
}

/**
 * Base class of every view over a matrix store.
 */
export abstract class StoreView {
  protected stamp: Stamp;

  constructor(protected readonly store: MatrixStore) {
    this.stamp = stampOf(store);
  }

  /**
   * @throws ViewInvalidated if the matrix was resized since the view was created
   */
  protected assertFresh(): void {
    if (this.stamp[0] !== this.store.nrow || this.stamp[1] !== this.store.ncol) {
      throw new ViewInvalidated(
        `${this.describe()} is no longer valid: the matrix was resized ` +
          `from ${this.stamp[0]}x${this.stamp[1]} to ${this.store.nrow}x${this.store.ncol}.`,
        this
      );
    }
  }

  /** Record the current dimensions after a mutation performed through this view. */
  protected restamp(): void {
    this.stamp = stampOf(this.store);
  }

  /** Whether the view still matches its matrix's dimensions. */
  get isValid(): boolean {
    return this.stamp[0] === this.store.nrow && this.stamp[1] === this.store.ncol;
  }

  /** Short name used in messages, e.g. "Row 2" */
  protected abstract describe(): string;

  toString(): string {
    return `<${this.describe()} of ${describeStore(this.store)}>`;
  }
}

// ============================================================================
// Construction Helpers
// ============================================================================

export function zeroArray(nrow: number, ncol: number): Element[][] {
  return Array.from({ length: nrow }, () => new Array<Element>(ncol).fill(ZERO));
}

export function identityArray(n: number): Element[][] {
  const array = zeroArray(n, n);
  for (let i = 0; i < n; i++) {
    array[i][i] = { unscaled: 1n, scale: 0 };
  }
  return array;
}

export function copyArray(array: readonly (readonly Element[])[]): Element[][] {
  return array.map((row) => row.slice());
}

/**
 * Validate dimensions given as arguments.
 *
 * @throws TypeMismatch for non-integers
 * @throws InvalidDimension for values below 1
 */
export function checkDimension(value: number, name: string): void {
  if (!Number.isInteger(value)) {
    throw new TypeMismatch(`'${name}' must be an integer.`);
  }
  if (value < 1) {
    throw new InvalidDimension(`'${name}' must be greater than zero.`);
  }
}

/**
 * Convert a sequence of real numbers to Elements, optionally of a given length.
 *
 * @throws TypeMismatch if an item is not a real number
 * @throws InvalidDimension if the length differs from `length`
 */
export function validContainer(values: Iterable<unknown>, length?: number): Element[] {
  const container: Element[] = [];
  for (const value of values) {
    if (!isReal(value)) {
      throw new TypeMismatch("The object must be an iterable of real numbers.");
    }
    container.push(element(value));
  }
  if (length !== undefined && container.length !== length) {
    throw new InvalidDimension(
      `The iterable has ${container.length} items, expected ${length}.`
    );
  }
  return container;
}

/**
 * Convert a two-dimensional source of real numbers to rows of Elements.
 *
 * @throws TypeMismatch if an item is not a real number
 * @throws InvalidDimension if the source has no rows
 */
export function validArray(source: Iterable<Iterable<Real>>): Element[][] {
  const array: Element[][] = [];
  for (const row of source) {
    array.push(validContainer(row));
  }
  if (array.length === 0) {
    throw new InvalidDimension("The given array is empty.");
  }
  return array;
}

// ============================================================================
// Line Access
// ============================================================================

export function lineCount(store: MatrixStore, axis: Axis): number {
  return axis === "row" ? store.nrow : store.ncol;
}

export function lineLength(store: MatrixStore, axis: Axis): number {
  return axis === "row" ? store.ncol : store.nrow;
}

/**
 * Convert a 1-based position to a 0-based one.
 *
 * @throws TypeMismatch for non-integers
 * @throws IndexOutOfRange outside 1..length
 */
export function checkIndex(index: number, length: number): number {
  if (!Number.isInteger(index)) {
    throw new TypeMismatch("Subscript must either be an integer or a slice.");
  }
  if (index < 1 || index > length) {
    throw new IndexOutOfRange(`Index ${index} out of range (1-${length}).`);
  }
  return index - 1;
}

export function readCell(store: MatrixStore, axis: Axis, line: number, k: number): Element {
  return axis === "row" ? store.array[line][k] : store.array[k][line];
}

export function writeCell(
  store: MatrixStore,
  axis: Axis,
  line: number,
  k: number,
  value: Element
): void {
  if (axis === "row") {
    store.array[line][k] = value;
  } else {
    store.array[k][line] = value;
  }
}

export function readLine(store: MatrixStore, axis: Axis, line: number): Element[] {
  return axis === "row" ? store.array[line].slice() : store.array.map((row) => row[line]);
}

export function writeLine(
  store: MatrixStore,
  axis: Axis,
  line: number,
  values: readonly Element[]
): void {
  values.forEach((value, k) => writeCell(store, axis, line, k, value));
}

/**
 * Remove rows or columns by 0-based index. Callers check that at least one
 * line remains.
 */
export function removeLines(store: MatrixStore, axis: Axis, indices: readonly number[]): void {
  const descending = [...indices].sort((a, b) => b - a);

  if (axis === "row") {
    for (const i of descending) {
      store.array.splice(i, 1);
    }
    store.nrow -= indices.length;
  } else {
    for (const row of store.array) {
      for (const j of descending) {
        row.splice(j, 1);
      }
    }
    store.ncol -= indices.length;
  }
}

// ============================================================================
// Reshaping
// ============================================================================

/**
 * Grow with zeros or truncate to `nrow x ncol`. Callers validate the dimensions.
 */
export function resizeStore(store: MatrixStore, nrow: number, ncol: number): void {
  for (const row of store.array) {
    if (ncol > row.length) {
      row.push(...new Array<Element>(ncol - row.length).fill(ZERO));
    } else {
      row.splice(ncol);
    }
  }

  if (nrow > store.array.length) {
    store.array.push(...zeroArray(nrow - store.array.length, ncol));
  } else {
    store.array.splice(nrow);
  }

  store.nrow = nrow;
  store.ncol = ncol;
}

/**
 * Swap in a new array, taking its dimensions.
 */
export function replaceArray(store: MatrixStore, array: Element[][]): void {
  store.array = array;
  store.nrow = array.length;
  store.ncol = array[0].length;
}
