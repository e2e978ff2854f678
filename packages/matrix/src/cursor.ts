/**
 * Seekable row-major iteration over a matrix.
 */

import { TypeMismatch } from "./errors.js";
import { StoreView } from "./store.js";
import type { MatrixStore } from "./store.js";
import type { Element } from "./types/element.js";

/**
 * Why a cursor stopped: it ran past the last element, or was sought outside
 * the matrix. A stopped cursor stays stopped.
 */
export type CursorStop = "exhausted" | "out-of-range";

/**
 * @example
 * ```typescript
 * const cursor = new Matrix([[1, 2], [3, 4]]).cursor();
 * cursor.next();   // { done: false, value: 1 }
 * cursor.seek(1);  // the next element is the first of row 2
 * cursor.next();   // { done: false, value: 3 }
 * cursor.seek(3);  // { done: true, value: "out-of-range" } from now on
 * ```
 */
export class MatrixCursor extends StoreView implements Iterator<Element, CursorStop>, Iterable<Element> {
  /** 0-based row-major offset of the next element */
  private offset = 0;
  private stopped: CursorStop | undefined;

  constructor(store: MatrixStore) {
    super(store);
  }

  /**
   * @throws ViewInvalidated if the matrix was resized since the cursor was created
   */
  next(): IteratorResult<Element, CursorStop> {
    if (this.stopped === undefined) {
      this.assertFresh();
      if (this.offset >= this.store.nrow * this.store.ncol) {
        this.stopped = "exhausted";
      }
    }
    if (this.stopped !== undefined) {
      return { done: true, value: this.stopped };
    }

    const { ncol } = this.store;
    const value = this.store.array[Math.floor(this.offset / ncol)][this.offset % ncol];
    this.offset++;
    return { done: false, value };
  }

  /**
   * Move the cursor so that the next element is the one right after
   * `(row, col)`, or the first of row `row + 1` when `col` is omitted.
   * Positions outside the matrix stop the cursor.
   *
   * @throws TypeMismatch for non-integer positions
   * @throws ViewInvalidated if the matrix was resized since the cursor was created
   */
  seek(row: number, col?: number): this {
    if (!Number.isInteger(row) || (col !== undefined && !Number.isInteger(col))) {
      throw new TypeMismatch("Cursor positions must be integers.");
    }
    if (this.stopped !== undefined) {
      return this;
    }
    this.assertFresh();

    const { nrow, ncol } = this.store;
    if (row < 1 || row > nrow || (col !== undefined && (col < 1 || col > ncol))) {
      this.stopped = "out-of-range";
    } else {
      this.offset = col === undefined ? row * ncol : (row - 1) * ncol + col;
    }
    return this;
  }

  /** Whether the cursor has stopped, and why */
  get stop(): CursorStop | undefined {
    return this.stopped;
  }

  [Symbol.iterator](): this {
    return this;
  }

  protected describe(): string {
    return "Cursor";
  }
}
