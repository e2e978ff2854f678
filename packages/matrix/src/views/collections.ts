/**
 * Views over all the rows or columns of a matrix, and over slices of them.
 */

import { EmptyMatrixError } from "../errors.js";
import { adjustSlice, composeSlice, formatAdjustedSlice, sliceIndex, sliceIndices } from "../slices.js";
import type { AdjustedSlice, Index, Slice } from "../slices.js";
import {
  checkIndex,
  lineCount,
  lineLength,
  removeLines,
  StoreView,
  validContainer,
  writeLine,
} from "../store.js";
import type { Axis, MatrixStore } from "../store.js";
import type { Real } from "../types/element.js";
import { Column, Row } from "./lines.js";
import type { LiveLine } from "./lines.js";

// ============================================================================
// Whole Collections
// ============================================================================

/**
 * Base of `Rows` and `Columns`.
 */
export abstract class LineCollection<L extends LiveLine, S extends LineRange<L, S>>
  extends StoreView
  implements Iterable<L>
{
  constructor(
    store: MatrixStore,
    protected readonly axis: Axis
  ) {
    super(store);
  }

  protected abstract line(index: number): L;
  protected abstract range(s: AdjustedSlice): S;

  get length(): number {
    this.assertFresh();
    return lineCount(this.store, this.axis);
  }

  /**
   * The line at a 1-based position, or a view over the lines selected by a slice.
   */
  get(index: number): L;
  get(s: Slice): S;
  get(sub: Index): L | S;
  get(sub: Index): L | S {
    if (typeof sub === "number") {
      return this.line(checkIndex(sub, this.length));
    }
    return this.range(adjustSlice(sub, this.length));
  }

  /**
   * Replace a whole line.
   *
   * @throws InvalidDimension if `values` doesn't match the line length
   */
  set(index: number, values: Iterable<Real>): void {
    const i = checkIndex(index, this.length);
    const container = validContainer(values, lineLength(this.store, this.axis));
    writeLine(this.store, this.axis, i, container);
  }

  /**
   * Delete the line at a 1-based position, or the lines selected by a slice.
   * Views created before the deletion, other than this one, become invalid.
   *
   * @throws EmptyMatrixError if no line would remain
   */
  delete(sub: Index): void {
    const count = this.length;
    const indices =
      typeof sub === "number" ? [checkIndex(sub, count)] : sliceIndices(adjustSlice(sub, count));

    if (indices.length === count) {
      throw new EmptyMatrixError();
    }
    if (indices.length === 0) {
      return;
    }

    removeLines(this.store, this.axis, indices);
    this.restamp();
  }

  *[Symbol.iterator](): Generator<L, void, undefined> {
    const count = this.length;
    for (let i = 0; i < count; i++) {
      this.assertFresh();
      yield this.line(i);
    }
  }

  protected describe(): string {
    return this.axis === "row" ? "Rows" : "Columns";
  }
}

export class Rows extends LineCollection<Row, RowsSlice> {
  constructor(store: MatrixStore) {
    super(store, "row");
  }

  protected line(index: number): Row {
    return new Row(this.store, index);
  }

  protected range(s: AdjustedSlice): RowsSlice {
    return new RowsSlice(this.store, s);
  }
}

export class Columns extends LineCollection<Column, ColumnsSlice> {
  constructor(store: MatrixStore) {
    super(store, "column");
  }

  protected line(index: number): Column {
    return new Column(this.store, index);
  }

  protected range(s: AdjustedSlice): ColumnsSlice {
    return new ColumnsSlice(this.store, s);
  }
}

// ============================================================================
// Slices
// ============================================================================

/**
 * Base of `RowsSlice` and `ColumnsSlice`. Positions are relative to the slice.
 */
export abstract class LineRange<L extends LiveLine, S extends LineRange<L, S>>
  extends StoreView
  implements Iterable<L>
{
  constructor(
    store: MatrixStore,
    protected readonly axis: Axis,
    protected readonly adjusted: AdjustedSlice
  ) {
    super(store);
  }

  protected abstract line(index: number): L;
  protected abstract range(s: AdjustedSlice): S;

  get length(): number {
    this.assertFresh();
    return this.adjusted.length;
  }

  get(index: number): L;
  get(s: Slice): S;
  get(sub: Index): L | S;
  get(sub: Index): L | S {
    if (typeof sub === "number") {
      return this.line(sliceIndex(this.adjusted, checkIndex(sub, this.length)));
    }
    return this.range(composeSlice(this.adjusted, adjustSlice(sub, this.length)));
  }

  *[Symbol.iterator](): Generator<L, void, undefined> {
    this.assertFresh();
    for (const i of sliceIndices(this.adjusted)) {
      this.assertFresh();
      yield this.line(i);
    }
  }

  protected describe(): string {
    const name = this.axis === "row" ? "Rows" : "Columns";
    return `${name} [${formatAdjustedSlice(this.adjusted)}]`;
  }
}

export class RowsSlice extends LineRange<Row, RowsSlice> {
  constructor(store: MatrixStore, s: AdjustedSlice) {
    super(store, "row", s);
  }

  protected line(index: number): Row {
    return new Row(this.store, index);
  }

  protected range(s: AdjustedSlice): RowsSlice {
    return new RowsSlice(this.store, s);
  }
}

export class ColumnsSlice extends LineRange<Column, ColumnsSlice> {
  constructor(store: MatrixStore, s: AdjustedSlice) {
    super(store, "column", s);
  }

  protected line(index: number): Column {
    return new Column(this.store, index);
  }

  protected range(s: AdjustedSlice): ColumnsSlice {
    return new ColumnsSlice(this.store, s);
  }
}
