/**
 * Rows and columns as values.
 *
 * A line is either a live view (Row, Column) reading through to its matrix,
 * or a LineValue snapshot that owns its elements. Both implement `Line`, so
 * arithmetic and comparison work the same on either; the caller picks the
 * variant at the access site with `snapshot()`.
 *
 * @example
 * ```typescript
 * const m = new Matrix([[1, 2], [3, 4]]);
 * const sum = m.rows.get(1).add(m.rows.get(2)); // LineValue [4, 6]
 * m.rows.get(2).subInPlace(m.rows.get(1).mul(3)); // m is now [[1, 2], [0, -2]]
 * ```
 */

import { InvalidDimension, TypeMismatch } from "../errors.js";
import { adjustSlice, sliceIndices } from "../slices.js";
import type { Index, Slice } from "../slices.js";
import {
  checkIndex,
  lineLength,
  readCell,
  readLine,
  StoreView,
  validContainer,
  writeCell,
  writeLine,
} from "../store.js";
import type { Axis, MatrixStore } from "../store.js";
import { resolveTolerance } from "../tolerance.js";
import type { ToleranceOptions } from "../tolerance.js";
import * as E from "../types/element.js";
import type { Element, Real } from "../types/element.js";

export type LineKind = Axis;

/** Anything a line can be combined with elementwise. */
export type LineOperand = Line | Iterable<Real>;

const KIND_NAMES: Record<LineKind, string> = { row: "Row", column: "Column" };

/**
 * Common interface of live lines and line snapshots.
 */
export interface Line extends Iterable<Element> {
  readonly kind: LineKind;
  readonly length: number;

  /** Element at a 1-based position */
  at(index: number): Element;
  /** Elements selected by a 1-based, inclusive slice */
  slice(s: Slice): Element[];
  toArray(): Element[];

  add(other: LineOperand, options?: ToleranceOptions): LineValue;
  sub(other: LineOperand, options?: ToleranceOptions): LineValue;
  /** Multiply by a scalar, or elementwise by another line */
  mul(other: Real | LineOperand, options?: ToleranceOptions): LineValue;
  /** Divide by a scalar, or elementwise by another line */
  div(other: Real | LineOperand, options?: ToleranceOptions): LineValue;

  equals(other: Line): boolean;
  includes(value: Real): boolean;
  /** False iff every element is zero */
  any(): boolean;
}

type ElementOp = (a: Element, b: Element, precision: number) => Element;

export function isLine(value: unknown): value is Line {
  return value instanceof LiveLine || value instanceof LineValue;
}

function operandValues(kind: LineKind, length: number, operand: LineOperand): Element[] {
  if (isLine(operand)) {
    if (operand.kind !== kind) {
      throw new TypeMismatch(`A ${kind} can't be combined with a ${operand.kind}.`);
    }
    if (operand.length !== length) {
      throw new InvalidDimension(
        `The ${kind}s have different lengths (${length} and ${operand.length}).`
      );
    }
    return operand.toArray();
  }
  return validContainer(operand, length);
}

function combine(
  kind: LineKind,
  values: readonly Element[],
  operand: Real | LineOperand,
  op: ElementOp,
  options: ToleranceOptions | undefined,
  snapped: boolean
): LineValue {
  const tol = resolveTolerance(options);
  const others = E.isReal(operand)
    ? new Array<Element>(values.length).fill(E.element(operand))
    : operandValues(kind, values.length, operand);

  return new LineValue(
    kind,
    values.map((value, k) => {
      const result = op(value, others[k], tol.precision);
      return snapped ? E.snap(result, tol) : result;
    })
  );
}

function sameElements(a: readonly Element[], b: readonly Element[]): boolean {
  return a.length === b.length && a.every((value, k) => E.equals(value, b[k]));
}

function formatLine(kind: LineKind, values: readonly Element[]): string {
  return `${KIND_NAMES[kind]}(${values.map(E.toString).join(", ")})`;
}

// ============================================================================
// Live Views
// ============================================================================

/**
 * A row or column read and written through to its matrix.
 */
export abstract class LiveLine extends StoreView implements Line {
  constructor(
    store: MatrixStore,
    readonly kind: LineKind,
    protected readonly index: number
  ) {
    super(store);
  }

  /** 1-based position of the line in its matrix */
  get position(): number {
    return this.index + 1;
  }

  get length(): number {
    this.assertFresh();
    return lineLength(this.store, this.kind);
  }

  at(index: number): Element {
    const k = checkIndex(index, this.length);
    return readCell(this.store, this.kind, this.index, k);
  }

  slice(s: Slice): Element[] {
    const adjusted = adjustSlice(s, this.length);
    return sliceIndices(adjusted).map((k) => readCell(this.store, this.kind, this.index, k));
  }

  toArray(): Element[] {
    this.assertFresh();
    return readLine(this.store, this.kind, this.index);
  }

  *[Symbol.iterator](): Generator<Element, void, undefined> {
    const length = this.length;
    for (let k = 0; k < length; k++) {
      this.assertFresh();
      yield readCell(this.store, this.kind, this.index, k);
    }
  }

  /**
   * Set one element, or the elements selected by a slice.
   *
   * @throws TypeMismatch if the value is not real, or a slice gets a scalar
   * @throws InvalidDimension if a slice gets a sequence of the wrong length
   */
  set(index: number, value: Real): void;
  set(s: Slice, values: Iterable<Real>): void;
  set(sub: Index, value: Real | Iterable<Real>): void {
    const length = this.length;

    if (typeof sub === "number") {
      const k = checkIndex(sub, length);
      if (!E.isReal(value)) {
        throw new TypeMismatch("Matrix elements can only be real numbers.");
      }
      writeCell(this.store, this.kind, this.index, k, E.element(value));
      return;
    }

    const adjusted = adjustSlice(sub, length);
    if (E.isReal(value)) {
      throw new TypeMismatch("A slice can only be set from an iterable of real numbers.");
    }
    const values = validContainer(value, adjusted.length);
    sliceIndices(adjusted).forEach((k, n) =>
      writeCell(this.store, this.kind, this.index, k, values[n])
    );
  }

  add(other: LineOperand, options?: ToleranceOptions): LineValue {
    return combine(this.kind, this.toArray(), other, E.add, options, false);
  }

  sub(other: LineOperand, options?: ToleranceOptions): LineValue {
    return combine(this.kind, this.toArray(), other, E.sub, options, false);
  }

  mul(other: Real | LineOperand, options?: ToleranceOptions): LineValue {
    return combine(this.kind, this.toArray(), other, E.mul, options, true);
  }

  div(other: Real | LineOperand, options?: ToleranceOptions): LineValue {
    return combine(this.kind, this.toArray(), other, E.div, options, true);
  }

  addInPlace(other: LineOperand, options?: ToleranceOptions): this {
    return this.replace(this.add(other, options));
  }

  subInPlace(other: LineOperand, options?: ToleranceOptions): this {
    return this.replace(this.sub(other, options));
  }

  mulInPlace(other: Real | LineOperand, options?: ToleranceOptions): this {
    return this.replace(this.mul(other, options));
  }

  divInPlace(other: Real | LineOperand, options?: ToleranceOptions): this {
    return this.replace(this.div(other, options));
  }

  private replace(result: LineValue): this {
    writeLine(this.store, this.kind, this.index, result.toArray());
    return this;
  }

  /**
   * Two views of the same line of the same matrix are equal without
   * comparing elements.
   */
  equals(other: Line): boolean {
    if (
      other instanceof LiveLine &&
      other.store === this.store &&
      other.kind === this.kind &&
      other.index === this.index
    ) {
      this.assertFresh();
      return true;
    }
    return other.kind === this.kind && sameElements(this.toArray(), other.toArray());
  }

  includes(value: Real): boolean {
    const target = E.element(value);
    return this.toArray().some((e) => E.equals(e, target));
  }

  any(): boolean {
    return this.toArray().some((e) => !E.isZero(e));
  }

  /** Copy of the line's current elements, detached from the matrix */
  snapshot(): LineValue {
    return new LineValue(this.kind, this.toArray());
  }

  protected describe(): string {
    return `${KIND_NAMES[this.kind]} ${this.index + 1}`;
  }

  override toString(): string {
    return formatLine(this.kind, this.toArray());
  }
}

export class Row extends LiveLine {
  constructor(store: MatrixStore, index: number) {
    super(store, "row", index);
  }
}

export class Column extends LiveLine {
  constructor(store: MatrixStore, index: number) {
    super(store, "column", index);
  }
}

// ============================================================================
// Snapshots
// ============================================================================

/**
 * A row or column detached from any matrix.
 */
export class LineValue implements Line {
  private readonly values: readonly Element[];

  constructor(
    readonly kind: LineKind,
    values: Iterable<Real>
  ) {
    this.values = validContainer(values);
  }

  get length(): number {
    return this.values.length;
  }

  at(index: number): Element {
    return this.values[checkIndex(index, this.values.length)];
  }

  slice(s: Slice): Element[] {
    return sliceIndices(adjustSlice(s, this.values.length)).map((k) => this.values[k]);
  }

  toArray(): Element[] {
    return this.values.slice();
  }

  [Symbol.iterator](): Iterator<Element> {
    return this.values[Symbol.iterator]();
  }

  add(other: LineOperand, options?: ToleranceOptions): LineValue {
    return combine(this.kind, this.values, other, E.add, options, false);
  }

  sub(other: LineOperand, options?: ToleranceOptions): LineValue {
    return combine(this.kind, this.values, other, E.sub, options, false);
  }

  mul(other: Real | LineOperand, options?: ToleranceOptions): LineValue {
    return combine(this.kind, this.values, other, E.mul, options, true);
  }

  div(other: Real | LineOperand, options?: ToleranceOptions): LineValue {
    return combine(this.kind, this.values, other, E.div, options, true);
  }

  equals(other: Line): boolean {
    return other.kind === this.kind && sameElements(this.values, other.toArray());
  }

  includes(value: Real): boolean {
    const target = E.element(value);
    return this.values.some((e) => E.equals(e, target));
  }

  any(): boolean {
    return this.values.some((e) => !E.isZero(e));
  }

  toString(): string {
    return formatLine(this.kind, this.values);
  }
}
