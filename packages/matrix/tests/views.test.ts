import { describe, it, expect } from "vitest";
import {
  Matrix,
  LineValue,
  element,
  toNumber,
  EmptyMatrixError,
  IndexOutOfRange,
  InvalidDimension,
  TypeMismatch,
  ViewInvalidated,
  type Element,
} from "../src/index.js";

const numbers = (values: Iterable<Element>): number[] => [...values].map(toNumber);

const square = () =>
  new Matrix([
    [1, 2, 3],
    [4, 5, 6],
    [7, 8, 9],
  ]);

describe("views", () => {
  describe("Rows and Columns", () => {
    it("index rows and columns from 1", () => {
      const m = square();
      expect(m.rows.length).toBe(3);
      expect(numbers(m.rows.get(2))).toEqual([4, 5, 6]);
      expect(numbers(m.columns.get(3))).toEqual([3, 6, 9]);
      expect(() => m.rows.get(0)).toThrow(IndexOutOfRange);
      expect(() => m.rows.get(1.5)).toThrow(TypeMismatch);
    });

    it("iterate fresh views in order", () => {
      expect([...square().rows].map((row) => row.position)).toEqual([1, 2, 3]);
      expect([...square().columns].map((column) => numbers(column))).toEqual([
        [1, 4, 7],
        [2, 5, 8],
        [3, 6, 9],
      ]);
    });

    it("replace whole lines of the same length", () => {
      const m = square();
      m.rows.set(1, [0, 0, 0]);
      m.columns.set(3, [1, 1, 1]);
      expect(m.toNumbers()).toEqual([
        [0, 0, 1],
        [4, 5, 1],
        [7, 8, 1],
      ]);
      expect(() => m.rows.set(1, [1])).toThrow(InvalidDimension);
    });

    it("delete single lines and slices", () => {
      const m = square();
      m.rows.delete(2);
      expect(m.toNumbers()).toEqual([
        [1, 2, 3],
        [7, 8, 9],
      ]);

      m.columns.delete({ start: 1, stop: 2 });
      expect(m.toNumbers()).toEqual([[3], [9]]);
    });

    it("keep working after their own deletion", () => {
      const m = square();
      const rows = m.rows;
      const first = m.rows.get(1);

      rows.delete(3);
      expect(rows.length).toBe(2);
      expect(() => first.toArray()).toThrow(ViewInvalidated);
      expect(numbers(m.rows.get(1))).toEqual([1, 2, 3]);
    });

    it("refuse to empty the matrix", () => {
      const m = new Matrix([[1, 2]]);
      expect(() => m.rows.delete(1)).toThrow(EmptyMatrixError);
      expect(() => square().columns.delete({})).toThrow("Emptying the matrix isn't allowed.");
      expect(m.toNumbers()).toEqual([[1, 2]]);
    });
  });

  describe("slices of rows and columns", () => {
    it("index relative to the slice", () => {
      const m = square();
      const lower = m.rows.get({ start: 2 });
      expect(lower.length).toBe(2);
      expect(numbers(lower.get(1))).toEqual([4, 5, 6]);
      expect(() => lower.get(3)).toThrow(IndexOutOfRange);
    });

    it("compose slices of slices", () => {
      const m = square();
      expect(numbers(m.rows.get({ start: 2 }).get({ start: 2 }).get(1))).toEqual([7, 8, 9]);
      expect(numbers(m.columns.get({ step: 2 }).get(2))).toEqual([3, 6, 9]);
    });

    it("iterate the selected lines", () => {
      const m = square();
      expect([...m.columns.get({ start: 2 })].map((column) => column.position)).toEqual([2, 3]);
    });

    it("describe themselves", () => {
      const m = square();
      expect(m.rows.get({ start: 2, stop: 3 }).toString()).toBe("<Rows [2:3] of 3x3 matrix>");
      expect(m.columns.toString()).toBe("<Columns of 3x3 matrix>");
    });
  });

  describe("Row and Column", () => {
    it("read elements and slices", () => {
      const row = square().rows.get(2);
      expect(row.at(2)).toEqual(element(5));
      expect(numbers(row.slice({ start: 2 }))).toEqual([5, 6]);
      expect(row.length).toBe(3);
      expect(row.toString()).toBe("Row(4, 5, 6)");
    });

    it("write through to the matrix", () => {
      const m = square();
      const row = m.rows.get(2);
      row.set(1, 10);
      row.set({ start: 2 }, [0, 0]);
      expect(numbers(m.rows.get(2))).toEqual([10, 0, 0]);
      expect(() => row.set({ start: 2 }, [1])).toThrow(InvalidDimension);
      expect(() => row.set(1, Number.NaN)).toThrow(TypeMismatch);
    });

    it("combine with lines and sequences", () => {
      const m = square();
      const first = m.rows.get(1);

      const sum = first.add(m.rows.get(2));
      expect(sum).toBeInstanceOf(LineValue);
      expect(numbers(sum)).toEqual([5, 7, 9]);
      expect(numbers(first.sub([1, 1, 1]))).toEqual([0, 1, 2]);
      expect(numbers(first.mul(2))).toEqual([2, 4, 6]);
      expect(numbers(first.mul([1, 0, 2]))).toEqual([1, 0, 6]);
      expect(numbers(first.div(2))).toEqual([0.5, 1, 1.5]);
      expect(numbers(first.div([1, 2, 3]))).toEqual([1, 1, 1]);
    });

    it("reject operands of another kind or length", () => {
      const m = square();
      expect(() => m.rows.get(1).add(m.columns.get(1))).toThrow(TypeMismatch);
      expect(() => m.rows.get(1).add([1, 2])).toThrow(InvalidDimension);
    });

    it("update the matrix in place", () => {
      const m = square();
      m.rows.get(2).subInPlace(m.rows.get(1).mul(4));
      m.columns.get(1).mulInPlace(2);
      expect(m.toNumbers()).toEqual([
        [2, 2, 3],
        [0, -3, -6],
        [14, 8, 9],
      ]);

      m.rows.get(1).divInPlace(2).addInPlace([0, 0, 1]);
      expect(numbers(m.rows.get(1))).toEqual([1, 1, 2.5]);
    });

    it("compare by position or by value", () => {
      const m = square();
      expect(m.rows.get(1).equals(m.rows.get(1))).toBe(true);
      expect(m.rows.get(1).equals(m.rows.get(1).snapshot())).toBe(true);
      expect(new LineValue("row", [1, 2, 3]).equals(m.rows.get(1))).toBe(true);
      expect(new LineValue("column", [1, 2, 3]).equals(m.rows.get(1))).toBe(false);
      expect(m.rows.get(1).equals(m.rows.get(2))).toBe(false);
    });

    it("test membership and truthiness", () => {
      const m = square();
      expect(m.rows.get(2).includes(5)).toBe(true);
      expect(m.rows.get(2).includes(10)).toBe(false);
      expect(m.rows.get(1).any()).toBe(true);
      expect(new Matrix(2, 2).rows.get(1).any()).toBe(false);
    });

    it("snapshot values that stay put", () => {
      const m = square();
      const snapshot = m.rows.get(1).snapshot();
      m.set(1, 1, 100);
      expect(snapshot.at(1)).toEqual(element(1));
      expect(snapshot.toString()).toBe("Row(1, 2, 3)");
    });
  });

  describe("invalidation", () => {
    it("fails old views after a resize and serves fresh ones", () => {
      const m = square();
      const row = m.rows.get(1);
      const columns = m.columns;

      m.resize(4);
      expect(row.isValid).toBe(false);
      expect(() => row.at(1)).toThrow(
        "Row 1 is no longer valid: the matrix was resized from 3x3 to 4x3."
      );
      expect(() => columns.length).toThrow(ViewInvalidated);
      expect(m.rows.get(1).at(1)).toEqual(element(1));
    });

    it("carries the stale view on the error", () => {
      const m = square();
      const column = m.columns.get(2);
      m.columns.delete(3);
      try {
        column.toArray();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ViewInvalidated);
        if (error instanceof ViewInvalidated) {
          expect(error.view).toBe(column);
        }
      }
    });

    it("keeps views valid across same-shape changes", () => {
      const m = square();
      const row = m.rows.get(1);
      m.transpose();
      expect(numbers(row)).toEqual([1, 4, 7]);
    });
  });
});
