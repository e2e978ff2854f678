import { describe, it, expect } from "vitest";
import {
  adjustSlice,
  composeSlice,
  formatAdjustedSlice,
  formatSlice,
  sliceIndex,
  sliceIndices,
  sliceLength,
  SliceRangeError,
} from "../src/index.js";

describe("slices", () => {
  describe("adjustSlice", () => {
    it("converts a 1-based inclusive slice to a 0-based half-open range", () => {
      expect(adjustSlice({ start: 2, stop: 4 }, 5)).toEqual({
        start: 1,
        stop: 4,
        step: 1,
        length: 3,
      });
    });

    it("fills omitted bounds", () => {
      expect(adjustSlice({}, 3)).toEqual({ start: 0, stop: 3, step: 1, length: 3 });
      expect(adjustSlice({ step: 2 }, 5)).toEqual({ start: 0, stop: 5, step: 2, length: 3 });
    });

    it("clamps the stop to the length", () => {
      expect(adjustSlice({ stop: 10 }, 3)).toEqual({ start: 0, stop: 3, step: 1, length: 3 });
    });

    it("gives an empty range when start is past the end but stop is given", () => {
      expect(adjustSlice({ start: 5, stop: 6 }, 3).length).toBe(0);
    });

    it("rejects bounds below 1 and non-integers", () => {
      expect(() => adjustSlice({ start: 0 }, 3)).toThrow(SliceRangeError);
      expect(() => adjustSlice({ step: 1.5 }, 3)).toThrow(SliceRangeError);
    });

    it("rejects a start past the end when stop is omitted", () => {
      expect(() => adjustSlice({ start: 4 }, 3)).toThrow(
        "'4:' -> 'start' of slice is out of range (max: 3)."
      );
    });

    it("rejects start > stop", () => {
      expect(() => adjustSlice({ start: 3, stop: 2 }, 5)).toThrow(
        "'start' > 'stop' in slice '3:2'."
      );
    });
  });

  describe("index translation", () => {
    it("maps indices of a sub-range back to the original", () => {
      const s = adjustSlice({ start: 2, step: 2 }, 7);
      expect(sliceLength(s)).toBe(3);
      expect(sliceIndex(s, 2)).toBe(5);
      expect(sliceIndices(s)).toEqual([1, 3, 5]);
    });

    it("composes a slice of a slice", () => {
      const outer = adjustSlice({ start: 2, stop: 8 }, 10);
      const inner = adjustSlice({ start: 2, stop: 6, step: 2 }, outer.length);
      const composed = composeSlice(outer, inner);

      expect(composed).toEqual({ start: 2, stop: 7, step: 2, length: 3 });
      expect(sliceIndices(composed)).toEqual([2, 4, 6]);
    });

    it("composes an empty inner range to an empty range", () => {
      const outer = adjustSlice({}, 5);
      const inner = adjustSlice({ start: 6, stop: 7 }, outer.length);
      expect(composeSlice(outer, inner).length).toBe(0);
    });
  });

  describe("formatting", () => {
    it("renders slices with colons", () => {
      expect(formatSlice({ start: 2, stop: 5 })).toBe("2:5");
      expect(formatSlice({ stop: 2 })).toBe(":2");
      expect(formatSlice({ step: 2 })).toBe("::2");
      expect(formatAdjustedSlice({ start: 2, stop: 4, step: 2, length: 1 })).toBe("3:4:2");
    });
  });
});
