/**
 * 1-based slice translation.
 *
 * Matrix subscripts are 1-indexed and a slice's `stop` is included, so
 * `{ start: 2, stop: 4 }` selects the 2nd, 3rd and 4th rows. Every access path
 * converts such slices into 0-based half-open ranges with `adjustSlice` and
 * maps indices of a sliced view back to the matrix with `sliceIndex` and
 * `composeSlice`.
 */

import { SliceRangeError } from "./errors.js";

/** A 1-based slice with an inclusive stop. Omitted bounds mean "from the start"/"to the end". */
export interface Slice {
  readonly start?: number;
  readonly stop?: number;
  readonly step?: number;
}

/** A 0-based, half-open range produced by `adjustSlice`. */
export interface AdjustedSlice {
  readonly start: number;
  readonly stop: number;
  readonly step: number;
  /** Number of items selected */
  readonly length: number;
}

/** A single 1-based index or a slice. */
export type Index = number | Slice;

function isValidBound(value: number | undefined): boolean {
  return value === undefined || (Number.isInteger(value) && value >= 1);
}

/**
 * Colon-separated representation of a 1-based slice, e.g. "2:5", ":2", "::2".
 */
export function formatSlice(s: Slice): string {
  return `${s.start ?? ""}:${s.stop ?? ""}${s.step !== undefined ? `:${s.step}` : ""}`;
}

/**
 * 1-based, colon-separated representation of an adjusted slice.
 */
export function formatAdjustedSlice(s: AdjustedSlice): string {
  return `${s.start + 1}:${s.stop}${s.step > 1 ? `:${s.step}` : ""}`;
}

/**
 * Convert a 1-based slice with an inclusive stop into a 0-based half-open
 * range over a sequence of `length` items.
 *
 * @throws SliceRangeError if a bound or the step is not an integer ≥ 1,
 *   if `start` is past the end while `stop` is omitted, or if `start > stop`
 */
export function adjustSlice(s: Slice, length: number): AdjustedSlice {
  if (!isValidBound(s.start) || !isValidBound(s.stop) || !isValidBound(s.step)) {
    throw new SliceRangeError(
      `'${formatSlice(s)}' -> 'start', 'stop' or 'step' is not an integer greater than zero.`
    );
  }

  if (s.stop === undefined) {
    if (s.start !== undefined && s.start > length) {
      throw new SliceRangeError(
        `'${formatSlice(s)}' -> 'start' of slice is out of range (max: ${length}).`
      );
    }
  } else if (s.start !== undefined && s.start > s.stop) {
    throw new SliceRangeError(`'start' > 'stop' in slice '${formatSlice(s)}'.`);
  }

  // The inclusive 1-based stop equals the exclusive 0-based stop.
  const start = Math.min(s.start ?? 1, length + 1) - 1;
  const stop = Math.min(s.stop ?? length, length);
  const step = s.step ?? 1;

  return { start, stop, step, length: rangeLength(start, stop, step) };
}

function rangeLength(start: number, stop: number, step: number): number {
  return Math.max(0, Math.ceil((stop - start) / step));
}

/**
 * Number of items selected by an adjusted slice.
 */
export function sliceLength(s: AdjustedSlice): number {
  return rangeLength(s.start, s.stop, s.step);
}

/**
 * Map a 0-based index of the sequence produced by `s` to the original sequence.
 */
export function sliceIndex(s: AdjustedSlice, index: number): number {
  return s.start + index * s.step;
}

/**
 * Map `inner`, an adjusted slice of the sequence produced by `outer`, to the
 * equivalent slice of the original sequence.
 */
export function composeSlice(outer: AdjustedSlice, inner: AdjustedSlice): AdjustedSlice {
  const start = sliceIndex(outer, inner.start);
  const step = outer.step * inner.step;

  if (inner.length === 0) {
    return { start, stop: start, step, length: 0 };
  }

  const stop = sliceIndex(outer, inner.stop - 1) + 1;
  return { start, stop, step, length: rangeLength(start, stop, step) };
}

/**
 * The 0-based indices selected by an adjusted slice, in order.
 */
export function sliceIndices(s: AdjustedSlice): number[] {
  const indices: number[] = [];
  for (let i = s.start; i < s.stop; i += s.step) {
    indices.push(i);
  }
  return indices;
}
