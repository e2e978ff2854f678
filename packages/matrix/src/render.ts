/**
 * Text rendering of matrices as bordered grids.
 *
 * @example
 * ```
 * +---+---+
 * | 1 | 2 |
 * +---+---+
 * | 3 | 4 |
 * +---+---+
 * ```
 */

import { toString } from "./types/element.js";
import type { Element } from "./types/element.js";

/** Pad on both sides, with the odd space on the right. */
function center(text: string, width: number): string {
  const left = Math.floor((width - text.length) / 2);
  return " ".repeat(left) + text + " ".repeat(width - text.length - left);
}

/**
 * Render rows of elements with every column as wide as the longest element
 * plus one space either side.
 */
export function renderArray(array: readonly (readonly Element[])[]): string {
  const cells = array.map((row) => row.map(toString));
  const width = cells.reduce((max, row) => row.reduce((m, s) => Math.max(m, s.length), max), 0) + 2;
  const ncol = cells[0]?.length ?? 0;
  const border = "+" + `${"-".repeat(width)}+`.repeat(ncol);

  const lines = [border];
  for (const row of cells) {
    lines.push("|" + row.map((s) => `${center(s, width)}|`).join(""));
    lines.push(border);
  }
  return lines.join("\n");
}
