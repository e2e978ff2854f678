/**
 * Linear systems by Gauss-Jordan elimination.
 */

import { InvalidDimension, NoUniqueSolution, ZeroDeterminant } from "./errors.js";
import type { Matrix } from "./matrix.js";
import type { ToleranceOptions } from "./tolerance.js";
import type { Element } from "./types/element.js";

/**
 * Solve `coefficients · x = constants` for x.
 *
 * @param coefficients - A square matrix
 * @param constants - A single column with as many rows as `coefficients`
 * @returns The solution, one element per unknown
 * @throws InvalidDimension if the shapes don't describe a square system
 * @throws NoUniqueSolution if the coefficients are singular
 *
 * @example
 * ```typescript
 * // 2x + y = 5, x + 3y = 10
 * solveLinearSystem(new Matrix([[2, 1], [1, 3]]), new Matrix([[5], [10]]));
 * // [1, 3] as Elements
 * ```
 */
export function solveLinearSystem(
  coefficients: Matrix,
  constants: Matrix,
  options?: ToleranceOptions
): Element[] {
  if (
    !coefficients.isSquare() ||
    coefficients.nrow !== constants.nrow ||
    constants.ncol !== 1
  ) {
    throw new InvalidDimension("The input matrices are of inappropriate dimensions.", [
      coefficients,
      constants,
    ]);
  }

  const augmented = coefficients.augment(constants);
  augmented.forwardEliminate(options);
  try {
    augmented.backSubstitute(options);
  } catch (error) {
    if (error instanceof ZeroDeterminant) {
      throw new NoUniqueSolution("There are no unique solutions for the system.", {
        cause: error,
      });
    }
    throw error;
  }

  return augmented.columns.get(augmented.ncol).toArray();
}
