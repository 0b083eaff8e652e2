/**
 * Condition Number
 *
 * σmax / σmin of a matrix, from its singular value decomposition.
 */

import { Matrix, SingularValueDecomposition } from 'ml-matrix';

/**
 * Singular values of `m`, largest first.
 */
export function singularValues(m: number[][]): number[] {
  if (m.length === 0 || m[0].length === 0) {
    return [];
  }
  const svd = new SingularValueDecomposition(new Matrix(m), {
    computeLeftSingularVectors: false,
    computeRightSingularVectors: false,
  });
  return [...svd.diagonal].sort((x, y) => y - x);
}

/**
 * Ratio of the largest to the smallest singular value.
 * Returns Infinity for a rank-deficient matrix and 1 for an empty one.
 */
export function conditionNumber(m: number[][]): number {
  const sigma = singularValues(m);
  if (sigma.length === 0) {
    return 1;
  }

  const max = sigma[0];
  const min = sigma[sigma.length - 1];
  if (min <= 0) {
    return Infinity;
  }
  return max / min;
}
