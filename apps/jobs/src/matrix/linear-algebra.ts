/**
 * Dense Linear Algebra
 *
 * Row-major `number[][]` matrices. Design matrices here are small (tens to low
 * hundreds of columns), so nothing is special-cased for sparsity.
 */

import { SolveResult } from '../ratings/types';

export const DEFAULT_PIVOT_EPSILON = 1e-14;

/**
 * Transpose of `m`. An empty matrix transposes to an empty matrix.
 */
export function transpose(m: number[][]): number[][] {
  const rows = m.length;
  const cols = rows > 0 ? m[0].length : 0;
  const out: number[][] = [];

  for (let i = 0; i < cols; i++) {
    const row = new Array<number>(rows).fill(0);
    for (let j = 0; j < rows; j++) {
      row[j] = m[j][i];
    }
    out.push(row);
  }

  return out;
}

/**
 * Matrix product `a · b`
 */
export function multiply(a: number[][], b: number[][]): number[][] {
  const inner = b.length;
  const cols = inner > 0 ? b[0].length : 0;

  if (a.length > 0 && a[0].length !== inner) {
    throw new Error(`Cannot multiply ${a.length}x${a[0].length} by ${inner}x${cols} matrix`);
  }

  return a.map(row => {
    const out = new Array<number>(cols).fill(0);
    for (let k = 0; k < inner; k++) {
      const aik = row[k];
      if (aik === 0) continue;
      const bk = b[k];
      for (let j = 0; j < cols; j++) {
        out[j] += aik * bk[j];
      }
    }
    return out;
  });
}

/**
 * Matrix-vector product `m · v`
 */
export function multiplyVector(m: number[][], v: number[]): number[] {
  return m.map(row => {
    if (row.length !== v.length) {
      throw new Error(`Cannot multiply row of length ${row.length} by vector of length ${v.length}`);
    }
    let sum = 0;
    for (let j = 0; j < v.length; j++) {
      sum += row[j] * v[j];
    }
    return sum;
  });
}

export function identity(n: number): number[][] {
  return Array.from({ length: n }, (_, i) => {
    const row = new Array<number>(n).fill(0);
    row[i] = 1;
    return row;
  });
}

/**
 * Adds λ to every diagonal entry of a square matrix, in place.
 */
export function addRegularization(m: number[][], lambda: number): number[][] {
  for (let i = 0; i < m.length; i++) {
    m[i][i] += lambda;
  }
  return m;
}

/**
 * Solve `Ax = b` with Gauss-Jordan elimination and partial pivoting.
 *
 * Works in place: `a` and `b` are overwritten. A pivot whose magnitude is
 * below `epsilon` is never divided by; the system is reported as singular
 * at that column instead.
 */
export function gaussianEliminate(
  a: number[][],
  b: number[],
  epsilon: number = DEFAULT_PIVOT_EPSILON
): SolveResult {
  const n = b.length;

  if (a.length !== n) {
    throw new Error(`Coefficient matrix has ${a.length} rows but right-hand side has ${n}`);
  }

  for (let i = 0; i < n; i++) {
    // Largest magnitude in column i at or below the diagonal
    let maxRow = i;
    for (let k = i + 1; k < n; k++) {
      if (Math.abs(a[k][i]) > Math.abs(a[maxRow][i])) {
        maxRow = k;
      }
    }

    if (maxRow !== i) {
      [a[i], a[maxRow]] = [a[maxRow], a[i]];
      [b[i], b[maxRow]] = [b[maxRow], b[i]];
    }

    const pivot = a[i][i];
    if (!(Math.abs(pivot) >= epsilon)) {
      return { ok: false, reason: 'singular', column: i };
    }

    for (let j = i; j < n; j++) {
      a[i][j] /= pivot;
    }
    b[i] /= pivot;

    for (let k = 0; k < n; k++) {
      if (k === i) continue;
      const factor = a[k][i];
      if (factor === 0) continue;
      for (let j = i; j < n; j++) {
        a[k][j] -= factor * a[i][j];
      }
      b[k] -= factor * b[i];
    }
  }

  if (!b.every(Number.isFinite)) {
    return { ok: false, reason: 'non_finite' };
  }

  return { ok: true, solution: b };
}

function normalEquations(a: number[][], b: number[]): { ata: number[][]; atb: number[] } {
  if (a.length !== b.length) {
    throw new Error(`Design matrix has ${a.length} rows but target vector has ${b.length}`);
  }
  const at = transpose(a);
  return { ata: multiply(at, a), atb: multiplyVector(at, b) };
}

/**
 * Least-squares solution of `Ax ≈ b` via the normal equations `AᵗA·x = Aᵗb`.
 * Only well-posed when `AᵗA` is non-singular.
 */
export function solveLeastSquares(
  a: number[][],
  b: number[],
  epsilon: number = DEFAULT_PIVOT_EPSILON
): SolveResult {
  const { ata, atb } = normalEquations(a, b);
  return gaussianEliminate(ata, atb, epsilon);
}

/**
 * Ridge regression: solves `(AᵗA + λI)·x = Aᵗb`, i.e. minimizes
 * ‖Ax − b‖² + λ‖x‖².
 */
export function solveLeastSquaresRegularized(
  a: number[][],
  b: number[],
  lambda: number,
  epsilon: number = DEFAULT_PIVOT_EPSILON
): SolveResult {
  if (!Number.isFinite(lambda) || lambda < 0) {
    throw new Error(`Regularization strength must be a finite non-negative number, got ${lambda}`);
  }
  const { ata, atb } = normalEquations(a, b);
  addRegularization(ata, lambda);
  return gaussianEliminate(ata, atb, epsilon);
}
