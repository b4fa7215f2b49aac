// src/utils/linearAlgebra.ts

const PIVOT_EPSILON = 1e-12;

/**
 * Solves A·x = b by Gaussian elimination with partial pivoting.
 * Returns null when the system is singular or not square.
 */
export function solveLinearSystem(matrix: readonly (readonly number[])[], rhs: readonly number[]): number[] | null {
  const n = rhs.length;
  if (matrix.length !== n || matrix.some((row) => row.length !== n)) {
    return null;
  }

  // augmented working copy
  const m = matrix.map((row, i) => [...row, rhs[i]]);

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(m[row][col]) > Math.abs(m[pivotRow][col])) {
        pivotRow = row;
      }
    }

    if (Math.abs(m[pivotRow][col]) < PIVOT_EPSILON) {
      return null;
    }

    if (pivotRow !== col) {
      [m[col], m[pivotRow]] = [m[pivotRow], m[col]];
    }

    for (let row = col + 1; row < n; row++) {
      const factor = m[row][col] / m[col][col];
      if (factor === 0) continue;
      for (let k = col; k <= n; k++) {
        m[row][k] -= factor * m[col][k];
      }
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    let sum = m[row][n];
    for (let k = row + 1; k < n; k++) {
      sum -= m[row][k] * x[k];
    }
    x[row] = sum / m[row][row];
  }

  return x;
}
