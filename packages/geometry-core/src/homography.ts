import { Matrix3, Vector3 } from "three";
import type { Vec2 } from "./types";

const SINGULAR_EPS = 1e-12;
export const DEFAULT_MIN_TRIANGLE_AREA = 1e-3;

export function triangleArea(a: Vec2, b: Vec2, c: Vec2): number {
  return Math.abs((b[0] - a[0]) * (c[1] - a[1]) - (c[0] - a[0]) * (b[1] - a[1])) / 2;
}

/** True when any three of the points are (nearly) collinear. */
export function isDegenerate(points: Vec2[], minArea = DEFAULT_MIN_TRIANGLE_AREA): boolean {
  for (let i = 0; i < points.length; i++) {
    for (let j = i + 1; j < points.length; j++) {
      for (let k = j + 1; k < points.length; k++) {
        if (triangleArea(points[i], points[j], points[k]) < minArea) return true;
      }
    }
  }
  return false;
}

/**
 * Gaussian elimination with partial pivoting. Returns null for a singular
 * system. Both arguments are consumed.
 */
export function solveLinearSystem(a: number[][], b: number[]): number[] | null {
  const n = b.length;
  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
    }
    if (Math.abs(a[pivot][col]) < SINGULAR_EPS) return null;
    [a[col], a[pivot]] = [a[pivot], a[col]];
    [b[col], b[pivot]] = [b[pivot], b[col]];

    for (let row = col + 1; row < n; row++) {
      const factor = a[row][col] / a[col][col];
      for (let k = col; k < n; k++) a[row][k] -= factor * a[col][k];
      b[row] -= factor * b[col];
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    let sum = b[row];
    for (let k = row + 1; k < n; k++) sum -= a[row][k] * x[k];
    x[row] = sum / a[row][row];
  }
  return x;
}

/** Homography H with to ~ H·from, from four correspondences (h33 = 1). */
export function solveHomography(from: Vec2[], to: Vec2[]): Matrix3 | null {
  const a: number[][] = [];
  const b: number[] = [];
  for (let i = 0; i < 4; i++) {
    const [x, y] = from[i];
    const [u, v] = to[i];
    a.push([x, y, 1, 0, 0, 0, -x * u, -y * u]);
    b.push(u);
    a.push([0, 0, 0, x, y, 1, -x * v, -y * v]);
    b.push(v);
  }
  const h = solveLinearSystem(a, b);
  if (!h) return null;
  return new Matrix3().set(h[0], h[1], h[2], h[3], h[4], h[5], h[6], h[7], 1);
}

/** Affine map from three correspondences, as a 3×3 with last row (0, 0, 1). */
export function solveAffine(from: Vec2[], to: Vec2[]): Matrix3 | null {
  const a: number[][] = [];
  const b: number[] = [];
  for (let i = 0; i < 3; i++) {
    const [x, y] = from[i];
    const [u, v] = to[i];
    a.push([x, y, 1, 0, 0, 0]);
    b.push(u);
    a.push([0, 0, 0, x, y, 1]);
    b.push(v);
  }
  const m = solveLinearSystem(a, b);
  if (!m) return null;
  return new Matrix3().set(m[0], m[1], m[2], m[3], m[4], m[5], 0, 0, 1);
}

/**
 * Planar transform between two point sets of equal size: affine for three
 * points, homography for four. Null when the correspondences are degenerate.
 */
export function solvePlaneTransform(
  from: Vec2[],
  to: Vec2[],
  minArea = DEFAULT_MIN_TRIANGLE_AREA
): Matrix3 | null {
  if (from.length !== to.length) {
    throw new RangeError(`Point count mismatch: ${from.length} vs ${to.length}`);
  }
  if (from.length !== 3 && from.length !== 4) {
    throw new RangeError(`Planes need 3 or 4 points, got ${from.length}`);
  }
  if (isDegenerate(from, minArea) || isDegenerate(to, minArea)) return null;
  return from.length === 4 ? solveHomography(from, to) : solveAffine(from, to);
}

export function applyTransform(matrix: Matrix3, x: number, y: number): Vec2 {
  const p = new Vector3(x, y, 1).applyMatrix3(matrix);
  return [p.x / p.z, p.y / p.z];
}
