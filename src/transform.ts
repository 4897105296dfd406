import type { Point3D, Transform } from "./ir.js";
import { CompileError } from "./errors.js";

export type Matrix4 = number[];

const IDENTITY_MATRIX: Matrix4 = [
  1, 0, 0, 0,
  0, 1, 0, 0,
  0, 0, 1, 0,
  0, 0, 0, 1,
];

export function identityMatrix(): Matrix4 {
  return IDENTITY_MATRIX.slice();
}

export function normalizeMatrix(matrix: number[] | undefined): Matrix4 {
  if (!matrix) return identityMatrix();
  if (matrix.length !== 16 || !matrix.every(Number.isFinite)) {
    throw new CompileError("transform_invalid", "Transform matrix must be 16 finite numbers");
  }
  return matrix.slice();
}

export function matrixFromTranslation(translation: Point3D): Matrix4 {
  const out = identityMatrix();
  out[12] = translation[0];
  out[13] = translation[1];
  out[14] = translation[2];
  return out;
}

/**
 * Inverse of a rotation + translation matrix (no scale or shear):
 * the transposed rotation and the rotated, negated translation. Zero
 * translation components come back as +0.
 */
export function invertRigidMatrix(matrix: Matrix4): Matrix4 {
  const m = (i: number) => matrix[i] ?? 0;
  const tx = m(12);
  const ty = m(13);
  const tz = m(14);
  return [
    m(0), m(4), m(8), 0,
    m(1), m(5), m(9), 0,
    m(2), m(6), m(10), 0,
    0 - (m(0) * tx + m(1) * ty + m(2) * tz),
    0 - (m(4) * tx + m(5) * ty + m(6) * tz),
    0 - (m(8) * tx + m(9) * ty + m(10) * tz),
    1,
  ];
}

export function matrixTranslation(matrix: Matrix4): Point3D {
  return [matrix[12] ?? 0, matrix[13] ?? 0, matrix[14] ?? 0];
}

/** Placement matrix of an assembly transform; a full matrix wins over a translation. */
export function normalizeTransform(transform?: Transform): Matrix4 {
  if (!transform) return identityMatrix();
  if (transform.matrix) return normalizeMatrix(transform.matrix);
  if (transform.translation) return matrixFromTranslation(transform.translation);
  return identityMatrix();
}

export function multiplyMatrices(a: Matrix4, b: Matrix4): Matrix4 {
  const out = new Array<number>(16).fill(0);
  for (let row = 0; row < 4; row += 1) {
    for (let col = 0; col < 4; col += 1) {
      let sum = 0;
      for (let k = 0; k < 4; k += 1) {
        const av = a[k * 4 + row] ?? 0;
        const bv = b[col * 4 + k] ?? 0;
        sum += av * bv;
      }
      out[col * 4 + row] = sum;
    }
  }
  return out;
}

export function transformPoint(matrix: Matrix4, point: Point3D): Point3D {
  const [x, y, z] = point;
  return [
    (matrix[0] ?? 0) * x + (matrix[4] ?? 0) * y + (matrix[8] ?? 0) * z + (matrix[12] ?? 0),
    (matrix[1] ?? 0) * x + (matrix[5] ?? 0) * y + (matrix[9] ?? 0) * z + (matrix[13] ?? 0),
    (matrix[2] ?? 0) * x + (matrix[6] ?? 0) * y + (matrix[10] ?? 0) * z + (matrix[14] ?? 0),
  ];
}

export function transformDirection(matrix: Matrix4, dir: Point3D): Point3D {
  const [x, y, z] = dir;
  return [
    (matrix[0] ?? 0) * x + (matrix[4] ?? 0) * y + (matrix[8] ?? 0) * z,
    (matrix[1] ?? 0) * x + (matrix[5] ?? 0) * y + (matrix[9] ?? 0) * z,
    (matrix[2] ?? 0) * x + (matrix[6] ?? 0) * y + (matrix[10] ?? 0) * z,
  ];
}
