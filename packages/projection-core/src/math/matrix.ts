// ---------------------------------------------------------------------------
// Matrix3x3 — 9-element Float64Array, column-major
// ---------------------------------------------------------------------------

import type { Matrix3x3, Vector3 } from '../types.js';

/** Build a column-major matrix from its rows. */
export function mat3FromRows(
  r0: [number, number, number],
  r1: [number, number, number],
  r2: [number, number, number],
): Matrix3x3 {
  return new Float64Array([
    r0[0], r1[0], r2[0],
    r0[1], r1[1], r2[1],
    r0[2], r1[2], r2[2],
  ]);
}

/** Multiply two 3x3 matrices: C = A * B (column-major). */
export function mat3Multiply(A: Matrix3x3, B: Matrix3x3): Matrix3x3 {
  const C = new Float64Array(9);
  for (let col = 0; col < 3; col++) {
    for (let row = 0; row < 3; row++) {
      let sum = 0;
      for (let k = 0; k < 3; k++) {
        sum += A[k * 3 + row]! * B[col * 3 + k]!;
      }
      C[col * 3 + row] = sum;
    }
  }
  return C;
}

/** Multiply a 3x3 matrix by a column vector. */
export function mat3TransformVector(m: Matrix3x3, v: Vector3): Vector3 {
  return {
    x: m[0]! * v.x + m[3]! * v.y + m[6]! * v.z,
    y: m[1]! * v.x + m[4]! * v.y + m[7]! * v.z,
    z: m[2]! * v.x + m[5]! * v.y + m[8]! * v.z,
  };
}

/** True when every element equals the identity's exactly. */
export function mat3IsIdentity(m: Matrix3x3): boolean {
  for (let i = 0; i < 9; i++) {
    const expected = i % 4 === 0 ? 1 : 0;
    if (m[i] !== expected) return false;
  }
  return true;
}

/** Right-handed rotation about the x axis. */
export function mat3RotationX(angle: number): Matrix3x3 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return mat3FromRows([1, 0, 0], [0, c, -s], [0, s, c]);
}

/** Right-handed rotation about the y axis. */
export function mat3RotationY(angle: number): Matrix3x3 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return mat3FromRows([c, 0, s], [0, 1, 0], [-s, 0, c]);
}

/** Right-handed rotation about the z axis. */
export function mat3RotationZ(angle: number): Matrix3x3 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return mat3FromRows([c, -s, 0], [s, c, 0], [0, 0, 1]);
}
