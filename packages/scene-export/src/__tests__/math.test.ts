import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { Vec3Tuple } from '@sfm-export/sparse-model';

import {
  IDENTITY_QUAT,
  axisAngleToQuat,
  eulerToQuat,
  mat3MulVec3,
  mat3ToQuat,
  mat3Transpose,
  quatMultiply,
  quatNormalize,
  quatToMat3,
  rowMajorToMat3,
  transformPoint,
} from '../math.js';
import type { Mat3, Mat4, Quaternion } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function expectTupleClose(actual: readonly number[], expected: readonly number[], digits = 9): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, i) => expect(actual[i]).toBeCloseTo(value, digits));
}

function rotate(q: Quaternion, v: Vec3Tuple): Vec3Tuple {
  return mat3MulVec3(quatToMat3(q), v);
}

const HALF_PI = Math.PI / 2;

const arbQuat = fc
  .record({
    x: fc.double({ min: -1, max: 1, noNaN: true }),
    y: fc.double({ min: -1, max: 1, noNaN: true }),
    z: fc.double({ min: -1, max: 1, noNaN: true }),
    w: fc.double({ min: -1, max: 1, noNaN: true }),
  })
  .filter((q) => Math.hypot(q.x, q.y, q.z, q.w) > 1e-3)
  .map(quatNormalize);

// ---------------------------------------------------------------------------
// Quaternions
// ---------------------------------------------------------------------------

describe('quaternions', () => {
  it('maps the identity to the identity matrix', () => {
    expect(quatToMat3(IDENTITY_QUAT)).toEqual([1, 0, 0, 0, 1, 0, 0, 0, 1]);
  });

  it('normalizes a zero quaternion to the identity', () => {
    expect(quatNormalize({ x: 0, y: 0, z: 0, w: 0 })).toEqual(IDENTITY_QUAT);
  });

  it('rotates X onto Y with a quarter turn about Z', () => {
    const q = axisAngleToQuat({ x: 0, y: 0, z: 2 }, HALF_PI);
    expectTupleClose(rotate(q, [1, 0, 0]), [0, 1, 0]);
  });

  it('composes right to left', () => {
    const qx = axisAngleToQuat({ x: 1, y: 0, z: 0 }, HALF_PI);
    const qz = axisAngleToQuat({ x: 0, y: 0, z: 1 }, HALF_PI);
    // qx first, then qz: Y -> Z -> Z
    expectTupleClose(rotate(quatMultiply(qz, qx), [0, 1, 0]), [0, 0, 1]);
  });

  it('treats a zero axis as no rotation', () => {
    expect(axisAngleToQuat({ x: 0, y: 0, z: 0 }, 1)).toEqual(IDENTITY_QUAT);
  });
});

// ---------------------------------------------------------------------------
// Euler angles
// ---------------------------------------------------------------------------

describe('eulerToQuat', () => {
  const angles = { x: HALF_PI, y: 0, z: HALF_PI };

  it('applies X first for XYZ', () => {
    expectTupleClose(rotate(eulerToQuat(angles, 'XYZ'), [1, 0, 0]), [0, 1, 0]);
  });

  it('applies Z first for ZYX', () => {
    expectTupleClose(rotate(eulerToQuat(angles, 'ZYX'), [1, 0, 0]), [0, 0, 1]);
  });

  it('matches explicit composition for every order', () => {
    const a = { x: 0.3, y: -1.1, z: 2.4 };
    const qx = axisAngleToQuat({ x: 1, y: 0, z: 0 }, a.x);
    const qy = axisAngleToQuat({ x: 0, y: 1, z: 0 }, a.y);
    const qz = axisAngleToQuat({ x: 0, y: 0, z: 1 }, a.z);
    const cases = [
      ['XYZ', quatMultiply(qz, quatMultiply(qy, qx))],
      ['XZY', quatMultiply(qy, quatMultiply(qz, qx))],
      ['YXZ', quatMultiply(qz, quatMultiply(qx, qy))],
      ['YZX', quatMultiply(qx, quatMultiply(qz, qy))],
      ['ZXY', quatMultiply(qy, quatMultiply(qx, qz))],
      ['ZYX', quatMultiply(qx, quatMultiply(qy, qz))],
    ] as const;
    for (const [order, expected] of cases) {
      expectTupleClose(quatToMat3(eulerToQuat(a, order)), quatToMat3(expected));
    }
  });
});

// ---------------------------------------------------------------------------
// Matrices
// ---------------------------------------------------------------------------

describe('mat3ToQuat', () => {
  it('recovers a half turn about X', () => {
    const q = mat3ToQuat([1, 0, 0, 0, -1, 0, 0, 0, -1]);
    expectTupleClose([Math.abs(q.x), q.y, q.z, q.w], [1, 0, 0, 0]);
  });

  it('recovers a half turn about Y and about Z', () => {
    const qy = mat3ToQuat([-1, 0, 0, 0, 1, 0, 0, 0, -1]);
    expect(Math.abs(qy.y)).toBeCloseTo(1, 9);
    const qz = mat3ToQuat([-1, 0, 0, 0, -1, 0, 0, 0, 1]);
    expect(Math.abs(qz.z)).toBeCloseTo(1, 9);
  });

  it('inverts quatToMat3 up to sign', () => {
    fc.assert(fc.property(arbQuat, (q) => {
      expectTupleClose(quatToMat3(mat3ToQuat(quatToMat3(q))), quatToMat3(q));
    }));
  });
});

describe('matrix helpers', () => {
  const m: Mat3 = [1, 2, 3, 4, 5, 6, 7, 8, 9];

  it('transposes column-major storage', () => {
    expect(mat3Transpose(m)).toEqual([1, 4, 7, 2, 5, 8, 3, 6, 9]);
  });

  it('multiplies by a vector using columns', () => {
    expect(mat3MulVec3(m, [1, 0, 0])).toEqual([1, 2, 3]);
    expect(mat3MulVec3(m, [0, 0, 1])).toEqual([7, 8, 9]);
  });

  it('reads row-major rows', () => {
    expect(rowMajorToMat3([[1, 4, 7], [2, 5, 8], [3, 6, 9]])).toEqual(m);
  });

  it('applies scale then translation', () => {
    const world: Mat4 = [2, 0, 0, 0, 0, 2, 0, 0, 0, 0, 2, 0, 10, -1, 0.5, 1];
    expect(transformPoint(world, [1, 2, 3])).toEqual([12, 3, 6.5]);
  });
});
