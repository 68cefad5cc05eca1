// ---------------------------------------------------------------------------
// Rotation and transform helpers
// Host quaternions are scalar-last {x, y, z, w}; matrices are column-major.
// ---------------------------------------------------------------------------

import type { Vec3Tuple } from '@sfm-export/sparse-model';

import type {
  EulerAngles,
  EulerOrder,
  Mat3,
  Mat4,
  Quaternion,
  RowMajorMat3,
  Vector3,
} from './types.js';

export const IDENTITY_QUAT: Quaternion = { x: 0, y: 0, z: 0, w: 1 };

// ---------------------------------------------------------------------------
// Quaternion
// ---------------------------------------------------------------------------

/** Multiply two quaternions: result = a * b (Hamilton product). */
export function quatMultiply(a: Quaternion, b: Quaternion): Quaternion {
  return {
    x: a.w * b.x + a.x * b.w + a.y * b.z - a.z * b.y,
    y: a.w * b.y - a.x * b.z + a.y * b.w + a.z * b.x,
    z: a.w * b.z + a.x * b.y - a.y * b.x + a.z * b.w,
    w: a.w * b.w - a.x * b.x - a.y * b.y - a.z * b.z,
  };
}

/** Normalize a quaternion to unit length. A zero quaternion becomes the identity. */
export function quatNormalize(q: Quaternion): Quaternion {
  const len = Math.sqrt(q.x * q.x + q.y * q.y + q.z * q.z + q.w * q.w);
  if (len < 1e-15) return { ...IDENTITY_QUAT };
  return { x: q.x / len, y: q.y / len, z: q.z / len, w: q.w / len };
}

/** Convert a unit quaternion to a 3x3 rotation matrix (column-major). */
export function quatToMat3(q: Quaternion): Mat3 {
  const { x, y, z, w } = q;
  const x2 = x + x, y2 = y + y, z2 = z + z;
  const xx = x * x2, xy = x * y2, xz = x * z2;
  const yy = y * y2, yz = y * z2, zz = z * z2;
  const wx = w * x2, wy = w * y2, wz = w * z2;

  return [
    // Column 0
    1 - (yy + zz), xy + wz, xz - wy,
    // Column 1
    xy - wz, 1 - (xx + zz), yz + wx,
    // Column 2
    xz + wy, yz - wx, 1 - (xx + yy),
  ];
}

/**
 * Recover a unit quaternion from a rotation matrix using Shepperd's method:
 * the branch is picked by the largest of the trace and the diagonal, which
 * keeps the square root away from zero.
 */
export function mat3ToQuat(m: Mat3): Quaternion {
  const [m00, m10, m20, m01, m11, m21, m02, m12, m22] = m;
  const trace = m00 + m11 + m22;

  let q: Quaternion;
  if (trace > 0) {
    const s = 0.5 / Math.sqrt(trace + 1);
    q = { w: 0.25 / s, x: (m21 - m12) * s, y: (m02 - m20) * s, z: (m10 - m01) * s };
  } else if (m00 > m11 && m00 > m22) {
    const s = 2 * Math.sqrt(1 + m00 - m11 - m22);
    q = { w: (m21 - m12) / s, x: 0.25 * s, y: (m01 + m10) / s, z: (m02 + m20) / s };
  } else if (m11 > m22) {
    const s = 2 * Math.sqrt(1 + m11 - m00 - m22);
    q = { w: (m02 - m20) / s, x: (m01 + m10) / s, y: 0.25 * s, z: (m12 + m21) / s };
  } else {
    const s = 2 * Math.sqrt(1 + m22 - m00 - m11);
    q = { w: (m10 - m01) / s, x: (m02 + m20) / s, y: (m12 + m21) / s, z: 0.25 * s };
  }
  return quatNormalize(q);
}

/**
 * Rotation of `angle` radians about `axis`. The axis need not be unit
 * length; a zero axis yields the identity.
 */
export function axisAngleToQuat(axis: Vector3, angle: number): Quaternion {
  const len = Math.sqrt(axis.x * axis.x + axis.y * axis.y + axis.z * axis.z);
  if (len < 1e-15) return { ...IDENTITY_QUAT };
  const s = Math.sin(angle / 2) / len;
  return { x: axis.x * s, y: axis.y * s, z: axis.z * s, w: Math.cos(angle / 2) };
}

// ---------------------------------------------------------------------------
// Euler angles
// ---------------------------------------------------------------------------

type Axis = 'x' | 'y' | 'z';

const UNIT_AXES: Record<Axis, Vector3> = {
  x: { x: 1, y: 0, z: 0 },
  y: { x: 0, y: 1, z: 0 },
  z: { x: 0, y: 0, z: 1 },
};

/** Axes in the order their rotations are applied. */
const EULER_SEQUENCES = {
  XYZ: ['x', 'y', 'z'],
  XZY: ['x', 'z', 'y'],
  YXZ: ['y', 'x', 'z'],
  YZX: ['y', 'z', 'x'],
  ZXY: ['z', 'x', 'y'],
  ZYX: ['z', 'y', 'x'],
} as const satisfies Record<EulerOrder, readonly Axis[]>;

/**
 * Compose per-axis rotations in the given order. For `XYZ` the result is
 * Rz · Ry · Rx, so X is applied to a vector first.
 */
export function eulerToQuat(angles: EulerAngles, order: EulerOrder): Quaternion {
  let q = IDENTITY_QUAT;
  for (const axis of EULER_SEQUENCES[order]) {
    q = quatMultiply(axisAngleToQuat(UNIT_AXES[axis], angles[axis]), q);
  }
  return quatNormalize(q);
}

// ---------------------------------------------------------------------------
// Matrices
// ---------------------------------------------------------------------------

export function mat3Transpose(m: Mat3): Mat3 {
  const [m00, m10, m20, m01, m11, m21, m02, m12, m22] = m;
  return [m00, m01, m02, m10, m11, m12, m20, m21, m22];
}

export function mat3MulVec3(m: Mat3, v: Vec3Tuple): Vec3Tuple {
  const [m00, m10, m20, m01, m11, m21, m02, m12, m22] = m;
  const [x, y, z] = v;
  return [
    m00 * x + m01 * y + m02 * z,
    m10 * x + m11 * y + m12 * z,
    m20 * x + m21 * y + m22 * z,
  ];
}

export function rowMajorToMat3(rows: RowMajorMat3): Mat3 {
  const [[a, b, c], [d, e, f], [g, h, i]] = rows;
  return [a, d, g, b, e, h, c, f, i];
}

/** Apply an affine column-major 4x4 transform to a point (w = 1). */
export function transformPoint(m: Mat4, v: Vec3Tuple): Vec3Tuple {
  const [x, y, z] = v;
  return [
    m[0] * x + m[4] * y + m[8] * z + m[12],
    m[1] * x + m[5] * y + m[9] * z + m[13],
    m[2] * x + m[6] * y + m[10] * z + m[14],
  ];
}

export function vec3ToTuple(v: Vector3): Vec3Tuple {
  return [v.x, v.y, v.z];
}
