// ---------------------------------------------------------------------------
// Pose conversion: host object transform -> world-to-camera model pose
// ---------------------------------------------------------------------------

import type { QuatTuple, Vec3Tuple } from '@sfm-export/sparse-model';

import {
  axisAngleToQuat,
  eulerToQuat,
  mat3MulVec3,
  mat3ToQuat,
  mat3Transpose,
  quatNormalize,
  quatToMat3,
  rowMajorToMat3,
  vec3ToTuple,
} from './math.js';
import type { HostPose, HostRotation, Mat3, ModelPose, Quaternion } from './types.js';

/**
 * Model quaternion produced by the identity host rotation. The host camera
 * looks down its local -Z with +Y up; the model camera looks down +Z with
 * +Y down, a half turn about X.
 */
export const AXIS_CORRECTION_QVEC: QuatTuple = [0, 1, 0, 0];

/** Convert any host rotation mode to a unit host quaternion. */
export function hostRotationToQuaternion(rotation: HostRotation): Quaternion {
  switch (rotation.kind) {
    case 'quaternion':
      return quatNormalize(rotation.quaternion);
    case 'euler':
      return eulerToQuat(rotation.angles, rotation.order);
    case 'axisAngle':
      return axisAngleToQuat(rotation.axis, rotation.angle);
    case 'matrix':
      return mat3ToQuat(rowMajorToMat3(rotation.rows));
  }
}

// -0 would be written as "-0" in text models.
function positiveZero(v: number): number {
  return v === 0 ? 0 : v;
}

/** Rotation matrix of a scalar-first model quaternion. */
export function qvecToMat3(qvec: QuatTuple): Mat3 {
  const [w, x, y, z] = qvec;
  return quatToMat3(quatNormalize({ x, y, z, w }));
}

/**
 * Convert a host camera transform to the model's world-to-camera pose.
 *
 * The host quaternion (x, y, z, w) is remapped to the scalar-first model
 * quaternion (x, w, z, -y), and the translation is -(R(qvec) · position).
 *
 * @param pose Camera location and rotation as the host reports them.
 */
export function convertPose(pose: HostPose): ModelPose {
  const q = hostRotationToQuaternion(pose.rotation);
  const qvec: QuatTuple = [
    positiveZero(q.x),
    positiveZero(q.w),
    positiveZero(q.z),
    positiveZero(-q.y),
  ];
  const rotated = mat3MulVec3(qvecToMat3(qvec), vec3ToTuple(pose.position));
  const tvec: Vec3Tuple = [
    positiveZero(-rotated[0]),
    positiveZero(-rotated[1]),
    positiveZero(-rotated[2]),
  ];
  return { qvec, tvec };
}

/** Camera centre in world space: -R^T · tvec. */
export function cameraCenter(qvec: QuatTuple, tvec: Vec3Tuple): Vec3Tuple {
  const [x, y, z] = mat3MulVec3(mat3Transpose(qvecToMat3(qvec)), tvec);
  return [-x, -y, -z];
}

/** Map a world point into camera coordinates: R · x + tvec. */
export function worldToCamera(qvec: QuatTuple, tvec: Vec3Tuple, point: Vec3Tuple): Vec3Tuple {
  const [x, y, z] = mat3MulVec3(qvecToMat3(qvec), point);
  return [x + tvec[0], y + tvec[1], z + tvec[2]];
}
