// ---------------------------------------------------------------------------
// @sfm-export/scene-export: host scene types
// ---------------------------------------------------------------------------

import type { QuatTuple, Vec3Tuple } from '@sfm-export/sparse-model';

// ---------------------------------------------------------------------------
// Vectors, quaternions, matrices
// ---------------------------------------------------------------------------

/** 3D vector in host (scene) space. */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** Quaternion with scalar-last convention: q = xi + yj + zk + w. */
export interface Quaternion {
  x: number;
  y: number;
  z: number;
  w: number;
}

/**
 * 3x3 matrix, column-major.
 *
 * Element at row r, col c is at index c*3 + r.
 */
export type Mat3 = readonly [
  number, number, number,
  number, number, number,
  number, number, number,
];

/**
 * 4x4 matrix, column-major (graphics convention).
 *
 * Layout: [m00, m10, m20, m30, m01, m11, m21, m31, m02, m12, m22, m32, m03, m13, m23, m33]
 */
export type Mat4 = readonly [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
];

/** Row-major 3x3 matrix as the host stores object rotation matrices. */
export type RowMajorMat3 = readonly [Vec3Tuple, Vec3Tuple, Vec3Tuple];

// ---------------------------------------------------------------------------
// Host rotation
// ---------------------------------------------------------------------------

/** Euler rotation order. `XYZ` rotates about X first, then Y, then Z. */
export type EulerOrder = 'XYZ' | 'XZY' | 'YXZ' | 'YZX' | 'ZXY' | 'ZYX';

export interface EulerAngles {
  x: number;
  y: number;
  z: number;
}

/** Every rotation mode the host can report for an object. */
export type HostRotation =
  | { kind: 'quaternion'; quaternion: Quaternion }
  | { kind: 'euler'; angles: EulerAngles; order: EulerOrder }
  | { kind: 'axisAngle'; axis: Vector3; angle: number }
  | { kind: 'matrix'; rows: RowMajorMat3 };

/** Object location and rotation as the host reports them. */
export interface HostPose {
  position: Vector3;
  rotation: HostRotation;
}

/** World-to-camera pose: x_cam = R(qvec) · x_world + tvec. */
export interface ModelPose {
  qvec: QuatTuple;
  tvec: Vec3Tuple;
}

// ---------------------------------------------------------------------------
// Camera intrinsics
// ---------------------------------------------------------------------------

/** Physical lens and sensor of a host camera, in millimetres. */
export interface LensSpec {
  lensMm: number;
  sensorWidthMm: number;
  sensorHeightMm: number;
}

/** Render settings: base resolution and the percentage scale applied to it. */
export interface ResolutionSettings {
  x: number;
  y: number;
  percentage: number;
}

export interface Resolution {
  width: number;
  height: number;
}

// ---------------------------------------------------------------------------
// Point sources
// ---------------------------------------------------------------------------

/** Packed per-point data sampled from one host object. */
export interface PointSampleStream {
  /** xyz triples. */
  positions: ArrayLike<number>;
  /** RGBA quadruples in [0, 1]; alpha is ignored. */
  colors?: ArrayLike<number>;
  /** Object-to-world transform applied to every position. */
  matrixWorld?: Mat4;
}

/** Visibility switches of a point-generating modifier. Mutated in place. */
export interface ModifierState {
  showViewport: boolean;
  showRender: boolean;
  /** Preview toggle of the generator, when it exposes one. */
  preview?: boolean;
}

export interface PointSource {
  name: string;
  /** Generator that must be enabled while sampling. */
  modifier?: ModifierState;
  sample(): PointSampleStream | Promise<PointSampleStream>;
}

// ---------------------------------------------------------------------------
// Scene and rendering
// ---------------------------------------------------------------------------

export interface HostCamera {
  name: string;
  lens: LensSpec;
  /** Frames carrying a location or rotation keyframe, in any order. */
  keyframes: readonly number[];
  poseAt(frame: number): HostPose | Promise<HostPose>;
}

export interface HostScene {
  currentFrame: number;
  resolution: ResolutionSettings;
  cameras: readonly HostCamera[];
  pointSources: readonly PointSource[];
}

export interface RenderRequest {
  camera: HostCamera;
  frame: number;
  /** File name inside the images directory. */
  imageName: string;
  /** Absolute or output-relative path the renderer must write. */
  outputPath: string;
}

/** Produces one image file per request. Rendering itself lives in the host. */
export interface FrameRenderer {
  render(request: RenderRequest): Promise<void>;
}

export interface ExportSummary {
  cameras: number;
  images: number;
  points: number;
  imagesDir: string;
  modelDir: string;
}
