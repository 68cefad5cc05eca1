/**
 * Sparse reconstruction model: cameras, posed images and 3D points.
 *
 * Records are write-once. A model is three id-keyed maps that the codecs
 * serialize to `cameras.*`, `images.*` and `points3D.*`.
 */

// ─── Camera models ──────────────────────────────────────────────────────────

export interface CameraModelSpec {
  /** Integer code written to cameras.bin. Part of the binary format contract. */
  code: number
  /** Number of params the model takes. */
  arity: number
  /** Param names in storage order. */
  params: readonly string[]
}

export const CAMERA_MODEL_NAMES = [
  'PINHOLE', 'OPENCV', 'SIMPLE_PINHOLE', 'SIMPLE_RADIAL', 'RADIAL',
] as const

export type CameraModelName = (typeof CAMERA_MODEL_NAMES)[number]

export const CAMERA_MODELS = {
  PINHOLE:        { code: 0, arity: 4, params: ['fx', 'fy', 'cx', 'cy'] },
  OPENCV:         { code: 1, arity: 8, params: ['fx', 'fy', 'cx', 'cy', 'k1', 'k2', 'p1', 'p2'] },
  SIMPLE_PINHOLE: { code: 2, arity: 3, params: ['f', 'cx', 'cy'] },
  SIMPLE_RADIAL:  { code: 3, arity: 4, params: ['f', 'cx', 'cy', 'k'] },
  RADIAL:         { code: 4, arity: 5, params: ['f', 'cx', 'cy', 'k1', 'k2'] },
} as const satisfies Record<CameraModelName, CameraModelSpec>

export function isCameraModelName(name: string): name is CameraModelName {
  return CAMERA_MODEL_NAMES.some((candidate) => candidate === name)
}

export function cameraModelByCode(code: number): CameraModelName | undefined {
  return CAMERA_MODEL_NAMES.find((name) => CAMERA_MODELS[name].code === code)
}

// ─── Records ────────────────────────────────────────────────────────────────

/** Marks an observation that has no associated 3D point. */
export const INVALID_POINT3D_ID = -1

export type Vec2Tuple = readonly [number, number]
export type Vec3Tuple = readonly [number, number, number]
/** Scalar-first quaternion (w, x, y, z). */
export type QuatTuple = readonly [number, number, number, number]
export type Rgb = readonly [number, number, number]

export interface Camera {
  readonly id: number
  readonly model: CameraModelName
  readonly width: number
  readonly height: number
  readonly params: readonly number[]
}

/**
 * An image with its world-to-camera pose:
 * x_cam = R(qvec) · x_world + tvec.
 */
export interface PosedImage {
  readonly id: number
  readonly qvec: QuatTuple
  readonly tvec: Vec3Tuple
  readonly cameraId: number
  readonly name: string
  readonly xys: readonly Vec2Tuple[]
  /** One entry per `xys` entry; INVALID_POINT3D_ID when unmatched. */
  readonly point3DIds: readonly number[]
}

export interface Point3D {
  readonly id: number
  readonly xyz: Vec3Tuple
  readonly rgb: Rgb
  readonly error: number
  /** Track: imageIds[i] observes this point at xys[point2DIdxs[i]]. */
  readonly imageIds: readonly number[]
  readonly point2DIdxs: readonly number[]
}

export interface SparseModel {
  cameras: ReadonlyMap<number, Camera>
  images: ReadonlyMap<number, PosedImage>
  points: ReadonlyMap<number, Point3D>
}

// ─── Encodings ──────────────────────────────────────────────────────────────

export type ModelEncoding = 'text' | 'binary'

export const MODEL_ENCODINGS = ['text', 'binary'] as const satisfies readonly ModelEncoding[]

export function encodingExtension(encoding: ModelEncoding): '.txt' | '.bin' {
  switch (encoding) {
    case 'text':   return '.txt'
    case 'binary': return '.bin'
  }
}

/** Base names of the three files, without extension. */
export const MODEL_FILES = {
  cameras: 'cameras',
  images: 'images',
  points: 'points3D',
} as const

export type ModelFileKind = keyof typeof MODEL_FILES

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Records in ascending id order; encoders write in this order. */
export function sortedById<T extends { id: number }>(records: ReadonlyMap<number, T>): T[] {
  return [...records.values()].sort((a, b) => a.id - b.id)
}
