/**
 * Record constructors. Every Camera, PosedImage and Point3D in the model is
 * built here, so decoders and callers share one set of shape rules.
 */

import { z } from 'zod'

import { RecordConstructionError, type RecordKind } from './errors.js'
import {
  CAMERA_MODELS, CAMERA_MODEL_NAMES, INVALID_POINT3D_ID,
  type Camera, type CameraModelName, type Point3D, type PosedImage,
} from './types.js'

// ─── Inputs ─────────────────────────────────────────────────────────────────

export interface CameraInput {
  id: number
  model: CameraModelName
  width: number
  height: number
  params: readonly number[]
}

export interface PosedImageInput {
  id: number
  qvec: readonly number[]
  tvec: readonly number[]
  cameraId: number
  name: string
  xys?: readonly (readonly number[])[]
  point3DIds?: readonly number[]
}

export interface Point3DInput {
  id: number
  xyz: readonly number[]
  rgb: readonly number[]
  error?: number
  imageIds?: readonly number[]
  point2DIdxs?: readonly number[]
}

// ─── Schemas ────────────────────────────────────────────────────────────────

const recordId = z.number().int().positive().max(Number.MAX_SAFE_INTEGER)
const real = z.number().finite()
const index = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)

const point3DRef = z.number().int().max(Number.MAX_SAFE_INTEGER).refine(
  (id) => id === INVALID_POINT3D_ID || id > 0,
  { message: `must be a positive id or ${INVALID_POINT3D_ID}` },
)

/** Largest accepted distance of a qvec norm from 1. */
export const QVEC_NORM_TOLERANCE = 1e-6

const unitQuaternion = z.tuple([real, real, real, real]).refine(
  (q) => Math.abs(Math.hypot(...q) - 1) <= QVEC_NORM_TOLERANCE,
  { message: 'must be a unit quaternion' },
)

export const imageNameSchema = z.string()
  .min(1)
  .regex(/^[^\s/\\]+$/, 'must not contain whitespace or path separators')
  .refine((name) => name !== '.' && name !== '..', { message: 'must name a file' })

export const cameraSchema = z.object({
  id: recordId,
  model: z.enum(CAMERA_MODEL_NAMES),
  width: recordId,
  height: recordId,
  params: z.array(real),
}).superRefine((camera, ctx) => {
  const { arity } = CAMERA_MODELS[camera.model]
  if (camera.params.length !== arity) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['params'],
      message: `${camera.model} takes ${arity} params, got ${camera.params.length}`,
    })
  }
})

export const posedImageSchema = z.object({
  id: recordId,
  qvec: unitQuaternion,
  tvec: z.tuple([real, real, real]),
  cameraId: recordId,
  name: imageNameSchema,
  xys: z.array(z.tuple([real, real])).default([]),
  point3DIds: z.array(point3DRef).default([]),
}).superRefine((image, ctx) => {
  if (image.xys.length !== image.point3DIds.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['point3DIds'],
      message: `expected ${image.xys.length} entries to match xys, got ${image.point3DIds.length}`,
    })
  }
})

export const point3DSchema = z.object({
  id: recordId,
  xyz: z.tuple([real, real, real]),
  rgb: z.tuple([channel(), channel(), channel()]),
  error: real.nonnegative().default(0),
  imageIds: z.array(recordId).default([]),
  point2DIdxs: z.array(index).default([]),
}).superRefine((point, ctx) => {
  if (point.imageIds.length !== point.point2DIdxs.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['point2DIdxs'],
      message: `expected ${point.imageIds.length} entries to match imageIds, got ${point.point2DIdxs.length}`,
    })
  }
})

function channel() {
  return z.number().int().min(0).max(255)
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${path}: ${issue.message}`
  })
}

function fail(entity: RecordKind, error: z.ZodError): never {
  throw new RecordConstructionError(entity, issuesOf(error))
}

// ─── Constructors ───────────────────────────────────────────────────────────

/** Build a Camera. Throws RecordConstructionError when params do not fit the model. */
export function createCamera(input: CameraInput): Camera {
  const parsed = cameraSchema.safeParse(input)
  if (!parsed.success) fail('camera', parsed.error)
  const { id, model, width, height, params } = parsed.data
  return { id, model, width, height, params }
}

export function createPosedImage(input: PosedImageInput): PosedImage {
  const parsed = posedImageSchema.safeParse(input)
  if (!parsed.success) fail('image', parsed.error)
  const { id, qvec, tvec, cameraId, name, xys, point3DIds } = parsed.data
  return { id, qvec, tvec, cameraId, name, xys, point3DIds }
}

export function createPoint3D(input: Point3DInput): Point3D {
  const parsed = point3DSchema.safeParse(input)
  if (!parsed.success) fail('point3D', parsed.error)
  const { id, xyz, rgb, error, imageIds, point2DIdxs } = parsed.data
  return { id, xyz, rgb, error, imageIds, point2DIdxs }
}
