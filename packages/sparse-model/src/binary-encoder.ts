/**
 * Binary encoder: model maps → little-endian byte layout via DataView.
 *
 * Every file: [8B record count] then records in ascending id order.
 *
 *   cameras.bin   [8B id] [4B model code] [8B width] [8B height] [8B param × arity]
 *   images.bin    [8B id] [8B qw qx qy qz] [8B tx ty tz] [8B camera id]
 *                 [8B name length] [name bytes] [8B obs count] ([8B x] [8B y] [8B point3D id]) × n
 *   points3D.bin  [8B id] [8B x y z] [1B r g b] [8B error] [8B track length]
 *                 ([8B image id] [8B point2D idx]) × n
 *
 * Ids, counts and lengths are uint64; point3D ids and point2D indices are
 * int64 so the -1 sentinel survives; reals are float64.
 */

import {
  CAMERA_MODELS, INVALID_POINT3D_ID, sortedById,
  type Camera, type Point3D, type PosedImage,
} from './types.js'

// ─── Field sizes ────────────────────────────────────────────────────────────

export const U64_SIZE = 8
export const I64_SIZE = 8
export const F64_SIZE = 8
export const MODEL_CODE_SIZE = 4
export const RGB_SIZE = 3

/** Fixed part of a camera record, before params. */
export const CAMERA_HEADER_SIZE = U64_SIZE + MODEL_CODE_SIZE + U64_SIZE + U64_SIZE
/** Fixed part of an image record, excluding name bytes and observations. */
export const IMAGE_FIXED_SIZE = U64_SIZE + 7 * F64_SIZE + U64_SIZE + U64_SIZE + U64_SIZE
export const OBSERVATION_SIZE = 2 * F64_SIZE + I64_SIZE
/** Fixed part of a point record, excluding the track. */
export const POINT_FIXED_SIZE = U64_SIZE + 3 * F64_SIZE + RGB_SIZE + F64_SIZE + U64_SIZE
export const TRACK_ENTRY_SIZE = U64_SIZE + I64_SIZE

const utf8 = new TextEncoder()

// ─── Size calculation ───────────────────────────────────────────────────────

export function camerasBinarySize(cameras: ReadonlyMap<number, Camera>): number {
  let size = U64_SIZE
  for (const cam of cameras.values()) {
    size += CAMERA_HEADER_SIZE + cam.params.length * F64_SIZE
  }
  return size
}

export function imagesBinarySize(images: ReadonlyMap<number, PosedImage>): number {
  let size = U64_SIZE
  for (const image of images.values()) {
    size += IMAGE_FIXED_SIZE + utf8.encode(image.name).byteLength + image.xys.length * OBSERVATION_SIZE
  }
  return size
}

export function pointsBinarySize(points: ReadonlyMap<number, Point3D>): number {
  let size = U64_SIZE
  for (const point of points.values()) {
    size += POINT_FIXED_SIZE + point.imageIds.length * TRACK_ENTRY_SIZE
  }
  return size
}

// ─── Primitive writers ──────────────────────────────────────────────────────

function writeU64(view: DataView, offset: number, value: number): number {
  view.setBigUint64(offset, BigInt(value), true)
  return offset + U64_SIZE
}

function writeI64(view: DataView, offset: number, value: number): number {
  view.setBigInt64(offset, BigInt(value), true)
  return offset + I64_SIZE
}

function writeF64s(view: DataView, offset: number, values: readonly number[]): number {
  for (const v of values) {
    view.setFloat64(offset, v, true)
    offset += F64_SIZE
  }
  return offset
}

// ─── Encoders ───────────────────────────────────────────────────────────────

export function encodeCamerasBinary(cameras: ReadonlyMap<number, Camera>): Uint8Array {
  const buffer = new ArrayBuffer(camerasBinarySize(cameras))
  const view = new DataView(buffer)

  let offset = writeU64(view, 0, cameras.size)
  for (const cam of sortedById(cameras)) {
    offset = writeU64(view, offset, cam.id)
    view.setInt32(offset, CAMERA_MODELS[cam.model].code, true); offset += MODEL_CODE_SIZE
    offset = writeU64(view, offset, cam.width)
    offset = writeU64(view, offset, cam.height)
    offset = writeF64s(view, offset, cam.params)
  }

  return new Uint8Array(buffer)
}

export function encodeImagesBinary(images: ReadonlyMap<number, PosedImage>): Uint8Array {
  const buffer = new ArrayBuffer(imagesBinarySize(images))
  const view = new DataView(buffer)
  const bytes = new Uint8Array(buffer)

  let offset = writeU64(view, 0, images.size)
  for (const image of sortedById(images)) {
    offset = writeU64(view, offset, image.id)
    offset = writeF64s(view, offset, image.qvec)
    offset = writeF64s(view, offset, image.tvec)
    offset = writeU64(view, offset, image.cameraId)

    const name = utf8.encode(image.name)
    offset = writeU64(view, offset, name.byteLength)
    bytes.set(name, offset); offset += name.byteLength

    offset = writeU64(view, offset, image.xys.length)
    image.xys.forEach(([x, y], i) => {
      offset = writeF64s(view, offset, [x, y])
      offset = writeI64(view, offset, image.point3DIds[i] ?? INVALID_POINT3D_ID)
    })
  }

  return bytes
}

export function encodePointsBinary(points: ReadonlyMap<number, Point3D>): Uint8Array {
  const buffer = new ArrayBuffer(pointsBinarySize(points))
  const view = new DataView(buffer)

  let offset = writeU64(view, 0, points.size)
  for (const point of sortedById(points)) {
    offset = writeU64(view, offset, point.id)
    offset = writeF64s(view, offset, point.xyz)
    for (const channel of point.rgb) {
      view.setUint8(offset, channel); offset += 1
    }
    offset = writeF64s(view, offset, [point.error])

    offset = writeU64(view, offset, point.imageIds.length)
    point.imageIds.forEach((imageId, i) => {
      offset = writeU64(view, offset, imageId)
      offset = writeI64(view, offset, point.point2DIdxs[i] ?? 0)
    })
  }

  return new Uint8Array(buffer)
}
