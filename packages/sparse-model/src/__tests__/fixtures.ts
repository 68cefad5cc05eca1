import fc from 'fast-check'

import { createCamera, createPoint3D, createPosedImage } from '../records.js'
import {
  CAMERA_MODELS, CAMERA_MODEL_NAMES, INVALID_POINT3D_ID,
  type Camera, type Point3D, type PosedImage, type SparseModel,
} from '../types.js'

// ─── Worked model ───────────────────────────────────────────────────────────

export function exampleModel(): SparseModel {
  const cameras = new Map<number, Camera>([
    [1, createCamera({ id: 1, model: 'PINHOLE', width: 1920, height: 1080, params: [1000, 1000, 960, 540] })],
    [2, createCamera({ id: 2, model: 'OPENCV', width: 640, height: 480, params: [500, 500, 320, 240, 0, 0, 0, 0] })],
  ])
  const images = new Map<number, PosedImage>([
    [1, createPosedImage({ id: 1, qvec: [1, 0, 0, 0], tvec: [0, 0, 0], cameraId: 1, name: 'cam1.png', xys: [], point3DIds: [] })],
  ])
  const points = new Map<number, Point3D>([
    [1, createPoint3D({ id: 1, xyz: [1, 2, 3], rgb: [10, 20, 30], error: 0, imageIds: [], point2DIdxs: [] })],
  ])
  return { cameras, images, points }
}

/** A model with observations and tracks wired both ways. */
export function trackedModel(): SparseModel {
  const cameras = new Map<number, Camera>([
    [4, createCamera({ id: 4, model: 'SIMPLE_RADIAL', width: 800, height: 600, params: [700.5, 400, 300, -0.0125] })],
  ])
  const images = new Map<number, PosedImage>([
    [10, createPosedImage({
      id: 10, qvec: [0.5, 0.5, -0.5, 0.5], tvec: [0.1, -2.75, 3e-7], cameraId: 4, name: 'left.jpg',
      xys: [[12.5, 40.25], [100, 200]], point3DIds: [7, INVALID_POINT3D_ID],
    })],
    [11, createPosedImage({
      id: 11, qvec: [1, 0, 0, 0], tvec: [-1, 0, 0], cameraId: 4, name: 'right.jpg',
      xys: [[15.125, 41]], point3DIds: [7],
    })],
  ])
  const points = new Map<number, Point3D>([
    [7, createPoint3D({ id: 7, xyz: [0.25, -1.5, 12], rgb: [255, 0, 128], error: 0.75, imageIds: [10, 11], point2DIdxs: [0, 0] })],
    [9, createPoint3D({ id: 9, xyz: [1, 1, 1], rgb: [0, 0, 0] })],
  ])
  return { cameras, images, points }
}

// ─── Arbitraries ────────────────────────────────────────────────────────────

export const arbId = fc.integer({ min: 1, max: 2 ** 40 })
export const arbReal = fc.double({ noNaN: true, noDefaultInfinity: true, min: -1e9, max: 1e9 })
const arbUnit = fc.double({ noNaN: true, min: -1, max: 1 })
export const arbQvec: fc.Arbitrary<[number, number, number, number]> = fc.tuple(arbUnit, arbUnit, arbUnit, arbUnit)
  .filter((q) => Math.hypot(...q) > 0.1)
  .map((q) => {
    const n = Math.hypot(...q)
    return [q[0] / n, q[1] / n, q[2] / n, q[3] / n]
  })
const arbName = fc.stringMatching(/^[a-z0-9_-]{1,12}\.(png|jpg)$/)

export const arbCameras: fc.Arbitrary<Camera[]> = fc.uniqueArray(
  fc.record({
    id: arbId,
    model: fc.constantFrom(...CAMERA_MODEL_NAMES),
    width: fc.integer({ min: 1, max: 16384 }),
    height: fc.integer({ min: 1, max: 16384 }),
    params: fc.array(arbReal, { minLength: 8, maxLength: 8 }),
  }).map((c) => createCamera({ ...c, params: c.params.slice(0, CAMERA_MODELS[c.model].arity) })),
  { selector: (c) => c.id, minLength: 1, maxLength: 4 },
)

interface TrackSlot {
  imageId: number
  idx: number
}

function zip<A, B>(as: readonly A[], bs: readonly B[]): [A, B][] {
  const pairs: [A, B][] = []
  as.forEach((a, i) => {
    const b = bs[i]
    if (b !== undefined) pairs.push([a, b])
  })
  return pairs
}

function toMap<T extends { id: number }>(records: readonly T[]): Map<number, T> {
  return new Map(records.map((r) => [r.id, r]))
}

/** Referentially valid models: images use existing cameras, tracks use existing observations. */
export const arbModel: fc.Arbitrary<SparseModel> = fc.tuple(
  arbCameras,
  fc.uniqueArray(arbId, { maxLength: 5 }),
).chain(([cameras, pointIds]) => {
  const pointRef: fc.Arbitrary<number> = pointIds.length > 0
    ? fc.oneof(fc.constant(INVALID_POINT3D_ID), fc.constantFrom(...pointIds))
    : fc.constant(INVALID_POINT3D_ID)

  const arbImages = fc.uniqueArray(
    fc.record({
      id: arbId,
      qvec: arbQvec,
      tvec: fc.tuple(arbReal, arbReal, arbReal),
      cameraId: fc.constantFrom(...cameras.map((c) => c.id)),
      name: arbName,
      observations: fc.array(fc.record({ x: arbReal, y: arbReal, pointId: pointRef }), { maxLength: 4 }),
    }).map((img) => createPosedImage({
      id: img.id, qvec: img.qvec, tvec: img.tvec, cameraId: img.cameraId, name: img.name,
      xys: img.observations.map((o) => [o.x, o.y]),
      point3DIds: img.observations.map((o) => o.pointId),
    })),
    { selector: (img) => img.id, maxLength: 4 },
  )

  return arbImages.chain((images) => {
    const slots = images.flatMap((img) => img.xys.map((_, idx) => ({ imageId: img.id, idx })))
    const arbTrack: fc.Arbitrary<TrackSlot[]> = slots.length > 0
      ? fc.array(fc.constantFrom(...slots), { maxLength: 3 })
      : fc.constant([])

    const arbPointBody = fc.record({
      xyz: fc.tuple(arbReal, arbReal, arbReal),
      rgb: fc.tuple(fc.nat(255), fc.nat(255), fc.nat(255)),
      error: fc.double({ noNaN: true, noDefaultInfinity: true, min: 0, max: 100 }),
      track: arbTrack,
    })
    const arbPoints = fc.array(arbPointBody, { minLength: pointIds.length, maxLength: pointIds.length })
      .map((bodies) => zip(pointIds, bodies).map(([id, p]) => createPoint3D({
        id, xyz: p.xyz, rgb: p.rgb, error: p.error,
        imageIds: p.track.map((t) => t.imageId),
        point2DIdxs: p.track.map((t) => t.idx),
      })))

    return arbPoints.map((points) => ({
      cameras: toMap(cameras),
      images: toMap(images),
      points: toMap(points),
    }))
  })
})
