/**
 * Text encoder: model maps → line-oriented UTF-8.
 *
 *   cameras.txt   ID MODEL WIDTH HEIGHT PARAM...
 *   images.txt    ID QW QX QY QZ TX TY TZ CAMERA_ID NAME
 *                 X Y POINT3D_ID ...                (one line per image, may be empty)
 *   points3D.txt  ID X Y Z R G B ERROR (IMAGE_ID POINT2D_IDX)...
 *
 * Records are written in ascending id order. Reals use the shortest decimal
 * form that parses back to the same double, so text round-trips are exact.
 */

import {
  INVALID_POINT3D_ID, sortedById,
  type Camera, type Point3D, type PosedImage,
} from './types.js'

/** Shortest round-trip decimal. Keeps the sign of negative zero. */
export function formatReal(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value)
}

function mean(total: number, count: number): string {
  return formatReal(count === 0 ? 0 : total / count)
}

function toText(lines: string[]): string {
  return lines.join('\n') + '\n'
}

// ─── cameras.txt ────────────────────────────────────────────────────────────

export function encodeCamerasText(cameras: ReadonlyMap<number, Camera>): string {
  const lines = [
    '# Camera list with one line of data per camera:',
    '#   CAMERA_ID, MODEL, WIDTH, HEIGHT, PARAMS[]',
    `# Number of cameras: ${cameras.size}`,
  ]
  for (const cam of sortedById(cameras)) {
    lines.push([cam.id, cam.model, cam.width, cam.height, ...cam.params.map(formatReal)].join(' '))
  }
  return toText(lines)
}

// ─── images.txt ─────────────────────────────────────────────────────────────

export function encodeImagesText(images: ReadonlyMap<number, PosedImage>): string {
  const sorted = sortedById(images)
  const observations = sorted.reduce((sum, image) => sum + image.xys.length, 0)

  const lines = [
    '# Image list with two lines of data per image:',
    '#   IMAGE_ID, QW, QX, QY, QZ, TX, TY, TZ, CAMERA_ID, NAME',
    '#   POINTS2D[] as (X, Y, POINT3D_ID)',
    `# Number of images: ${images.size}, mean observations per image: ${mean(observations, images.size)}`,
  ]
  for (const image of sorted) {
    lines.push([
      image.id,
      ...image.qvec.map(formatReal),
      ...image.tvec.map(formatReal),
      image.cameraId,
      image.name,
    ].join(' '))
    lines.push(image.xys
      .map(([x, y], i) => `${formatReal(x)} ${formatReal(y)} ${image.point3DIds[i] ?? INVALID_POINT3D_ID}`)
      .join(' '))
  }
  return toText(lines)
}

// ─── points3D.txt ───────────────────────────────────────────────────────────

export function encodePointsText(points: ReadonlyMap<number, Point3D>): string {
  const sorted = sortedById(points)
  const trackTotal = sorted.reduce((sum, point) => sum + point.imageIds.length, 0)

  const lines = [
    '# 3D point list with one line of data per point:',
    '#   POINT3D_ID, X, Y, Z, R, G, B, ERROR, TRACK[] as (IMAGE_ID, POINT2D_IDX)',
    `# Number of points: ${points.size}, mean track length: ${mean(trackTotal, points.size)}`,
  ]
  for (const point of sorted) {
    const track = point.imageIds.map((imageId, i) => `${imageId} ${point.point2DIdxs[i] ?? 0}`)
    lines.push([
      point.id,
      ...point.xyz.map(formatReal),
      ...point.rgb,
      formatReal(point.error),
      ...track,
    ].join(' '))
  }
  return toText(lines)
}
