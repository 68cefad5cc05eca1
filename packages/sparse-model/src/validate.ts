/**
 * Referential integrity across the three collections. Runs before any file
 * is written so a dangling reference never reaches disk.
 */

import { ReferentialError, type RecordKind } from './errors.js'
import { INVALID_POINT3D_ID, type SparseModel } from './types.js'

function checkKeys<T extends { id: number }>(
  entity: RecordKind,
  records: ReadonlyMap<number, T>,
): void {
  for (const [key, record] of records) {
    if (key !== record.id) {
      throw new ReferentialError(entity, record.id, `collection key ${key}`)
    }
  }
}

/** Throws ReferentialError on the first reference that does not resolve. */
export function validateModel(model: SparseModel): void {
  const { cameras, images, points } = model

  checkKeys('camera', cameras)
  checkKeys('image', images)
  checkKeys('point3D', points)

  for (const image of images.values()) {
    if (!cameras.has(image.cameraId)) {
      throw new ReferentialError('image', image.id, `unknown camera ${image.cameraId}`)
    }
    for (const pointId of image.point3DIds) {
      if (pointId !== INVALID_POINT3D_ID && !points.has(pointId)) {
        throw new ReferentialError('image', image.id, `unknown point3D ${pointId}`)
      }
    }
  }

  for (const point of points.values()) {
    point.imageIds.forEach((imageId, i) => {
      const image = images.get(imageId)
      if (!image) {
        throw new ReferentialError('point3D', point.id, `unknown image ${imageId}`)
      }
      const idx = point.point2DIdxs[i] ?? -1
      if (idx < 0 || idx >= image.xys.length) {
        throw new ReferentialError(
          'point3D', point.id,
          `point2D index ${idx} outside image ${imageId} (${image.xys.length} observations)`,
        )
      }
    })
  }
}
