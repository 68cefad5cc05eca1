// ---------------------------------------------------------------------------
// Point sampling: packed host point data -> Point3D records
// ---------------------------------------------------------------------------

import { createPoint3D, type Point3D, type Rgb, type Vec3Tuple } from '@sfm-export/sparse-model';

import { transformPoint } from './math.js';
import type { PointSampleStream } from './types.js';

/** Colour used for points that carry no colour sample. */
export const DEFAULT_POINT_RGB: Rgb = [128, 128, 128];

/** Map a [0, 1] channel to 0..255. Non-finite input maps to 0. */
export function quantizeColorChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(255, Math.max(0, Math.floor(value * 255)));
}

function pointColor(colors: ArrayLike<number> | undefined, index: number): Rgb {
  const base = index * 4;
  if (colors === undefined || colors.length < base + 4) return DEFAULT_POINT_RGB;
  return [
    quantizeColorChannel(colors[base] ?? 0),
    quantizeColorChannel(colors[base + 1] ?? 0),
    quantizeColorChannel(colors[base + 2] ?? 0),
  ];
}

/**
 * Build one Point3D per xyz triple, in stream order, with ids counting up
 * from `startId`. Points have zero error and an empty track.
 */
export function samplePoints(stream: PointSampleStream, startId = 1): Point3D[] {
  const { positions, colors, matrixWorld } = stream;
  if (positions.length % 3 !== 0) {
    throw new RangeError(`positions length ${positions.length} is not a multiple of 3`);
  }

  const points: Point3D[] = [];
  const count = positions.length / 3;
  for (let i = 0; i < count; i++) {
    const local: Vec3Tuple = [
      positions[i * 3] ?? 0,
      positions[i * 3 + 1] ?? 0,
      positions[i * 3 + 2] ?? 0,
    ];
    points.push(createPoint3D({
      id: startId + i,
      xyz: matrixWorld ? transformPoint(matrixWorld, local) : local,
      rgb: pointColor(colors, i),
      error: 0,
    }));
  }
  return points;
}
